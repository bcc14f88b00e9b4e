// src/core/process-runner.ts

import { spawn } from 'child_process';
import { QsError, errorMessage } from '../util/errors';

export interface LaunchOptions {
    cwd?: string;
}

/**
 * Starts a process with inherited stdio and resolves with its exit code.
 * Rejects only when the process cannot be started.
 */
export type ProcessLauncher = (
    command: string,
    args: string[],
    options: LaunchOptions,
) => Promise<number>;

export const spawnInherited: ProcessLauncher = (command, args, options) =>
    new Promise<number>((resolve, reject) => {
        const child = spawn(command, args, {
            cwd: options.cwd,
            stdio: 'inherit',
        });

        child.once('error', reject);
        child.once('close', (code, signal) => {
            resolve(code ?? (signal ? 1 : 0));
        });
    });

/**
 * Run a command to completion. A launch failure or a non-zero exit
 * becomes a `process` QsError; nothing is retried.
 */
export async function runCommand(
    command: string,
    args: string[],
    options: LaunchOptions & { launcher?: ProcessLauncher; label?: string } = {},
): Promise<void> {
    const launcher = options.launcher ?? spawnInherited;
    const label = options.label ?? command;

    let code: number;
    try {
        code = await launcher(command, args, { cwd: options.cwd });
    } catch (err) {
        throw new QsError('process', `Error running ${label}: ${errorMessage(err)}`);
    }

    if (code !== 0) {
        throw new QsError('process', `Error running ${label}: exit status ${code}`);
    }
}

/**
 * Command used to open a URL in the default browser on this platform.
 */
export function browserCommand(
    url: string,
    platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
    switch (platform) {
        case 'darwin':
            return { command: 'open', args: [url] };
        case 'win32':
            return { command: 'cmd', args: ['/c', 'start', url] };
        default:
            return { command: 'xdg-open', args: [url] };
    }
}
