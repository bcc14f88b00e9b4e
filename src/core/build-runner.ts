// src/core/build-runner.ts

import fs from 'fs';
import path from 'path';

import { DEFAULT_QS_CONFIG, DOCUMENT_FILE_NAME, type ResolvedQsConfig } from '../schema';
import { QsError, errorMessage } from '../util/errors';
import { findExecutables, isDirSync, isFileSync } from '../util/fs-utils';
import { defaultLogger, type Logger } from '../util/logger';
import {
    browserCommand,
    runCommand,
    spawnInherited,
    type ProcessLauncher,
} from './process-runner';

export interface BuildRunnerOptions {
    cwd: string;
    config?: ResolvedQsConfig;
    logger?: Logger;

    /**
     * Process launcher override; tests pass a fake instead of spawning.
     */
    launcher?: ProcessLauncher;
}

/**
 * `<buildDir>/bin` when it exists (the standard settings layout),
 * otherwise `<buildDir>` itself.
 */
export function executablesDir(cwd: string, buildDir: string): string {
    const binDir = path.resolve(cwd, buildDir, 'bin');
    return isDirSync(binDir) ? binDir : path.resolve(cwd, buildDir);
}

/**
 * Configure with `cmake` inside the build directory, then run the build command.
 */
export async function buildProject(options: BuildRunnerOptions): Promise<void> {
    const logger = options.logger ?? defaultLogger.child('[build]');
    const config = options.config ?? DEFAULT_QS_CONFIG;
    const launcher = options.launcher ?? spawnInherited;

    if (!isFileSync(path.join(options.cwd, DOCUMENT_FILE_NAME))) {
        throw new QsError(
            'precondition',
            `${DOCUMENT_FILE_NAME} not found in the current directory.`,
            ["Run 'qs init' to create a new CMake project."],
        );
    }

    const buildDir = path.resolve(options.cwd, config.buildDir);
    if (!isDirSync(buildDir)) {
        logger.info('Creating build directory...');
        try {
            fs.mkdirSync(buildDir, { recursive: true });
        } catch (err) {
            throw new QsError(
                'filesystem',
                `Error creating build directory: ${errorMessage(err)}`,
            );
        }
    }

    const sourceDir = path.relative(buildDir, path.resolve(options.cwd)) || '.';

    logger.info('Running CMake...');
    await runCommand('cmake', [sourceDir, ...config.cmakeArgs], {
        cwd: buildDir,
        launcher,
        label: 'cmake',
    });

    const [tool, ...toolArgs] = config.buildCommand;
    if (!tool) {
        throw new QsError('config', 'buildCommand must name a command');
    }

    logger.info(`Running ${tool}...`);
    await runCommand(tool, toolArgs, { cwd: buildDir, launcher, label: tool });

    logger.success('Build completed successfully!');
}

/**
 * Run a built executable. Without a name, the only executable in the
 * build output is picked; several candidates are reported instead.
 * Returns the name of the target that was run.
 */
export async function runTarget(
    targetName: string | undefined,
    options: BuildRunnerOptions,
): Promise<string> {
    const logger = options.logger ?? defaultLogger.child('[run]');
    const config = options.config ?? DEFAULT_QS_CONFIG;
    const launcher = options.launcher ?? spawnInherited;

    if (!isDirSync(path.resolve(options.cwd, config.buildDir))) {
        throw new QsError('precondition', 'build directory not found.', [
            "Run 'qs build' to build the project first.",
        ]);
    }

    const dir = executablesDir(options.cwd, config.buildDir);
    let name = targetName;

    if (!name) {
        const executables = findExecutables(dir);
        if (executables.length === 0) {
            throw new QsError(
                'precondition',
                'No executable targets found in build directory.',
                ["Specify a target name or build the project first with 'qs build'."],
            );
        }
        if (executables.length > 1) {
            throw new QsError('precondition', 'Multiple targets found:', [
                ...executables.map((exe, i) => `  ${i + 1}. ${exe}`),
                'Please specify a target name: qs run <target>',
            ]);
        }
        name = executables[0];
        logger.info(`Running target: ${name}`);
    }

    const targetPath = path.join(dir, name ?? '');
    if (!name || !isFileSync(targetPath)) {
        throw new QsError(
            'precondition',
            `Target '${name ?? ''}' not found in build directory.`,
        );
    }

    logger.info(`Running ${name}...`);
    await runCommand(targetPath, [], { cwd: options.cwd, launcher, label: 'target' });
    return name;
}

export interface OpenDocsOptions extends Omit<BuildRunnerOptions, 'cwd'> {
    platform?: NodeJS.Platform;
}

/**
 * Open the CMake documentation in the default browser.
 */
export async function openDocumentation(options: OpenDocsOptions = {}): Promise<string> {
    const logger = options.logger ?? defaultLogger.child('[doc]');
    const config = options.config ?? DEFAULT_QS_CONFIG;
    const url = config.docsUrl;
    const { command, args } = browserCommand(url, options.platform);

    logger.info(`Opening CMake documentation: ${url}`);
    try {
        await runCommand(command, args, {
            launcher: options.launcher,
            label: command,
        });
    } catch (err) {
        throw new QsError('process', `Error opening documentation: ${errorMessage(err)}`, [
            `Please open the following URL manually: ${url}`,
        ]);
    }
    return url;
}
