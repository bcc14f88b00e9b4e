// test/build-runner.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {buildProject, openDocumentation, runTarget} from '../src/core/build-runner';
import {browserCommand, type ProcessLauncher} from '../src/core/process-runner';
import {DEFAULT_QS_CONFIG} from '../src/schema';
import {QsError} from '../src/util/errors';
import {makeTempDir, silentLogger, writeFiles} from './helpers';

interface Call {
    command: string;
    args: string[];
    cwd?: string;
}

/**
 * Records every launch; exit codes are taken from `codes` by command name.
 */
function fakeLauncher(codes: Record<string, number> = {}): {launcher: ProcessLauncher; calls: Call[]} {
    const calls: Call[] = [];
    const launcher: ProcessLauncher = async (command, args, options) => {
        calls.push({command, args, cwd: options.cwd});
        return codes[command] ?? 0;
    };
    return {launcher, calls};
}

async function captureError(promise: Promise<unknown>): Promise<QsError> {
    try {
        await promise;
    } catch (err) {
        if (err instanceof QsError) return err;
        throw err;
    }
    throw new Error('expected a QsError');
}

function writeExecutable(file: string): void {
    fs.mkdirSync(path.dirname(file), {recursive: true});
    fs.writeFileSync(file, '#!/bin/sh\n');
    fs.chmodSync(file, 0o755);
}

let cwd: string;

beforeEach(() => {
    cwd = makeTempDir('qs-build-');
});

afterEach(() => {
    fs.rmSync(cwd, {recursive: true, force: true});
});

describe('buildProject', () => {
    it('configures and builds inside the build directory', async () => {
        writeFiles(cwd, {'CMakeLists.txt': 'project(x)\n'});
        const {launcher, calls} = fakeLauncher();

        await buildProject({cwd, launcher, logger: silentLogger()});

        const buildDir = path.join(cwd, 'build');
        expect(fs.statSync(buildDir).isDirectory()).toBe(true);
        expect(calls).toEqual([
            {command: 'cmake', args: ['..'], cwd: buildDir},
            {command: 'make', args: [], cwd: buildDir},
        ]);
    });

    it('passes configured cmake arguments and build command', async () => {
        writeFiles(cwd, {'CMakeLists.txt': 'project(x)\n'});
        const {launcher, calls} = fakeLauncher();
        const config = {
            ...DEFAULT_QS_CONFIG,
            buildDir: 'out',
            cmakeArgs: ['-DCMAKE_BUILD_TYPE=Release'],
            buildCommand: ['cmake', '--build', '.'],
        };

        await buildProject({cwd, config, launcher, logger: silentLogger()});

        const buildDir = path.join(cwd, 'out');
        expect(calls).toEqual([
            {command: 'cmake', args: ['..', '-DCMAKE_BUILD_TYPE=Release'], cwd: buildDir},
            {command: 'cmake', args: ['--build', '.'], cwd: buildDir},
        ]);
    });

    it('stops after a failing cmake run', async () => {
        writeFiles(cwd, {'CMakeLists.txt': 'project(x)\n'});
        const {launcher, calls} = fakeLauncher({cmake: 2});

        const err = await captureError(buildProject({cwd, launcher, logger: silentLogger()}));

        expect(err.kind).toBe('process');
        expect(err.message).toBe('Error running cmake: exit status 2');
        expect(calls.map((c) => c.command)).toEqual(['cmake']);
    });

    it('reports a tool that cannot be launched', async () => {
        writeFiles(cwd, {'CMakeLists.txt': 'project(x)\n'});
        const launcher: ProcessLauncher = async () => {
            throw new Error('spawn cmake ENOENT');
        };

        const err = await captureError(buildProject({cwd, launcher, logger: silentLogger()}));
        expect(err.message).toBe('Error running cmake: spawn cmake ENOENT');
    });

    it('requires a document', async () => {
        const {launcher, calls} = fakeLauncher();

        const err = await captureError(buildProject({cwd, launcher, logger: silentLogger()}));

        expect(err.kind).toBe('precondition');
        expect(err.hints).toEqual(["Run 'qs init' to create a new CMake project."]);
        expect(calls).toEqual([]);
        expect(fs.existsSync(path.join(cwd, 'build'))).toBe(false);
    });
});

describe('runTarget', () => {
    it('runs the only built executable', async () => {
        const exe = path.join(cwd, 'build', 'bin', 'app');
        writeExecutable(exe);
        writeFiles(cwd, {'build/bin/readme.txt': ''});
        writeExecutable(path.join(cwd, 'build', 'bin', '.hidden'));
        const {launcher, calls} = fakeLauncher();

        const name = await runTarget(undefined, {cwd, launcher, logger: silentLogger()});

        expect(name).toBe('app');
        expect(calls).toEqual([{command: exe, args: [], cwd}]);
    });

    it('falls back to the build directory without bin/', async () => {
        const exe = path.join(cwd, 'build', 'tool');
        writeExecutable(exe);
        const {launcher, calls} = fakeLauncher();

        await runTarget('tool', {cwd, launcher, logger: silentLogger()});
        expect(calls[0]?.command).toBe(exe);
    });

    it('asks for a name when several executables exist', async () => {
        writeExecutable(path.join(cwd, 'build', 'bin', 'b'));
        writeExecutable(path.join(cwd, 'build', 'bin', 'a'));
        const {launcher, calls} = fakeLauncher();

        const err = await captureError(runTarget(undefined, {cwd, launcher, logger: silentLogger()}));

        expect(err.message).toBe('Multiple targets found:');
        expect(err.hints).toEqual(['  1. a', '  2. b', 'Please specify a target name: qs run <target>']);
        expect(calls).toEqual([]);
    });

    it('reports a missing build directory', async () => {
        const err = await captureError(runTarget('app', {cwd, logger: silentLogger()}));
        expect(err.message).toBe('build directory not found.');
    });

    it('reports an unknown target', async () => {
        fs.mkdirSync(path.join(cwd, 'build'));
        const err = await captureError(runTarget('nope', {cwd, logger: silentLogger()}));
        expect(err.message).toBe("Target 'nope' not found in build directory.");
    });

    it('surfaces a non-zero exit of the target', async () => {
        const exe = path.join(cwd, 'build', 'bin', 'app');
        writeExecutable(exe);
        const {launcher} = fakeLauncher({[exe]: 3});

        const err = await captureError(runTarget('app', {cwd, launcher, logger: silentLogger()}));
        expect(err.message).toBe('Error running target: exit status 3');
    });
});

describe('openDocumentation', () => {
    const url = DEFAULT_QS_CONFIG.docsUrl;

    it('uses the platform opener', async () => {
        const {launcher, calls} = fakeLauncher();

        await openDocumentation({launcher, platform: 'linux', logger: silentLogger()});
        expect(calls).toEqual([{command: 'xdg-open', args: [url], cwd: undefined}]);
    });

    it('points at the URL when the browser cannot be opened', async () => {
        const {launcher} = fakeLauncher({open: 1});

        const err = await captureError(openDocumentation({launcher, platform: 'darwin', logger: silentLogger()}));
        expect(err.hints).toEqual([`Please open the following URL manually: ${url}`]);
    });

    it('maps platforms to opener commands', () => {
        expect(browserCommand('u', 'win32')).toEqual({command: 'cmd', args: ['/c', 'start', 'u']});
        expect(browserCommand('u', 'darwin')).toEqual({command: 'open', args: ['u']});
        expect(browserCommand('u', 'freebsd')).toEqual({command: 'xdg-open', args: ['u']});
    });
});
