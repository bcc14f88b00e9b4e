// test/helpers.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {Logger} from '../src/util/logger';

export function makeTempDir(prefix = 'qs-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Write `{relativePath: contents}` under root, creating directories.
 */
export function writeFiles(root: string, files: Record<string, string>): void {
    for (const [rel, contents] of Object.entries(files)) {
        const abs = path.join(root, rel);
        fs.mkdirSync(path.dirname(abs), {recursive: true});
        fs.writeFileSync(abs, contents, 'utf8');
    }
}

export function readText(root: string, rel: string): string {
    return fs.readFileSync(path.join(root, rel), 'utf8');
}

export function silentLogger(): Logger {
    return new Logger({level: 'silent'});
}

export function countOccurrences(haystack: string, needle: string): number {
    return haystack.split(needle).length - 1;
}
