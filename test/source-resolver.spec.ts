// test/source-resolver.spec.ts

import fs from 'fs';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {expandGlob, resolveSourceFiles} from '../src/core/source-resolver';
import {QsError} from '../src/util/errors';
import {makeTempDir, silentLogger, writeFiles} from './helpers';

let root: string;

beforeEach(() => {
    root = makeTempDir('qs-sources-');
    writeFiles(root, {
        'main.cpp': '',
        'util.cpp': '',
        'util.h': '',
        'notes.txt': '',
        'src/a.cc': '',
        'src/b.cpp': '',
        'src/nested/c.cpp': '',
    });
    fs.mkdirSync(`${root}/empty`);
});

afterEach(() => {
    fs.rmSync(root, {recursive: true, force: true});
});

describe('expandGlob', () => {
    it('expands a pattern in the working directory', () => {
        expect(expandGlob('*.cpp', root)).toEqual(['main.cpp', 'util.cpp']);
    });

    it('does not descend below the pattern depth', () => {
        expect(expandGlob('src/*.c*', root)).toEqual(['src/a.cc', 'src/b.cpp']);
    });

    it('descends recursively for **', () => {
        expect(expandGlob('src/**/*.cpp', root)).toEqual(['src/b.cpp', 'src/nested/c.cpp']);
    });

    it('strips a leading ./ from results', () => {
        expect(expandGlob('./src/*.cpp', root)).toEqual(['src/b.cpp']);
    });

    it('returns nothing for an unmatched pattern', () => {
        expect(expandGlob('*.rs', root)).toEqual([]);
    });
});

describe('resolveSourceFiles', () => {
    const opts = () => ({cwd: root, logger: silentLogger()});

    it('keeps explicit files in the order given', () => {
        expect(resolveSourceFiles('app', ['util.cpp', 'main.cpp'], opts())).toEqual([
            'util.cpp',
            'main.cpp',
        ]);
    });

    it('filters glob matches to recognised source extensions', () => {
        expect(resolveSourceFiles('app', ['*'], opts())).toEqual([
            'main.cpp',
            'util.cpp',
            'util.h',
        ]);
    });

    it('collects one level of sources from a directory argument', () => {
        expect(resolveSourceFiles('app', ['src'], opts())).toEqual(['src/a.cc', 'src/b.cpp']);
    });

    it('removes duplicates across arguments', () => {
        expect(resolveSourceFiles('app', ['main.cpp', 'main.cpp', '*.cpp'], opts())).toEqual([
            'main.cpp',
            'util.cpp',
        ]);
    });

    it('collects the directory named by the target when no files are given', () => {
        expect(resolveSourceFiles('src', [], opts())).toEqual(['src/a.cc', 'src/b.cpp']);
    });

    it('probes <target>.cpp, .cc, .c, .cxx in order', () => {
        writeFiles(root, {'tool.cc': '', 'tool.c': ''});
        expect(resolveSourceFiles('tool', [], opts())).toEqual(['tool.cc']);
    });

    it('fails when no probe candidate exists', () => {
        expect(() => resolveSourceFiles('ghost', [], opts())).toThrow(
            "No source file found for target 'ghost' (tried .cpp, .cc, .c, .cxx extensions)",
        );
    });

    it('fails for a target directory without sources', () => {
        expect(() => resolveSourceFiles('empty', [], opts())).toThrow(
            "No source files found in directory 'empty'",
        );
    });

    it('warns per missing argument and fails when nothing resolves', () => {
        const logger = silentLogger();
        const warn = vi.spyOn(logger, 'warn');

        let caught: unknown;
        try {
            resolveSourceFiles('app', ['nope.cpp', '*.rs'], {cwd: root, logger});
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(QsError);
        expect(caught instanceof QsError && caught.kind).toBe('resolution');
        expect(warn).toHaveBeenCalledWith("File 'nope.cpp' not found");
        expect(warn).toHaveBeenCalledWith("No files match pattern '*.rs'");
    });

    it('skips misses when other arguments resolve', () => {
        expect(resolveSourceFiles('app', ['nope.cpp', 'main.cpp'], opts())).toEqual(['main.cpp']);
    });
});
