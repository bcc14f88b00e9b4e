// test/config-loader.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {findConfigFile, loadQsConfig, resolveQsConfig} from '../src/core/config-loader';
import {DEFAULT_QS_CONFIG, parseCxxStandard} from '../src/schema';
import {parseLogLevel} from '../src/util/logger';
import {makeTempDir, writeFiles} from './helpers';

let root: string;

beforeEach(() => {
    root = makeTempDir('qs-config-');
});

afterEach(() => {
    fs.rmSync(root, {recursive: true, force: true});
});

describe('resolveQsConfig', () => {
    it('returns defaults for a missing export', () => {
        expect(resolveQsConfig(undefined)).toEqual(DEFAULT_QS_CONFIG);
    });

    it('merges user values over defaults', () => {
        const config = resolveQsConfig({cxxStandard: 17, buildDir: 'out', cmakeArgs: ['-GNinja']});

        expect(config).toEqual({
            ...DEFAULT_QS_CONFIG,
            cxxStandard: 17,
            buildDir: 'out',
            cmakeArgs: ['-GNinja'],
        });
    });

    it('rejects an unsupported standard', () => {
        expect(() => resolveQsConfig({cxxStandard: 15}, 'qs.config.ts')).toThrow(
            'qs.config.ts: "cxxStandard" must be one of 11, 14, 17, 20, 23',
        );
    });

    it('rejects an empty build command', () => {
        expect(() => resolveQsConfig({buildCommand: []})).toThrow(
            'config: "buildCommand" must be a non-empty array of strings',
        );
    });

    it('rejects unknown options', () => {
        expect(() => resolveQsConfig({generator: 'Ninja'})).toThrow('config: unknown option "generator"');
    });

    it('rejects a non-object export', () => {
        expect(() => resolveQsConfig('17')).toThrow('config: expected an object export');
    });
});

describe('findConfigFile / loadQsConfig', () => {
    it('finds nothing in an empty project', () => {
        expect(findConfigFile(root)).toBeUndefined();
    });

    it('prefers qs.config.ts over other extensions', () => {
        writeFiles(root, {'qs.config.mjs': 'export default {};\n', 'qs.config.ts': 'export default {};\n'});
        expect(findConfigFile(root)).toBe(path.join(root, 'qs.config.ts'));
    });

    it('uses defaults when there is no config file', async () => {
        const result = await loadQsConfig(root);

        expect(result.config).toEqual(DEFAULT_QS_CONFIG);
        expect(result.configPath).toBeUndefined();
    });

    it('loads a TypeScript config file', async () => {
        writeFiles(root, {
            'qs.config.ts': [
                "const buildDir: string = 'out';",
                'export default {buildDir, cxxStandard: 17};',
                '',
            ].join('\n'),
        });

        const result = await loadQsConfig(root);

        expect(result.configPath).toBe(path.join(root, 'qs.config.ts'));
        expect(result.config).toEqual({...DEFAULT_QS_CONFIG, buildDir: 'out', cxxStandard: 17});
    });

    it('loads an explicit .mjs config file', async () => {
        writeFiles(root, {'custom.config.mjs': "export default {buildCommand: ['ninja']};\n"});

        const result = await loadQsConfig(root, {configPath: 'custom.config.mjs'});
        expect(result.config.buildCommand).toEqual(['ninja']);
    });

    it('rejects invalid fields read from a config file', async () => {
        const file = path.join(root, 'qs.config.mjs');
        writeFiles(root, {'qs.config.mjs': 'export default {cxxStandard: 15};\n'});

        await expect(loadQsConfig(root)).rejects.toThrow(
            `${file}: "cxxStandard" must be one of 11, 14, 17, 20, 23`,
        );
    });

    it('fails for an explicit path that does not exist', async () => {
        await expect(loadQsConfig(root, {configPath: 'custom.config.mjs'})).rejects.toThrow(
            `Config file not found: ${path.join(root, 'custom.config.mjs')}`,
        );
    });
});

describe('parseCxxStandard', () => {
    it('accepts supported standards written as plain digits', () => {
        expect(parseCxxStandard('17')).toBe(17);
        expect(parseCxxStandard('23')).toBe(23);
    });

    it('rejects trailing garbage and unsupported values', () => {
        expect(parseCxxStandard('17abc')).toBeUndefined();
        expect(parseCxxStandard('1.7e1')).toBeUndefined();
        expect(parseCxxStandard('15')).toBeUndefined();
        expect(parseCxxStandard('')).toBeUndefined();
    });
});

describe('parseLogLevel', () => {
    it('accepts known levels case-insensitively', () => {
        expect(parseLogLevel('DEBUG')).toBe('debug');
        expect(parseLogLevel(' warn ')).toBe('warn');
    });

    it('ignores unknown or empty values', () => {
        expect(parseLogLevel('verbose')).toBeUndefined();
        expect(parseLogLevel(undefined)).toBeUndefined();
    });
});
