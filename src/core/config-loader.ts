// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { pathToFileURL } from 'url';
import { transform } from 'esbuild';

import {
   CONFIG_FILE_BASENAME,
   DEFAULT_QS_CONFIG,
   isCxxStandard,
   type QsConfig,
   type ResolvedQsConfig,
} from '../schema';
import { QsError, errorMessage } from '../util/errors';
import { defaultLogger } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

const CONFIG_EXTENSIONS = ['.ts', '.mts', '.mjs', '.js', '.cjs'];

export interface LoadQsConfigOptions {
   /**
    * Optional explicit config file path (absolute or relative to cwd).
    * If not provided, we look for qs.config.* in cwd.
    */
   configPath?: string;
}

export interface LoadQsConfigResult {
   config: ResolvedQsConfig;

   /**
    * Absolute path of the file the config came from, or undefined when
    * defaults were used.
    */
   configPath?: string;
}

/**
 * Locate qs.config.* in `projectRoot`, trying extensions in a fixed order.
 */
export function findConfigFile(projectRoot: string): string | undefined {
   for (const ext of CONFIG_EXTENSIONS) {
      const full = path.join(projectRoot, `${CONFIG_FILE_BASENAME}${ext}`);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return undefined;
}

/**
 * Load project configuration. A missing config file is not an error:
 * every field falls back to DEFAULT_QS_CONFIG.
 */
export async function loadQsConfig(
   cwd: string,
   options: LoadQsConfigOptions = {},
): Promise<LoadQsConfigResult> {
   const absCwd = path.resolve(cwd);
   const configPath = options.configPath
      ? path.resolve(absCwd, options.configPath)
      : findConfigFile(absCwd);

   if (!configPath) {
      logger.debug(`No ${CONFIG_FILE_BASENAME}.* in ${absCwd}, using defaults`);
      return { config: { ...DEFAULT_QS_CONFIG } };
   }

   if (!fs.existsSync(configPath)) {
      throw new QsError('config', `Config file not found: ${configPath}`);
   }

   let raw: unknown;
   try {
      raw = await importConfig(configPath);
   } catch (err) {
      throw new QsError('config', `Failed to load ${configPath}: ${errorMessage(err)}`);
   }

   const config = resolveQsConfig(raw, configPath);
   logger.debug(`Loaded config from ${configPath}`);
   return { config, configPath };
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
   return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Validate a user-supplied config object and merge it over the defaults.
 * `source` only appears in error messages.
 */
export function resolveQsConfig(raw: unknown, source = 'config'): ResolvedQsConfig {
   if (raw === undefined || raw === null) {
      return { ...DEFAULT_QS_CONFIG };
   }
   if (!isRecord(raw)) {
      throw new QsError('config', `${source}: expected an object export`);
   }

   const fail = (field: string, expected: string): never => {
      throw new QsError('config', `${source}: "${field}" must be ${expected}`);
   };

   const config: QsConfig = {};

   for (const [key, value] of Object.entries(raw)) {
      if (value === undefined) continue;
      switch (key) {
         case 'cmakeMinimumVersion':
            if (typeof value !== 'string' || !/^\d+(\.\d+){0,3}$/.test(value)) {
               fail(key, 'a version string such as "3.10"');
            } else {
               config.cmakeMinimumVersion = value;
            }
            break;
         case 'cxxStandard':
            if (typeof value !== 'number' || !isCxxStandard(value)) {
               fail(key, 'one of 11, 14, 17, 20, 23');
            } else {
               config.cxxStandard = value;
            }
            break;
         case 'compilerFlags':
         case 'buildDir':
         case 'docsUrl':
            if (typeof value !== 'string' || value.trim() === '') {
               fail(key, 'a non-empty string');
            } else {
               config[key] = value;
            }
            break;
         case 'cmakeArgs':
            if (!isStringArray(value)) {
               fail(key, 'an array of strings');
            } else {
               config.cmakeArgs = value;
            }
            break;
         case 'buildCommand':
            if (!isStringArray(value) || value.length === 0) {
               fail(key, 'a non-empty array of strings');
            } else {
               config.buildCommand = value;
            }
            break;
         default:
            throw new QsError('config', `${source}: unknown option "${key}"`);
      }
   }

   return { ...DEFAULT_QS_CONFIG, ...config };
}

/**
 * Import the config module from the given path.
 * - For .ts/.mts we transpile with esbuild to ESM and load from a temp file.
 * - For .js/.mjs/.cjs we import directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();

   const url =
      ext === '.ts' || ext === '.mts'
         ? pathToFileURL(await transpileTsConfig(configPath)).href
         : pathToFileURL(configPath).href;

   const mod: unknown = await import(url);
   if (isRecord(mod) && 'default' in mod) {
      return mod.default;
   }
   return mod;
}

/**
 * Transpile a TS config file to ESM with esbuild and return the compiled file.
 * We cache based on (path + mtime) so changes invalidate the temp.
 */
async function transpileTsConfig(configPath: string): Promise<string> {
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = path.join(os.tmpdir(), 'qs-config');
   ensureDirSync(tmpDir);

   const tmpFile = path.join(tmpDir, `${hash}.mjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader: 'ts',
         format: 'esm',
         sourcemap: 'inline',
         target: 'node20',
      });

      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   return tmpFile;
}
