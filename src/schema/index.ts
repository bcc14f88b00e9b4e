// src/schema/index.ts

export * from './config';
export * from './document';

/**
 * Base name of the optional project config file (qs.config.ts, qs.config.mjs, ...).
 */
export const CONFIG_FILE_BASENAME = 'qs.config';
