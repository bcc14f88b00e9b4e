// src/index.ts

export * from './schema';

export {
    findTarget,
    upsertTarget,
    upsertSetting,
    ensureSubdirectory,
    ensureLink,
    ensureStandardSettings,
    hasStandardSettings,
    listDeclaredTargets,
    primaryTarget,
    projectName,
    subdirectoryStatement,
    linkStatement,
} from './core/cmake-document';

export {
    addTarget,
    addStandardSettings,
    initProject,
    initSubProject,
    loadDocument,
    documentPath,
    type ProjectOptions,
    type AddTargetOptions,
    type AddTargetResult,
    type StandardSettingsOptions,
    type StandardSettingsResult,
    type InitProjectOptions,
    type InitProjectResult,
    type SubProjectResult,
} from './core/project';

export { expandGlob, resolveSourceFiles, PROBE_EXTENSIONS } from './core/source-resolver';
export {
    buildProject,
    runTarget,
    openDocumentation,
    executablesDir,
    type BuildRunnerOptions,
    type OpenDocsOptions,
} from './core/build-runner';
export { listTargets, formatTargetListing, type TargetListing } from './core/list-targets';
export {
    runCommand,
    spawnInherited,
    browserCommand,
    type ProcessLauncher,
    type LaunchOptions,
} from './core/process-runner';
export { loadQsConfig, resolveQsConfig, findConfigFile } from './core/config-loader';

export { Logger, defaultLogger, parseLogLevel, type LogLevel } from './util/logger';
export { QsError, isQsError, type QsErrorKind } from './util/errors';
export { VERSION } from './version';
