// src/core/project.ts

import os from 'os';
import path from 'path';
import pluralize from 'pluralize';

import {
    DEFAULT_QS_CONFIG,
    DOCUMENT_FILE_NAME,
    type CxxStandard,
    type EditStatus,
    type ResolvedQsConfig,
    type TargetKind,
} from '../schema';
import { QsError } from '../util/errors';
import {
    ensureDirSync,
    isDirSync,
    isFileSync,
    readFileSafeSync,
    writeFileSafeSync,
} from '../util/fs-utils';
import { defaultLogger, type Logger } from '../util/logger';
import {
    ensureLink,
    ensureStandardSettings,
    ensureSubdirectory,
    primaryTarget,
    upsertSetting,
    upsertTarget,
} from './cmake-document';
import { resolveSourceFiles } from './source-resolver';
import {
    CXX_STANDARD_REQUIRED_STATEMENT,
    STARTER_MAIN_SOURCE,
    STARTER_SOURCE_PATH,
    renderRootDocument,
    renderSubProjectDocument,
    renderSubProjectHeader,
    renderSubProjectSource,
    subProjectHeaderPath,
    subProjectSourcePath,
} from './templates';

export interface ProjectOptions {
    /**
     * Project root holding CMakeLists.txt.
     */
    cwd: string;

    /**
     * Resolved qs.config; defaults when omitted.
     */
    config?: ResolvedQsConfig;

    logger?: Logger;
}

export function documentPath(cwd: string): string {
    return path.join(cwd, DOCUMENT_FILE_NAME);
}

/**
 * Read the project's CMakeLists.txt or fail with a `precondition` error.
 */
export function loadDocument(cwd: string): string {
    const text = readFileSafeSync(documentPath(cwd));
    if (text === null) {
        throw new QsError(
            'precondition',
            `${DOCUMENT_FILE_NAME} not found. Run 'qs init' first.`,
        );
    }
    return text;
}

function saveDocument(cwd: string, document: string): void {
    writeFileSafeSync(documentPath(cwd), document);
}

// ---------------------------------------------------------------------------
// qs add
// ---------------------------------------------------------------------------

export interface AddTargetOptions extends ProjectOptions {
    kind?: TargetKind;
}

export interface AddTargetResult {
    status: EditStatus;
    files: string[];
    added: string[];
    entries: string[];
}

/**
 * Resolve sources for the target and merge them into its declaration,
 * appending a new declaration when none exists.
 */
export function addTarget(
    targetName: string,
    args: string[],
    options: AddTargetOptions,
): AddTargetResult {
    const logger = options.logger ?? defaultLogger.child('[add]');
    const kind = options.kind ?? 'executable';

    if (!targetName.trim()) {
        throw new QsError('precondition', 'Target name must not be empty');
    }

    const document = loadDocument(options.cwd);
    const files = resolveSourceFiles(targetName, args, { cwd: options.cwd, logger });
    const result = upsertTarget(document, targetName, files, kind);

    if (result.matchCount > 1) {
        logger.warn(
            `Found ${result.matchCount} declarations of '${targetName}'; only the first is updated`,
        );
    }
    if (result.status === 'appended' && result.matchCount > 0) {
        logger.warn(
            `Existing declaration of '${targetName}' is not in a recognised shape; appending a new one`,
        );
    }

    if (result.status !== 'unchanged') {
        saveDocument(options.cwd, result.document);
    }

    switch (result.status) {
        case 'merged':
            logger.success(
                `Updated existing target '${targetName}' with ${pluralize('additional source file', result.added.length, true)}`,
            );
            break;
        case 'appended':
            logger.success(
                `Added ${kind} target '${targetName}' with ${pluralize('source file', result.added.length, true)}`,
            );
            break;
        default:
            logger.info(`Target '${targetName}' already lists every requested source file`);
    }

    return {
        status: result.status,
        files,
        added: result.added,
        entries: result.entries,
    };
}

// ---------------------------------------------------------------------------
// qs std
// ---------------------------------------------------------------------------

export interface StandardSettingsOptions extends ProjectOptions {
    /**
     * C++ standard to set; when omitted the existing setting is left alone.
     */
    standard?: CxxStandard;
}

export interface StandardSettingsResult {
    standard?: EditStatus;
    bundle: EditStatus;
}

/**
 * Upsert the C++ standard (when given), then append the standard settings
 * bundle unless any of its markers is already present.
 */
export function addStandardSettings(options: StandardSettingsOptions): StandardSettingsResult {
    const logger = options.logger ?? defaultLogger.child('[std]');
    const config = options.config ?? DEFAULT_QS_CONFIG;

    let document = loadDocument(options.cwd);
    const before = document;
    let standardStatus: EditStatus | undefined;

    if (options.standard !== undefined) {
        const edit = upsertSetting(document, {
            key: 'CMAKE_CXX_STANDARD',
            value: options.standard,
            comment: 'C++ Standard',
            companions: [CXX_STANDARD_REQUIRED_STATEMENT],
        });
        document = edit.document;
        standardStatus = edit.status;

        const label = `C++${options.standard}`;
        if (edit.status === 'replaced') logger.success(`Updated C++ standard to ${label}`);
        else if (edit.status === 'appended') logger.success(`Set C++ standard to ${label}`);
        else logger.info(`C++ standard already set to ${label}`);
    }

    const bundle = ensureStandardSettings(document, config.compilerFlags);
    document = bundle.document;

    if (bundle.status === 'unchanged') {
        logger.info('Standard CMake configuration already present');
    } else {
        logger.success('Added standard CMake configuration');
    }

    if (document !== before) {
        saveDocument(options.cwd, document);
    }

    return { standard: standardStatus, bundle: bundle.status };
}

// ---------------------------------------------------------------------------
// qs init
// ---------------------------------------------------------------------------

export interface InitProjectOptions extends ProjectOptions {
    /**
     * Directory `qs init` refuses to initialize. Default: os.homedir().
     */
    homeDir?: string;
}

export interface InitProjectResult {
    projectName: string;
    documentPath: string;
    starterCreated: boolean;
    target: AddTargetResult;
}

/**
 * Write the skeleton CMakeLists.txt and a starter source, then add the
 * first executable target named after the directory.
 */
export function initProject(options: InitProjectOptions): InitProjectResult {
    const logger = options.logger ?? defaultLogger.child('[init]');
    const config = options.config ?? DEFAULT_QS_CONFIG;
    const cwd = path.resolve(options.cwd);
    const homeDir = path.resolve(options.homeDir ?? os.homedir());

    if (cwd === homeDir) {
        throw new QsError(
            'precondition',
            'Cannot initialize a CMake project in your home directory.',
            ["Please create a new directory for your project and run 'qs init' there."],
        );
    }

    const docPath = documentPath(cwd);
    if (isFileSync(docPath)) {
        throw new QsError(
            'precondition',
            `${DOCUMENT_FILE_NAME} already exists. Run 'qs add' to add targets.`,
        );
    }

    const projectName = path.basename(cwd);
    saveDocument(cwd, renderRootDocument(projectName, config));
    logger.success(`Initialized CMake project '${projectName}'`);

    const starterPath = path.join(cwd, STARTER_SOURCE_PATH);
    let starterCreated = false;
    if (isFileSync(starterPath)) {
        logger.info(`Keeping existing ${STARTER_SOURCE_PATH}`);
    } else {
        writeFileSafeSync(starterPath, STARTER_MAIN_SOURCE);
        starterCreated = true;
        logger.info(`Created ${STARTER_SOURCE_PATH}`);
    }

    const target = addTarget(projectName, [STARTER_SOURCE_PATH], {
        cwd,
        config,
        logger,
    });

    return { projectName, documentPath: docPath, starterCreated, target };
}

// ---------------------------------------------------------------------------
// qs init sub <name>
// ---------------------------------------------------------------------------

export interface SubProjectResult {
    dir: string;
    createdFiles: string[];
    subdirectory: EditStatus;
    link: EditStatus | 'skipped';
}

const SUB_PROJECT_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.+-]*$/;

/**
 * Create `<name>/` as a library sub-project and wire it into the parent:
 * `add_subdirectory(<name>)` plus a link from the parent's first executable.
 * Existing files are never overwritten and both parent edits are idempotent.
 */
export function initSubProject(name: string, options: ProjectOptions): SubProjectResult {
    const logger = options.logger ?? defaultLogger.child('[init:sub]');
    const config = options.config ?? DEFAULT_QS_CONFIG;
    const subName = name.trim();

    if (!subName) {
        throw new QsError('precondition', "'init sub' requires a subdirectory name");
    }
    // Doubles as a CMake target name; rules out path separators and "."/"..".
    if (!SUB_PROJECT_NAME.test(subName)) {
        throw new QsError(
            'precondition',
            `Sub-project name '${subName}' must be a plain directory name`,
        );
    }

    let document = loadDocument(options.cwd);

    const dir = path.join(options.cwd, subName);
    if (isFileSync(dir)) {
        throw new QsError('precondition', `'${subName}' exists and is not a directory`);
    }
    if (!isDirSync(dir)) {
        logger.info(`Creating sub-project directory '${subName}'`);
    }
    ensureDirSync(path.join(dir, 'include'));
    ensureDirSync(path.join(dir, 'src'));

    const files: Array<[string, string]> = [
        [DOCUMENT_FILE_NAME, renderSubProjectDocument(subName, config)],
        [subProjectHeaderPath(subName), renderSubProjectHeader(subName)],
        [subProjectSourcePath(subName), renderSubProjectSource(subName)],
    ];

    const createdFiles: string[] = [];
    for (const [rel, contents] of files) {
        const abs = path.join(dir, rel);
        if (isFileSync(abs)) {
            logger.debug(`Keeping existing ${subName}/${rel}`);
            continue;
        }
        writeFileSafeSync(abs, contents);
        createdFiles.push(`${subName}/${rel}`);
    }

    const before = document;

    const subdirectory = ensureSubdirectory(document, subName);
    document = subdirectory.document;
    if (subdirectory.status === 'unchanged') {
        logger.info(`Sub-project '${subName}' is already included`);
    }

    let link: EditStatus | 'skipped' = 'skipped';
    const parentTarget = primaryTarget(document);
    if (!parentTarget) {
        logger.warn(`No executable target found to link '${subName}' into`);
    } else if (parentTarget === subName) {
        logger.warn(`Primary target has the same name as '${subName}'; not linking`);
    } else {
        const edit = ensureLink(document, parentTarget, subName);
        document = edit.document;
        link = edit.status;
        if (edit.status === 'unchanged') {
            logger.info(`'${parentTarget}' already links '${subName}'`);
        }
    }

    if (document !== before) {
        saveDocument(options.cwd, document);
    }

    logger.success(
        `Initialized sub-project '${subName}' (${pluralize('new file', createdFiles.length, true)})`,
    );

    return { dir, createdFiles, subdirectory: subdirectory.status, link };
}
