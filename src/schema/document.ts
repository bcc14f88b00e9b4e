// src/schema/document.ts

/**
 * File name of the document qs reads and rewrites.
 */
export const DOCUMENT_FILE_NAME = 'CMakeLists.txt';

/**
 * Which CMake command declares the target.
 */
export type TargetKind = 'executable' | 'library';

export const TARGET_COMMANDS: Record<TargetKind, string> = {
    executable: 'add_executable',
    library: 'add_library',
};

/**
 * Result of searching a document for `add_executable(<name>` / `add_library(<name>`.
 */
export interface TargetBlock {
    /**
     * Offset of the declaration's first character.
     */
    start: number;

    /**
     * Offset just past the closing ")".
     */
    end: number;

    /**
     * Raw text between the "(<name>\n" opening and the closing ")".
     */
    entriesText: string;

    /**
     * Entries trimmed of surrounding whitespace, blank lines dropped.
     */
    entries: string[];
}

export interface TargetLookup {
    /**
     * True when some declaration for the name exists, even one the
     * editor cannot parse into a block (e.g. `add_executable(app main.cpp)`).
     */
    declared: boolean;

    /**
     * The first editable block for the name, if any.
     */
    block?: TargetBlock;

    /**
     * Number of declarations sharing the name. Anything above 1 is an
     * ambiguity; only the first block is ever edited.
     */
    matchCount: number;
}

/**
 * Outcome of a pure document edit.
 *
 * - appended: new text was added at the end of the document
 * - merged: an existing target block was rewritten in place
 * - replaced: an existing setting line was rewritten
 * - unchanged: everything requested was already present
 */
export type EditStatus = 'appended' | 'merged' | 'replaced' | 'unchanged';

export interface EditResult {
    document: string;
    status: EditStatus;
}

export interface TargetEditResult extends EditResult {
    /**
     * Paths that were not yet recorded for the target and got written.
     */
    added: string[];

    /**
     * Full ordered entry list of the target after the edit.
     */
    entries: string[];

    matchCount: number;
}

/**
 * A single-line `set(<key> <number>)` statement plus the lines
 * that travel with it when it has to be appended.
 */
export interface SettingSpec {
    key: string;
    value: number;

    /**
     * Comment line written above the appended block ("# C++ Standard").
     */
    comment?: string;

    /**
     * Extra statements appended together with the setting,
     * e.g. `set(CMAKE_CXX_STANDARD_REQUIRED ON)`.
     */
    companions?: string[];
}

/**
 * Targets declared in a document, in order of appearance.
 */
export interface DeclaredTargets {
    executables: string[];
    libraries: string[];
}
