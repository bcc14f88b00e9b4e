// src/core/cmake-document.ts

import {
    TARGET_COMMANDS,
    type DeclaredTargets,
    type EditResult,
    type SettingSpec,
    type TargetBlock,
    type TargetEditResult,
    type TargetKind,
    type TargetLookup,
} from '../schema';
import { QsError } from '../util/errors';
import { removeDuplicates, toPosixPath } from '../util/fs-utils';
import {
    STANDARD_SETTING_MARKERS,
    renderStandardSettingsBlock,
} from './templates';

/**
 * Pure text edits over a CMakeLists.txt document.
 *
 * Nothing here touches the filesystem: every function takes the whole
 * document and returns the whole new document. Declarations are found by
 * pattern, so only the shapes this tool writes itself are reliably
 * recognised; anything else falls back to appending. Inserted text uses the
 * document's own line ending (CRLF when it has any).
 */

const ENTRY_INDENT = '    ';

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function lineEnding(document: string): string {
    return document.includes('\r\n') ? '\r\n' : '\n';
}

function withLineEnding(text: string, eol: string): string {
    return eol === '\n' ? text : text.replace(/\r?\n/g, eol);
}

/**
 * Find the declaration of `name` (exact name, not a prefix of a longer one).
 */
export function findTarget(
    document: string,
    name: string,
    kind: TargetKind = 'executable',
): TargetLookup {
    const command = TARGET_COMMANDS[kind];
    const quoted = escapeRegExp(name);

    const declaration = `${command}\\(${quoted}[\\s)]`;
    const matchCount = document.match(new RegExp(declaration, 'g'))?.length ?? 0;
    const first = new RegExp(declaration).exec(document);

    if (!first) {
        return { declared: false, matchCount };
    }

    // Only the first declaration is edited. Its block runs from "(<name>" and
    // a line break to the first ")"; entries never contain one.
    const blockRe = new RegExp(`${command}\\(${quoted}[ \\t]*\\r?\\n([^)]*)\\)`, 'y');
    blockRe.lastIndex = first.index;
    const match = blockRe.exec(document);
    if (!match) {
        return { declared: true, matchCount };
    }

    const entriesText = match[1] ?? '';
    const block: TargetBlock = {
        start: match.index,
        end: match.index + match[0].length,
        entriesText,
        entries: entriesText
            .split(/\r?\n/)
            .map((line) => line.trim())
            .filter((line) => line !== ''),
    };

    return { declared: true, block, matchCount };
}

function renderTargetBlock(
    command: string,
    name: string,
    entries: string[],
    eol: string,
): string {
    const body = entries.map((e) => `${ENTRY_INDENT}${e}`).join(eol);
    return `${command}(${name}${eol}${body}${eol})`;
}

/**
 * Merge `files` into the target's declaration, or append a new declaration
 * when none can be found.
 *
 * Existing entries keep their order; new paths follow in the order given.
 * Comparison is by exact string after converting backslashes to slashes.
 * A name already declared with the other command is a `precondition` error:
 * a document never gets two targets of the same name.
 */
export function upsertTarget(
    document: string,
    name: string,
    files: string[],
    kind: TargetKind = 'executable',
): TargetEditResult {
    const command = TARGET_COMMANDS[kind];
    const otherKind: TargetKind = kind === 'executable' ? 'library' : 'executable';
    if (findTarget(document, name, otherKind).declared) {
        throw new QsError(
            'precondition',
            `Target '${name}' is already declared with ${TARGET_COMMANDS[otherKind]}`,
        );
    }

    const eol = lineEnding(document);
    const wanted = removeDuplicates(files.map(toPosixPath));
    const lookup = findTarget(document, name, kind);

    if (lookup.block) {
        const { block } = lookup;
        const entries = [...block.entries];
        const seen = new Set(entries.map(toPosixPath));
        const added: string[] = [];

        for (const file of wanted) {
            if (seen.has(file)) continue;
            seen.add(file);
            entries.push(file);
            added.push(file);
        }

        if (added.length === 0) {
            return {
                document,
                status: 'unchanged',
                added,
                entries,
                matchCount: lookup.matchCount,
            };
        }

        const next =
            document.slice(0, block.start) +
            renderTargetBlock(command, name, entries, eol) +
            document.slice(block.end);

        return {
            document: next,
            status: 'merged',
            added,
            entries,
            matchCount: lookup.matchCount,
        };
    }

    if (wanted.length === 0) {
        return {
            document,
            status: 'unchanged',
            added: [],
            entries: [],
            matchCount: lookup.matchCount,
        };
    }

    return {
        document: `${document}${eol}${renderTargetBlock(command, name, wanted, eol)}${eol}`,
        status: 'appended',
        added: wanted,
        entries: wanted,
        matchCount: lookup.matchCount,
    };
}

/**
 * Replace the first `set(<key> <number>)` with the new value, or append the
 * setting (with its comment and companions) at the end of the document.
 */
export function upsertSetting(document: string, setting: SettingSpec): EditResult {
    const statement = `set(${setting.key} ${setting.value})`;
    const re = new RegExp(`set\\(${escapeRegExp(setting.key)}\\s+\\d+\\)`);
    const match = re.exec(document);

    if (match) {
        if (match[0] === statement) {
            return { document, status: 'unchanged' };
        }
        const next =
            document.slice(0, match.index) +
            statement +
            document.slice(match.index + match[0].length);
        return { document: next, status: 'replaced' };
    }

    const eol = lineEnding(document);
    const lines = [
        ...(setting.comment ? [`# ${setting.comment}`] : []),
        statement,
        ...(setting.companions ?? []),
    ];

    return {
        document: `${document}${eol}${lines.join(eol)}${eol}`,
        status: 'appended',
    };
}

/**
 * Append `statement` (under a comment) unless the exact text is already present.
 */
function ensureStatement(document: string, statement: string, comment: string): EditResult {
    if (document.includes(statement)) {
        return { document, status: 'unchanged' };
    }
    const eol = lineEnding(document);
    return {
        document: `${document}${eol}# ${comment}${eol}${statement}${eol}`,
        status: 'appended',
    };
}

export function subdirectoryStatement(child: string): string {
    return `add_subdirectory(${child})`;
}

export function linkStatement(parent: string, child: string): string {
    return `target_link_libraries(${parent} PRIVATE ${child})`;
}

export function ensureSubdirectory(document: string, child: string): EditResult {
    return ensureStatement(document, subdirectoryStatement(child), `Sub-project: ${child}`);
}

export function ensureLink(document: string, parent: string, child: string): EditResult {
    return ensureStatement(
        document,
        linkStatement(parent, child),
        `Link ${child} into ${parent}`,
    );
}

export function hasStandardSettings(document: string): boolean {
    return STANDARD_SETTING_MARKERS.some((marker) => document.includes(marker));
}

/**
 * Append the output-directory / include / testing / install bundle unless
 * any of its marker settings is already present.
 */
export function ensureStandardSettings(document: string, compilerFlags: string): EditResult {
    if (hasStandardSettings(document)) {
        return { document, status: 'unchanged' };
    }

    const { executables } = listDeclaredTargets(document);
    return {
        document:
            document +
            withLineEnding(
                renderStandardSettingsBlock(compilerFlags, executables),
                lineEnding(document),
            ),
        status: 'appended',
    };
}

function collectNames(document: string, command: string): string[] {
    const re = new RegExp(`${command}\\(([^):\\s]+)`, 'g');
    return Array.from(document.matchAll(re), (m) => m[1] ?? '').filter(Boolean);
}

export function listDeclaredTargets(document: string): DeclaredTargets {
    return {
        executables: collectNames(document, TARGET_COMMANDS.executable),
        libraries: collectNames(document, TARGET_COMMANDS.library),
    };
}

/**
 * The target sub-projects get linked into: the first declared executable.
 */
export function primaryTarget(document: string): string | undefined {
    return listDeclaredTargets(document).executables[0];
}

/**
 * Name from `project(<name>)`, if present.
 */
export function projectName(document: string): string | undefined {
    return /project\(\s*([^)\s]+)/.exec(document)?.[1];
}
