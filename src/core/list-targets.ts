// src/core/list-targets.ts

import path from 'path';
import { DEFAULT_QS_CONFIG, type DeclaredTargets, type ResolvedQsConfig } from '../schema';
import { findExecutables, isDirSync } from '../util/fs-utils';
import { listDeclaredTargets, projectName } from './cmake-document';
import { executablesDir } from './build-runner';
import { loadDocument } from './project';

export interface TargetListing extends DeclaredTargets {
    projectName?: string;

    /**
     * Executables found in the build output; empty when nothing is built.
     */
    built: string[];
}

export function listTargets(options: {
    cwd: string;
    config?: ResolvedQsConfig;
}): TargetListing {
    const config = options.config ?? DEFAULT_QS_CONFIG;
    const document = loadDocument(options.cwd);
    const declared = listDeclaredTargets(document);

    const built = isDirSync(path.resolve(options.cwd, config.buildDir))
        ? findExecutables(executablesDir(options.cwd, config.buildDir))
        : [];

    return { projectName: projectName(document), ...declared, built };
}

function numbered(items: string[]): string[] {
    return items.map((item, i) => `  ${i + 1}. ${item}`);
}

/**
 * Plain-text report printed by `qs list`.
 */
export function formatTargetListing(listing: TargetListing): string {
    const { executables, libraries, built } = listing;
    const lines: string[] = [];

    if (executables.length === 0 && libraries.length === 0) {
        lines.push('No targets found in CMakeLists.txt.');
    } else {
        lines.push(
            listing.projectName ? `Project targets (${listing.projectName}):` : 'Project targets:',
        );
        if (executables.length) lines.push('', 'Executables:', ...numbered(executables));
        if (libraries.length) lines.push('', 'Libraries:', ...numbered(libraries));
    }

    if (built.length) lines.push('', 'Built executables:', ...numbered(built));

    return lines.join('\n');
}
