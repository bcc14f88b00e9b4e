// src/core/source-resolver.ts

import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import pluralize from 'pluralize';

import { QsError } from '../util/errors';
import {
   containsGlobChar,
   findSourceFiles,
   isDirSync,
   isFileSync,
   isSourceFile,
   removeDuplicates,
   toPosixPath,
} from '../util/fs-utils';
import { defaultLogger, type Logger } from '../util/logger';

/**
 * Extensions tried, in order, for `qs add <target>` with no files.
 */
export const PROBE_EXTENSIONS = ['.cpp', '.cc', '.c', '.cxx'] as const;

export interface ResolveSourcesOptions {
   cwd: string;
   logger?: Logger;
}

/**
 * Expand a glob pattern against the filesystem.
 *
 * The walk starts at the pattern's longest literal directory prefix and
 * descends only as deep as the pattern has segments (unbounded with "**").
 * Returned paths are relative to `cwd` (or absolute for an absolute
 * pattern), POSIX style, sorted. Only files are returned.
 */
export function expandGlob(pattern: string, cwd: string): string[] {
   const normalized = path.posix.normalize(toPosixPath(pattern));
   const segments = normalized.split('/');

   let literalCount = 0;
   while (
      literalCount < segments.length - 1 &&
      !containsGlobChar(segments[literalCount] ?? '')
   ) {
      literalCount++;
   }

   const literal = segments.slice(0, literalCount);
   const remaining = segments.slice(literalCount);
   const recursive = remaining.includes('**');
   const maxDepth = recursive ? Infinity : remaining.length;

   const baseRel = literal.join('/') || (normalized.startsWith('/') ? '/' : '');
   const baseAbs = path.resolve(cwd, baseRel || '.');

   const matches: string[] = [];

   function walk(dirAbs: string, dirRel: string, depth: number) {
      let dirents: fs.Dirent[];
      try {
         dirents = fs.readdirSync(dirAbs, { withFileTypes: true });
      } catch {
         return;
      }

      for (const dirent of dirents) {
         const rel = dirRel ? path.posix.join(dirRel, dirent.name) : dirent.name;
         const abs = path.join(dirAbs, dirent.name);

         if (dirent.isDirectory()) {
            if (depth < maxDepth) walk(abs, rel, depth + 1);
            continue;
         }

         if ((recursive || depth === maxDepth) && minimatch(rel, normalized)) {
            matches.push(rel);
         }
      }
   }

   walk(baseAbs, baseRel, 1);
   return matches.sort();
}

/**
 * Resolve the source list for `qs add <target> [args...]`.
 *
 * With arguments, each one is tried as a glob, an existing file, then a
 * directory (one level of recognised sources); misses are warnings.
 * Without arguments, `<target>/` is collected if it is a directory,
 * otherwise `<target>.{cpp,cc,c,cxx}` is probed, first match wins.
 *
 * Throws a `resolution` QsError when nothing is left.
 */
export function resolveSourceFiles(
   targetName: string,
   args: string[],
   options: ResolveSourcesOptions,
): string[] {
   const { cwd } = options;
   const logger = options.logger ?? defaultLogger.child('[sources]');
   const collected: string[] = [];

   if (args.length === 0) {
      if (isDirSync(path.resolve(cwd, targetName))) {
         collected.push(...findSourceFiles(targetName, cwd));
         if (collected.length === 0) {
            throw new QsError(
               'resolution',
               `No source files found in directory '${targetName}'`,
            );
         }
      } else {
         const candidate = PROBE_EXTENSIONS.map((ext) => `${targetName}${ext}`).find(
            (file) => isFileSync(path.resolve(cwd, file)),
         );
         if (!candidate) {
            throw new QsError(
               'resolution',
               `No source file found for target '${targetName}' (tried ${PROBE_EXTENSIONS.join(', ')} extensions)`,
            );
         }
         collected.push(candidate);
      }
   } else {
      for (const arg of args) {
         if (containsGlobChar(arg)) {
            const matches = expandGlob(arg, cwd);
            if (matches.length === 0) {
               logger.warn(`No files match pattern '${arg}'`);
               continue;
            }
            const sources = matches.filter(isSourceFile);
            logger.debug(
               `Pattern '${arg}' matched ${pluralize('file', matches.length, true)}, ${sources.length} recognised as sources`,
            );
            collected.push(...sources);
         } else if (isFileSync(path.resolve(cwd, arg))) {
            collected.push(arg);
         } else if (isDirSync(path.resolve(cwd, arg))) {
            collected.push(...findSourceFiles(arg, cwd));
         } else {
            logger.warn(`File '${arg}' not found`);
         }
      }
   }

   const files = removeDuplicates(collected.map(toPosixPath));
   if (files.length === 0) {
      throw new QsError('resolution', 'No source files found for target');
   }
   return files;
}
