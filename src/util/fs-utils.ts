// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';
import { QsError, errorMessage } from './errors';

export const SOURCE_EXTENSIONS = ['.cpp', '.c', '.cc', '.cxx'] as const;
export const HEADER_EXTENSIONS = ['.h', '.hpp', '.hxx'] as const;

const RECOGNIZED_EXTENSIONS: ReadonlySet<string> = new Set<string>([
   ...SOURCE_EXTENSIONS,
   ...HEADER_EXTENSIONS,
]);

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * Get file stats if they exist, otherwise null.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * True when the path exists and is not a directory.
 */
export function isFileSync(targetPath: string): boolean {
   const stat = statSafeSync(targetPath);
   return stat !== null && !stat.isDirectory();
}

export function isDirSync(targetPath: string): boolean {
   return statSafeSync(targetPath)?.isDirectory() ?? false;
}

/**
 * Read a file as UTF-8, returning null if it doesn't exist. Any other
 * failure surfaces as a `filesystem` QsError.
 */
export function readFileSafeSync(filePath: string): string | null {
   try {
      return fs.readFileSync(filePath, 'utf8');
   } catch (err) {
      if (isMissingFileError(err)) return null;
      throw new QsError(
         'filesystem',
         `Error reading ${path.basename(filePath)}: ${errorMessage(err)}`,
      );
   }
}

function isMissingFileError(err: unknown): boolean {
   return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Write a UTF-8 file in one call, creating parent directories if needed.
 * Failures surface as a `filesystem` QsError carrying the underlying message.
 */
export function writeFileSafeSync(filePath: string, contents: string): void {
   try {
      ensureDirSync(path.dirname(filePath));
      fs.writeFileSync(filePath, contents, 'utf8');
   } catch (err) {
      throw new QsError(
         'filesystem',
         `Error writing ${path.basename(filePath)}: ${errorMessage(err)}`,
      );
   }
}

/**
 * Whether the file name carries a recognised C/C++ source or header extension.
 */
export function isSourceFile(fileName: string): boolean {
   return RECOGNIZED_EXTENSIONS.has(path.extname(fileName));
}

/**
 * Whether the argument should be treated as a glob pattern.
 */
export function containsGlobChar(pattern: string): boolean {
   return /[*?[]/.test(pattern);
}

/**
 * Collect recognised source files directly inside `dirPath` (one level,
 * no recursion). `dirPath` is resolved against `cwd` for reading; returned
 * paths are `dirPath` joined with the file name, sorted by name.
 */
export function findSourceFiles(dirPath: string, cwd: string = process.cwd()): string[] {
   let dirents: fs.Dirent[];
   try {
      dirents = fs.readdirSync(path.resolve(cwd, dirPath), { withFileTypes: true });
   } catch {
      return [];
   }

   return dirents
      .filter((d) => !d.isDirectory() && isSourceFile(d.name))
      .map((d) => d.name)
      .sort()
      .map((name) => path.join(dirPath, name));
}

/**
 * List regular, non-hidden files in `dirPath` that carry any execute bit.
 */
export function findExecutables(dirPath: string): string[] {
   let dirents: fs.Dirent[];
   try {
      dirents = fs.readdirSync(dirPath, { withFileTypes: true });
   } catch {
      return [];
   }

   const executables: string[] = [];
   for (const dirent of dirents.sort((a, b) => a.name.localeCompare(b.name))) {
      if (dirent.isDirectory() || dirent.name.startsWith('.')) continue;
      const stat = statSafeSync(path.join(dirPath, dirent.name));
      if (stat && (stat.mode & 0o111) !== 0) {
         executables.push(dirent.name);
      }
   }
   return executables;
}

/**
 * Remove duplicates while keeping first-seen order.
 */
export function removeDuplicates(items: string[]): string[] {
   return [...new Set(items)];
}
