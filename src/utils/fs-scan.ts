// Directory scanning primitives: single-directory filename globbing, stat
// lookups that treat a missing entry as "no match", and a pre-order walk.

import fs from 'fs';
import path from 'path';
import { RootError, errnoCode, wrapIo } from '../core/errors';

// Errors that mean "nothing usable here" rather than a failure.
const ABSENT_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM']);

/**
 * Filename glob matcher supporting:
 * - * matches any run of characters
 * - ? matches a single character
 * - [abc], [a-z], [!abc] / [^abc] match one character from a class
 * - \x matches x literally
 */
export function compileFilenamePattern(pattern: string): RegExp {
  let regex = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '*') {
      regex += '.*';
      i++;
    } else if (ch === '?') {
      regex += '.';
      i++;
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        throw new RootError('BadPattern', `unterminated character class in pattern "${pattern}"`, {
          details: { pattern },
        });
      }
      let body = pattern.slice(i + 1, close);
      let negate = false;
      if (body.startsWith('!') || body.startsWith('^')) {
        negate = true;
        body = body.slice(1);
      }
      regex += `[${negate ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
      i = close + 1;
    } else if (ch === '\\' && path.sep !== '\\' && i + 1 < pattern.length) {
      regex += escapeRegex(pattern[i + 1]);
      i += 2;
    } else {
      regex += escapeRegex(ch);
      i++;
    }
  }
  return new RegExp(`^${regex}$`, 's');
}

function escapeRegex(ch: string): string {
  return '.+^${}()|[]\\*?'.includes(ch) ? '\\' + ch : ch;
}

/** Stat a path, returning null when it does not exist or cannot be reached. */
export function statIfPresent(target: string): fs.Stats | null {
  try {
    return fs.statSync(target);
  } catch (err: unknown) {
    if (ABSENT_CODES.has(errnoCode(err) || '')) return null;
    throw wrapIo(err, 'stat', target);
  }
}

export function isFile(target: string): boolean {
  const stats = statIfPresent(target);
  return stats !== null && !stats.isDirectory();
}

export function isDirectory(target: string): boolean {
  const stats = statIfPresent(target);
  return stats !== null && stats.isDirectory();
}

/**
 * Entries of `dir` (not recursive) whose name matches `pattern`, excluding
 * directories. Results are absolute when `dir` is, and sorted.
 */
export function globDir(dir: string, pattern: string): string[] {
  const matcher = compileFilenamePattern(pattern);
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    if (ABSENT_CODES.has(errnoCode(err) || '')) return [];
    throw wrapIo(err, 'readdir', dir);
  }

  const matches: string[] = [];
  for (const entry of entries) {
    if (!matcher.test(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) continue;
    if (entry.isSymbolicLink() && isDirectory(fullPath)) continue;
    matches.push(fullPath);
  }
  return matches.sort();
}

/**
 * Glob a pattern that may span several path segments ("config/*.json"),
 * each segment matched within the directories the previous one produced.
 */
export function globPath(base: string, pattern: string): string[] {
  const segments = pattern.split(/[\\/]+/).filter((s) => s !== '' && s !== '.');
  if (segments.length === 0) return [];

  let dirs = [base];
  for (const segment of segments.slice(0, -1)) {
    const next: string[] = [];
    const matcher = compileFilenamePattern(segment);
    for (const dir of dirs) {
      if (segment === '..') {
        next.push(path.dirname(dir));
        continue;
      }
      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(dir, { withFileTypes: true });
      } catch (err: unknown) {
        if (ABSENT_CODES.has(errnoCode(err) || '')) continue;
        throw wrapIo(err, 'readdir', dir);
      }
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (matcher.test(entry.name) && (entry.isDirectory() || (entry.isSymbolicLink() && isDirectory(fullPath)))) {
          next.push(fullPath);
        }
      }
    }
    dirs = next.sort();
  }

  const last = segments[segments.length - 1];
  return dirs.flatMap((dir) => globDir(dir, last));
}

export interface WalkEntry {
  path: string;
  name: string;
  isDirectory: boolean;
  depth: number;
}

/**
 * Visitor result: 'skip' leaves a directory's contents unvisited (no effect
 * on files), 'stop' ends the walk. Anything thrown aborts it.
 */
export type WalkSignal = 'skip' | 'stop' | void;

export type WalkVisitor = (entry: WalkEntry) => WalkSignal;

/**
 * Pre-order walk of `root` (included) in lexical order. Symbolic links are
 * reported but never followed.
 */
export function walkTree(root: string, visitor: WalkVisitor): void {
  let stats: fs.Stats;
  try {
    stats = fs.lstatSync(root);
  } catch (err: unknown) {
    throw wrapIo(err, 'lstat', root);
  }
  visit({ path: root, name: path.basename(root), isDirectory: stats.isDirectory(), depth: 0 }, visitor);
}

function visit(entry: WalkEntry, visitor: WalkVisitor): boolean {
  const signal = visitor(entry);
  if (signal === 'stop') return false;
  if (!entry.isDirectory || signal === 'skip') return true;

  let children: fs.Dirent[];
  try {
    children = fs.readdirSync(entry.path, { withFileTypes: true });
  } catch (err: unknown) {
    throw wrapIo(err, 'readdir', entry.path);
  }
  children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const child of children) {
    const next: WalkEntry = {
      path: path.join(entry.path, child.name),
      name: child.name,
      isDirectory: child.isDirectory(),
      depth: entry.depth + 1,
    };
    if (!visit(next, visitor)) return false;
  }
  return true;
}
