import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { minimatch } from 'minimatch';

const MAGIC = /[*?[\]{}]/;
const GLOBSTAR = '**';

type EntryKind = 'file' | 'directory' | 'other';

export function hasMagic(segment: string): boolean {
  return MAGIC.test(segment);
}

export function compareLexical(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Splits a pattern into path segments, dropping `.` and empty segments so
 * that `./a//b` and `a/b` walk the same way.
 */
export function splitPattern(pattern: string): string[] {
  return pattern
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.');
}

function isMissing(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

async function listDir(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
}

async function kindOf(target: string): Promise<EntryKind> {
  try {
    const info = await stat(target);
    if (info.isFile()) return 'file';
    if (info.isDirectory()) return 'directory';
    return 'other';
  } catch (err) {
    if (isMissing(err)) return 'other';
    throw err;
  }
}

async function direntKind(dir: string, entry: Dirent): Promise<EntryKind> {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (entry.isSymbolicLink()) return kindOf(path.join(dir, entry.name));
  return 'other';
}

function matchSegment(name: string, segment: string): boolean {
  return minimatch(name, segment, { dot: false });
}

async function walk(dir: string, segments: readonly string[], index: number, out: Set<string>): Promise<void> {
  const segment = segments[index];
  if (segment === undefined) return;
  const last = index === segments.length - 1;

  if (segment === GLOBSTAR) {
    if (last) {
      await collectFiles(dir, out);
      return;
    }
    // zero levels, then one more level per real (non-hidden) subdirectory
    await walk(dir, segments, index + 1, out);
    for (const entry of await listDir(dir)) {
      if (entry.isDirectory() && !entry.name.startsWith('.')) {
        await walk(path.join(dir, entry.name), segments, index, out);
      }
    }
    return;
  }

  if (!hasMagic(segment)) {
    const target = path.join(dir, segment);
    const kind = await kindOf(target);
    if (last && kind === 'file') out.add(target);
    if (!last && kind === 'directory') await walk(target, segments, index + 1, out);
    return;
  }

  for (const entry of await listDir(dir)) {
    if (!matchSegment(entry.name, segment)) continue;
    const target = path.join(dir, entry.name);
    const kind = await direntKind(dir, entry);
    if (last && kind === 'file') out.add(target);
    if (!last && kind === 'directory') await walk(target, segments, index + 1, out);
  }
}

async function collectFiles(dir: string, out: Set<string>): Promise<void> {
  for (const entry of await listDir(dir)) {
    if (entry.name.startsWith('.')) continue;
    const target = path.join(dir, entry.name);
    if (entry.isDirectory()) await collectFiles(target, out);
    else if ((await direntKind(dir, entry)) === 'file') out.add(target);
  }
}

/**
 * Expands a shell-style pattern against `rootDir` and returns the absolute
 * paths of matching regular files in lexical order.
 *
 * `*`, `?`, classes like `[0-9]` and braces match within one path segment;
 * `**` matches zero or more directory levels. Hidden entries only match a
 * segment that spells out the leading dot. A missing directory yields no
 * matches.
 */
export async function expandGlob(rootDir: string, pattern: string): Promise<string[]> {
  const base = path.isAbsolute(pattern) ? path.parse(pattern).root : path.resolve(rootDir);
  const segments = splitPattern(path.isAbsolute(pattern) ? pattern.slice(base.length) : pattern);
  if (segments.length === 0) return [];

  const out = new Set<string>();
  await walk(base, segments, 0, out);
  return [...out].sort(compareLexical);
}
