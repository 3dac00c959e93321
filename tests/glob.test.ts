import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { expandGlob, splitPattern } from '../src/lib/glob.js';
import { cleanupProjects, makeProject } from './helpers.js';

describe('expandGlob', () => {
  let dir: string;
  const rel = (files: string[]) => files.map((file) => path.relative(dir, file).split(path.sep).join('/'));

  beforeEach(async () => {
    dir = await makeProject({
      'top.yml': 'a: 1\n',
      'x9.yaml': 'a: 1\n',
      'a/x1.yml': 'a: 1\n',
      'a/x2.yml': 'a: 1\n',
      'a/b/x3.yml': 'a: 1\n',
      'a/b/c/x4.yml': 'a: 1\n',
      'a/.hidden/x5.yml': 'a: 1\n',
    });
  });

  afterEach(async () => {
    await cleanupProjects();
  });

  it('keeps * within one directory', async () => {
    expect(rel(await expandGlob(dir, '*.yml'))).toEqual(['top.yml']);
  });

  it('matches character classes', async () => {
    expect(rel(await expandGlob(dir, './a/x[0-9].yml'))).toEqual(['a/x1.yml', 'a/x2.yml']);
  });

  it('lets ** match zero or more levels and skips hidden directories', async () => {
    expect(rel(await expandGlob(dir, '**/x[0-9].yml'))).toEqual(['a/b/c/x4.yml', 'a/b/x3.yml', 'a/x1.yml', 'a/x2.yml']);
    expect(rel(await expandGlob(dir, 'a/**/x3.yml'))).toEqual(['a/b/x3.yml']);
  });

  it('collects every file under a trailing **', async () => {
    expect(rel(await expandGlob(dir, 'a/**'))).toEqual(['a/b/c/x4.yml', 'a/b/x3.yml', 'a/x1.yml', 'a/x2.yml']);
  });

  it('only returns files', async () => {
    expect(rel(await expandGlob(dir, 'a/*'))).toEqual(['a/x1.yml', 'a/x2.yml']);
    expect(rel(await expandGlob(dir, 'a/*/x3.yml'))).toEqual(['a/b/x3.yml']);
  });

  it('matches hidden entries when the segment names them', async () => {
    expect(rel(await expandGlob(dir, 'a/.hidden/*.yml'))).toEqual(['a/.hidden/x5.yml']);
  });

  it('resolves literal paths and yields nothing for missing directories', async () => {
    expect(rel(await expandGlob(dir, 'a/x1.yml'))).toEqual(['a/x1.yml']);
    expect(await expandGlob(dir, 'missing/*.yml')).toEqual([]);
    expect(await expandGlob(dir, 'top.yml/*.yml')).toEqual([]);
  });

  it('accepts absolute patterns', async () => {
    expect(rel(await expandGlob('/unused', path.join(dir, 'a', 'b', '*.yml')))).toEqual(['a/b/x3.yml']);
  });
});

describe('splitPattern', () => {
  it('drops dot and empty segments', () => {
    expect(splitPattern('./a//b/./c.yml')).toEqual(['a', 'b', 'c.yml']);
  });
});
