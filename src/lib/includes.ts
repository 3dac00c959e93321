import path from 'node:path';
import { CancelledError, IncludeError, ParseError, throwIfCancelled } from '../types.js';
import { readSourceFile } from './files.js';
import { expandGlob } from './glob.js';
import { mergeTrees } from './merge.js';
import { assertMappingRoot, parseDocument } from './parser.js';
import { getSequence, type MappingNode } from './tree.js';

export const INCLUDE_PATHS_KEY = 'include_paths';

export type IncludeOptions = {
  signal?: AbortSignal;
  readTimeoutMs?: number;
  debug?: (message: string) => void;
};

export type MergedTree = {
  tree: MappingNode;
  /** Root document first, then every included file in merge order. */
  sources: string[];
};

export function includePatterns(tree: MappingNode): string[] {
  const patterns: string[] = [];
  for (const item of getSequence(tree, INCLUDE_PATHS_KEY)) {
    if (item.kind === 'scalar' && typeof item.value === 'string') patterns.push(item.value);
  }
  return patterns;
}

/**
 * Expands every pattern in declared order. Matches are sorted within a
 * pattern, never across patterns; a file matched twice keeps its first
 * position and the base document is never included.
 */
export async function expandIncludePatterns(
  baseDocPath: string,
  patterns: readonly string[],
  signal?: AbortSignal,
): Promise<string[]> {
  const basePath = path.resolve(baseDocPath);
  const baseDir = path.dirname(basePath);
  const seen = new Set<string>([basePath]);
  const ordered: string[] = [];

  for (const pattern of patterns) {
    throwIfCancelled(signal);
    for (const match of await expandGlob(baseDir, pattern)) {
      if (seen.has(match)) continue;
      seen.add(match);
      ordered.push(match);
    }
  }
  return ordered;
}

async function loadInclude(filePath: string, options: IncludeOptions): Promise<MappingNode> {
  let text: string;
  try {
    text = await readSourceFile(filePath, { signal: options.signal, timeoutMs: options.readTimeoutMs });
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    throw new IncludeError(filePath, err);
  }

  try {
    return assertMappingRoot(parseDocument(text, filePath), filePath);
  } catch (err) {
    if (err instanceof ParseError) throw new IncludeError(filePath, err);
    throw err;
  }
}

/**
 * Pulls every file matched by `include_paths` into the base document.
 *
 * Files are read concurrently and merged in resolution order. Only the root
 * document's `include_paths` are followed.
 */
export async function resolveIncludes(
  baseDocPath: string,
  baseTree: MappingNode,
  options: IncludeOptions = {},
): Promise<MergedTree> {
  const basePath = path.resolve(baseDocPath);
  const files = await expandIncludePatterns(basePath, includePatterns(baseTree), options.signal);
  options.debug?.(`resolved ${files.length} include file(s) for ${basePath}`);

  throwIfCancelled(options.signal);
  const documents = await Promise.all(files.map((file) => loadInclude(file, options)));
  throwIfCancelled(options.signal);

  let tree = baseTree;
  documents.forEach((doc, idx) => {
    options.debug?.(`merging ${files[idx]}`);
    tree = mergeTrees(tree, doc);
  });

  return { tree, sources: [basePath, ...files] };
}
