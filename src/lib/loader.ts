import path from 'node:path';
import { CancelledError, throwIfCancelled } from '../types.js';
import { DEFAULT_READ_TIMEOUT_MS, readSourceFile } from './files.js';
import { resolveIncludes } from './includes.js';
import { buildModel, type ProjectModel } from './model.js';
import { assertMappingRoot, parseDocument } from './parser.js';
import type { MappingNode } from './tree.js';
import { validateTree, type ValidationReport } from './validator.js';

export type LoadOptions = {
  strict?: boolean;
  signal?: AbortSignal;
  /** Upper bound for each file read. */
  readTimeoutMs?: number;
  debug?: (message: string) => void;
};

export type LoadResult =
  | { status: 'loaded'; model: ProjectModel; report: ValidationReport; tree: MappingNode; sources: string[] }
  | { status: 'refused'; report: ValidationReport; tree: MappingNode; sources: string[] }
  | { status: 'cancelled' };

/**
 * Reads a project file, merges its includes, validates the result and builds
 * the model.
 *
 * Syntax errors in the root file reject with ParseError, a bad include with
 * IncludeError. Validation errors do not reject: they come back as a
 * `refused` result carrying the full report. Aborting `signal` yields
 * `cancelled` and never a partial model.
 */
export async function loadProject(filePath: string, options: LoadOptions = {}): Promise<LoadResult> {
  const rootPath = path.resolve(filePath);
  const { signal, debug } = options;
  const readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

  try {
    throwIfCancelled(signal);
    debug?.(`reading ${rootPath}`);
    const text = await readSourceFile(rootPath, { signal, timeoutMs: readTimeoutMs });
    const root = assertMappingRoot(parseDocument(text, rootPath), rootPath);

    const { tree, sources } = await resolveIncludes(rootPath, root, { signal, readTimeoutMs, debug });
    throwIfCancelled(signal);

    const report = validateTree(tree, { strict: options.strict });
    debug?.(`validation produced ${report.findings.length} finding(s)`);

    const built = buildModel(tree, report);
    if (built.status === 'refused') return { status: 'refused', report, tree, sources };
    return { status: 'loaded', model: built.model, report, tree, sources };
  } catch (err) {
    if (err instanceof CancelledError) {
      debug?.(`load of ${rootPath} cancelled`);
      return { status: 'cancelled' };
    }
    throw err;
  }
}

export { ProjectModel, buildModel } from './model.js';
export type { BuildResult, Environment, Job, Plugin, PluginSetting, Schedule, Transform } from './model.js';
export { validateTree, hasErrors, formatFinding, PLUGIN_KINDS } from './validator.js';
export type { PluginKind, Severity, ValidationFinding, ValidationReport, ValidateOptions } from './validator.js';
export { parseDocument, serializeTree } from './parser.js';
export { resolveIncludes } from './includes.js';
export { mergeTrees } from './merge.js';
export { resolveSettings, settingEnvVar } from './settings.js';
export { nextRun } from './interval.js';
export { CancelledError, IncludeError, ParseError } from '../types.js';
