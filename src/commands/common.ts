import path from 'node:path';
import type { Command } from 'commander';
import { CliError } from '../types.js';
import { resolveCliSettings, type CliSettings, type GlobalFlags } from '../lib/config.js';
import { createDebugLogger, logStderr } from '../lib/io.js';
import { loadProject, type LoadResult } from '../lib/loader.js';
import type { ProjectModel } from '../lib/model.js';
import { formatFinding } from '../lib/validator.js';

export type CompletedLoad = Exclude<LoadResult, { status: 'cancelled' }>;

export function settingsFor(command: Command): CliSettings {
  return resolveCliSettings(command.optsWithGlobals<GlobalFlags>());
}

export function displayPath(file: string): string {
  return path.relative(process.cwd(), file) || file;
}

/** Loads the configured project file; Ctrl-C cancels the load. */
export async function loadForCli(settings: CliSettings): Promise<CompletedLoad> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const result = await loadProject(settings.file, {
      strict: settings.strict,
      signal: controller.signal,
      readTimeoutMs: settings.readTimeoutMs,
      debug: createDebugLogger(settings.verbose),
    });
    if (result.status === 'cancelled') throw new CliError('load cancelled', 130);
    return result;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/** Commands that need the typed model stop here when validation failed. */
export async function loadModelForCli(settings: CliSettings): Promise<ProjectModel> {
  const result = await loadForCli(settings);
  if (result.status === 'loaded') return result.model;

  const errors = result.report.findings.filter((finding) => finding.severity === 'error');
  for (const finding of errors) logStderr(formatFinding(finding));
  throw new CliError(
    `${displayPath(settings.file)} has ${errors.length} validation error(s); run 'pipedef validate' for details`,
    1,
  );
}
