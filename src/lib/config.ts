import path from 'node:path';
import { CliError } from '../types.js';
import { DEFAULT_READ_TIMEOUT_MS } from './files.js';

export const DEFAULT_PROJECT_FILE = 'pipedef.yml';

export type GlobalFlags = {
  json?: boolean;
  verbose?: boolean;
  strict?: boolean;
  file?: string;
};

export type CliSettings = {
  file: string;
  json: boolean;
  verbose: boolean;
  strict: boolean;
  readTimeoutMs: number;
};

type Env = Readonly<Record<string, string | undefined>>;

function envFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_READ_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new CliError(`PIPEDEF_READ_TIMEOUT_MS must be a positive integer, got '${raw}'`, 2);
  }
  return value;
}

/** Command-line flags win over PIPEDEF_* environment variables. */
export function resolveCliSettings(flags: GlobalFlags, env: Env = process.env): CliSettings {
  return {
    file: path.resolve(flags.file ?? env.PIPEDEF_FILE ?? DEFAULT_PROJECT_FILE),
    json: Boolean(flags.json),
    verbose: Boolean(flags.verbose) || envFlag(env.PIPEDEF_DEBUG),
    strict: Boolean(flags.strict) || envFlag(env.PIPEDEF_STRICT),
    readTimeoutMs: parseTimeout(env.PIPEDEF_READ_TIMEOUT_MS),
  };
}
