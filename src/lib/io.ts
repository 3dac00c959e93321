import { CommanderError } from 'commander';
import { CliError, IncludeError, ParseError, type ErrorPayload } from '../types.js';
import { redactSecrets } from './redact.js';

export function logStdout(message: string) {
  process.stdout.write(message + '\n');
}

export function logStderr(message: string) {
  process.stderr.write(message + '\n');
}

export function emitJson(payload: unknown) {
  logStdout(JSON.stringify(payload));
}

export function createDebugLogger(enabled: boolean): (message: string) => void {
  return (message) => {
    if (enabled) logStderr(`[debug] ${message}`);
  };
}

function report(message: string, code: number, jsonMode: boolean) {
  if (jsonMode) {
    const payload: { error: ErrorPayload } = { error: { message, code } };
    emitJson(payload);
  } else {
    logStderr(message);
  }
}

export function handleError(err: unknown, jsonMode: boolean): number {
  if (err instanceof CliError) {
    if (!err.silent) report(err.message, err.exitCode, jsonMode);
    return err.exitCode;
  }

  if (err instanceof CommanderError) {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') return 0;
    return err.exitCode;
  }

  if (err instanceof ParseError || err instanceof IncludeError) {
    report(redactSecrets(err.message), 1, jsonMode);
    return 1;
  }

  const message = err instanceof Error ? redactSecrets(err.message) : 'Unknown error';
  report(message, 1, jsonMode);
  return 1;
}
