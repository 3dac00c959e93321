import { readFile } from 'node:fs/promises';
import { CancelledError } from '../types.js';

export const DEFAULT_READ_TIMEOUT_MS = 10_000;

export type ReadOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

/**
 * Reads a UTF-8 file, giving up after `timeoutMs`. Aborting the caller's
 * signal turns into a CancelledError; the timeout into a plain Error.
 */
export async function readSourceFile(filePath: string, options: ReadOptions = {}): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  const timeout = AbortSignal.timeout(timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  try {
    return await readFile(filePath, { encoding: 'utf8', signal });
  } catch (err) {
    if (options.signal?.aborted) throw new CancelledError();
    if (timeout.aborted) throw new Error(`timed out after ${timeoutMs}ms reading ${filePath}`, { cause: err });
    throw err;
  }
}
