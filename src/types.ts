export type ErrorPayload = {
  message: string;
  code?: number;
};

export type SourcePosition = {
  source?: string;
  line: number;
  column: number;
};

export class CliError extends Error {
  exitCode: number;
  silent: boolean;

  /**
   * `silent` marks failures whose details were already written to stdout,
   * so the top-level handler only sets the exit code.
   */
  constructor(message: string, exitCode = 1, options: { silent?: boolean } = {}) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
    this.silent = options.silent ?? false;
  }
}

function describePosition(position: SourcePosition): string {
  const where = `${position.line}:${position.column}`;
  return position.source ? `${position.source}:${where}` : `line ${where}`;
}

/** Malformed YAML, or a document whose root is not a mapping. */
export class ParseError extends Error {
  readonly source?: string;
  readonly line: number;
  readonly column: number;
  readonly reason: string;

  constructor(reason: string, position: SourcePosition) {
    super(`${describePosition(position)}: ${reason}`);
    this.name = 'ParseError';
    this.reason = reason;
    this.source = position.source;
    this.line = position.line;
    this.column = position.column;
  }
}

export class IncludeError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`failed to include ${path}: ${detail}`, { cause });
    this.name = 'IncludeError';
    this.path = path;
  }
}

export class CancelledError extends Error {
  constructor(message = 'load cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}
