/**
 * Error kinds raised while classifying and executing script lines
 */

/**
 * Base class for every error the interpreter reports against a line
 */
export class ReplayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed built-in command (wrong arity or shape) */
export class ScriptSyntaxError extends ReplayError {}

/** Unbalanced quoting or dangling escape during word splitting */
export class TokenizeError extends ReplayError {}

/** Bad `$` placeholder during substitution */
export class MalformedTemplateError extends ReplayError {}

/** Module could not be loaded, or the requested attribute is not callable */
export class ImportError extends ReplayError {}

/**
 * Spawned command exited with a non-zero status or was killed by a signal
 */
export class CommandFailedError extends ReplayError {
  readonly exitCode: number;
  readonly signal: number | undefined;

  constructor(command: string, exitCode: number, signal?: number) {
    super(
      signal
        ? `Command "${command}" was killed by signal ${signal}`
        : `Command "${command}" exited with status ${exitCode}`
    );
    this.exitCode = exitCode;
    this.signal = signal || undefined;
  }
}

/**
 * Error raised while reading a line, tagged with where the line came from
 */
export class LineError extends ReplayError {
  readonly origin: string;
  readonly lineNo: number;

  constructor(origin: string, lineNo: number, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.origin = origin;
    this.lineNo = lineNo;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
