/**
 * Errors that end a scan. Each carries the process exit code it maps to;
 * per-entry traversal problems are not errors, see ScanWarning.
 */
export abstract class ScanError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad or missing arguments, or an invalid config file. */
export class UsageError extends ScanError {
  readonly exitCode = 1;
}

/** Scan root missing, config unreadable, or output file not writable. */
export class FatalIOError extends ScanError {
  readonly exitCode = 2;

  constructor(
    message: string,
    readonly path: string,
    readonly code?: string,
  ) {
    super(message);
  }
}

export function isScanError(err: unknown): err is ScanError {
  return err instanceof ScanError;
}

// fs errors may come from another realm (vm contexts, Jest), so these
// helpers check the shape of the value, not its prototype.

/** Pull the errno code (ENOENT, EACCES, ...) off a Node fs error. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
