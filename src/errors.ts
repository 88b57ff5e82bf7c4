/**
 * Error taxonomy for pdf-defang.
 *
 * Every error carries a stable `code` so callers (and tests) can tell the
 * causes apart after a boundary has collapsed them into a boolean.
 */

export type DefangErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'PASSWORD_PROTECTED'
  | 'STRUCTURAL'
  | 'OUTPUT_WRITE'
  | 'INVALID_INVOCATION';

export class DefangError extends Error {
  constructor(
    message: string,
    public readonly code: DefangErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DefangError';
  }
}

/** The input document does not exist or cannot be read */
export class InputNotFoundError extends DefangError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`File not found: ${path}`, 'INPUT_NOT_FOUND', options);
    this.name = 'InputNotFoundError';
  }
}

/** The document is encrypted and the security handler could not open it */
export class PasswordProtectedError extends DefangError {
  constructor(message = 'Encrypted PDF requires a password') {
    super(message, 'PASSWORD_PROTECTED');
    this.name = 'PasswordProtectedError';
  }
}

/** Malformed file structure or object graph */
export class StructuralError extends DefangError {
  constructor(message: string, public readonly offset?: number, options?: { cause?: unknown }) {
    super(message, 'STRUCTURAL', options);
    this.name = 'StructuralError';
  }
}

export class OutputWriteError extends DefangError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Cannot write output file: ${path}`, 'OUTPUT_WRITE', options);
    this.name = 'OutputWriteError';
  }
}

/** The operation was called with arguments it refuses to run with */
export class InvalidInvocationError extends DefangError {
  constructor(message: string) {
    super(message, 'INVALID_INVOCATION');
    this.name = 'InvalidInvocationError';
  }
}

/** Wrap anything thrown by lower layers; DefangErrors pass through untouched. */
export function toDefangError(err: unknown): DefangError {
  if (err instanceof DefangError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new StructuralError(message, undefined, { cause: err });
}
