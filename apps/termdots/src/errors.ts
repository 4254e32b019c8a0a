/**
 * Failure categories reported to the user
 */
export type TermdotsErrorCode =
  | 'input-not-found'
  | 'decode-failed'
  | 'empty-image'
  | 'invalid-config';

/**
 * Base class for expected, user-facing failures.
 * Anything else reaching the top level is treated as a bug.
 */
export class TermdotsError extends Error {
  readonly code: TermdotsErrorCode;

  constructor(code: TermdotsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ImageNotFoundError extends TermdotsError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('input-not-found', `File does not exist ${path}`, { cause });
    this.path = path;
  }
}

/**
 * The decode tool failed; `diagnostic` holds whatever it printed
 */
export class DecodeError extends TermdotsError {
  readonly decoder: string;
  readonly diagnostic: string;

  constructor(decoder: string, diagnostic: string, cause?: unknown) {
    super('decode-failed', `${decoder} error: ${diagnostic.trim() || 'unknown failure'}`, { cause });
    this.decoder = decoder;
    this.diagnostic = diagnostic;
  }
}

export class EmptyImageError extends TermdotsError {
  constructor(path: string) {
    super('empty-image', `Unable to parse pixel data from ${path}`);
  }
}

export class ConfigError extends TermdotsError {
  constructor(message: string, cause?: unknown) {
    super('invalid-config', message, { cause });
  }
}
