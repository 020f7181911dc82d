/**
 * Domain error model for the dataset store.
 * Framework-independent; the HTTP layer maps these to status codes.
 */

export type ErrorMetadata = Record<string, unknown>

export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message)
    this.name = this.constructor.name
    this.metadata = metadata
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** The data file does not exist. */
export class FileNotFoundError extends DomainError {}

/** The data file exists but cannot be read as a dataset. */
export class ParseError extends DomainError {}

/** A save request carries rows that break a dataset invariant. */
export class ValidationError extends DomainError {}

/** A save was based on a dataset version that is no longer current. */
export class StaleVersionError extends DomainError {}

/** Writing the data file failed; the previous file is left in place. */
export class WriteError extends DomainError {}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}
