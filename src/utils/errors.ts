/**
 * Error kinds raised by the netflow monitor.
 *
 * Only ConfigurationError is fatal. The others are handled inside the
 * ingestion loop or translated into HTTP responses.
 */

export class NetflowError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing configuration; the process must not start. */
export class ConfigurationError extends NetflowError {}

export type DecodeErrorKind = 'MalformedLog';

/** A log that cannot be read as a token transfer. Skipped, never fatal. */
export class DecodeError extends NetflowError {
  readonly kind: DecodeErrorKind;
  readonly reason: string;

  constructor(reason: string, kind: DecodeErrorKind = 'MalformedLog') {
    super(`${kind}: ${reason}`);
    this.kind = kind;
    this.reason = reason;
  }
}

/** The log subscription could not be opened or has terminated. */
export class ConnectionError extends NetflowError {}

/** A persistence operation failed and was rolled back. */
export class StoreError extends NetflowError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
