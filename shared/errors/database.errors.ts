/**
 * Database error taxonomy
 * Driver errors (QueryFailedError and friends) are left as they are; these cover the cases
 * handlers must tell apart from a plain query failure.
 */

/** The database could not be reached or rejected the credentials. */
export class ConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
  }
}

/** A single-row lookup matched nothing. */
export class RecordNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordNotFoundError';
  }
}
