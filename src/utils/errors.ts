/**
 * Raised when strategy or service configuration is contradictory or incomplete.
 * Always fatal: it is thrown while building objects, never in a running loop.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure talking to the exchange (market data or order placement).
 */
export class ExchangeError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed: ${message}`, options);
    this.name = 'ExchangeError';
  }
}

/**
 * Failure reading or writing the position store. Callers see it only after
 * the store has rolled back whatever the failed operation touched.
 */
export class PersistenceError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed: ${message}`, options);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A position, strategy or watched symbol the caller referred to does not exist.
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}
