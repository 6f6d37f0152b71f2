export class SignalEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SignalEngineError';
  }
}

export class ConfigError extends SignalEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * The alert history could not be reached. Fatal for a run: without the
 * store the at-most-once guarantee does not hold, so nothing is emitted.
 */
export class StoreUnavailableError extends SignalEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
