/** Missing or invalid process configuration. Fatal: raised before any work starts. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The quote provider could not be reached or answered with an unusable payload. */
export class QuoteProviderError extends Error {
  constructor(
    message: string,
    readonly instrumentId: string,
    readonly window: string,
  ) {
    super(message);
    this.name = 'QuoteProviderError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
