// Error types shared by the collector and the state exporter

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A failed round trip to the validator node, over either transport.
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly method: string,
    public readonly statusCode?: number,
    public readonly response?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

/**
 * A failed write to, or query against, the time-series store.
 */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
