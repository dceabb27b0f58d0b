import type { Endpoint } from "./contract.ts";

/** Bad or missing configuration. Raised while building things, never retried. */
export class ConfigurationError extends Error {
  override name = 'ConfigurationError';
}

/**
 * A single record the backend cannot represent.
 * Reported in the ApplyReport while the rest of the batch continues.
 */
export class SoftError extends Error {
  override name = 'SoftError';
  constructor(
    message: string,
    public readonly endpoint: Endpoint,
  ) {
    super(message);
  }
}

/** Structured failure from a backend API call. */
export class BackendError extends Error {
  override name = 'BackendError';
  constructor(
    public readonly backend: string,
    public readonly status: number,
    public readonly key: string,
    public readonly detail: string,
    public readonly hint: string | null,
    public readonly took: number | null,
  ) {
    super(`received ${status} status code from ${backend}: [${key}] ${detail}`
      + (hint ? ` (${hint})` : '')
      + (took != null ? ` - ${took}s` : ''));
  }
}

export class TokenRenewalExhaustedError extends Error {
  override name = 'TokenRenewalExhaustedError';
  constructor(backend: string, attempts: number) {
    super(`max tries reached for token renewal on ${backend} (${attempts} attempts)`);
  }
}
