/**
 * Missing or invalid environment configuration. Raised before any request is
 * issued.
 */
export class ConfigurationError extends Error {
  readonly name = "ConfigurationError";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

/**
 * Rate limiting, a server error or a network failure that outlasted every
 * retry attempt. `status` is null when no response was received.
 */
export class TransientFetchError extends Error {
  readonly name = "TransientFetchError";

  constructor(
    readonly url: string,
    readonly status: number | null,
    readonly attempts: number,
    readonly body: string,
  ) {
    super(
      `Request to ${url} failed after ${attempts} attempt(s) (${status ?? "network error"}): ${body}`,
    );
  }
}

/**
 * A client error other than rate limiting, or a response body that is not
 * what the endpoint promises. Never retried.
 */
export class FatalFetchError extends Error {
  readonly name = "FatalFetchError";

  constructor(
    readonly url: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Request to ${url} failed (${status}): ${body}`);
  }
}

export class IOError extends Error {
  readonly name = "IOError";

  constructor(
    readonly path: string,
    readonly cause: unknown,
  ) {
    super(`Unable to write ${path}: ${errorMessage(cause)}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
