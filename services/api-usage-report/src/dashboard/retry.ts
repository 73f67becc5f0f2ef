import { FatalFetchError, TransientFetchError, errorMessage } from "../errors";
import type { Sleep } from "./types";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** A successful response with its body already read. */
export interface Fetched {
  response: Response;
  body: string;
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Delay before retry number `retry` (1-based): base, 2x base, 4x base, ...
 * capped at maxDelayMs. A Retry-After hint only ever lengthens the wait.
 */
export function backoffDelay(
  retry: number,
  policy: RetryPolicy,
  retryAfterMs: number | null = null,
): number {
  const exponential = Math.min(
    policy.baseDelayMs * 2 ** (retry - 1),
    policy.maxDelayMs,
  );
  return retryAfterMs === null ? exponential : Math.max(exponential, retryAfterMs);
}

export function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

/**
 * Issue a request until it succeeds, fails permanently or runs out of
 * attempts. `send` is called once per attempt, and the body is read within
 * the attempt so a failure mid-stream is retried like any network error.
 */
export async function sendWithRetry(
  url: string,
  send: () => Promise<Response>,
  policy: RetryPolicy,
  sleep: Sleep,
): Promise<Fetched> {
  let lastStatus: number | null = null;
  let lastBody = "";

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    let retryAfterMs: number | null = null;

    try {
      const res = await send();
      const body = await res.text();
      if (res.ok) return { response: res, body };

      if (!isTransientStatus(res.status)) {
        throw new FatalFetchError(url, res.status, body);
      }
      lastStatus = res.status;
      lastBody = body;
      retryAfterMs = res.status === 429 ? parseRetryAfter(res.headers.get("Retry-After")) : null;
    } catch (err) {
      if (err instanceof FatalFetchError) throw err;
      lastStatus = null;
      lastBody = errorMessage(err);
    }

    if (attempt < policy.maxAttempts) {
      const delay = backoffDelay(attempt, policy, retryAfterMs);
      console.error(
        `Transient failure on ${url} (${lastStatus ?? "network error"}), retry ${attempt} in ${delay}ms`,
      );
      await sleep(delay);
    }
  }

  throw new TransientFetchError(url, lastStatus, policy.maxAttempts, lastBody);
}
