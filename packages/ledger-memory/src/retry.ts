/**
 * @ilpcore/ledger-memory — Re-opening a ledger session with backoff.
 *
 * An adaptor that loses its session keeps asking the ledger for a new one,
 * waiting longer after each refusal, until it gets one, gives up, or the
 * caller moves on (a later connect() or disconnect() makes the attempt
 * stale).
 *
 * Wait before retry n (1-based): min(baseDelayMs * 2^(n-1) + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

import { LedgerUnavailableError } from "./in-memory-ledger.js";
import type { LedgerSession } from "./in-memory-ledger.js";

export interface RetryConfig {
  /** Session requests in total, the first included */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** Upper bound of the random extra wait */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 100,
  maxDelayMs: 5000,
  jitterMs: 0,
};

/** The ledger refused every session request. */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly ledger: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const cause = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up on ledger ${ledger} after ${attempts} attempts: ${cause}`);
    this.name = "RetryExhaustedError";
  }
}

/** The attempt was overtaken by a later connect() or disconnect(). */
export class RetryAbortedError extends Error {
  constructor(public readonly ledger: string) {
    super(`Session request to ${ledger} was superseded`);
    this.name = "RetryAbortedError";
  }
}

export interface SessionRetryOptions {
  /** Ledger prefix, for error messages */
  readonly ledger: string;
  readonly config: RetryConfig;
  /** Checked before every request and after every wait */
  readonly isStale: () => boolean;
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
  /** Called before each wait, with the 1-based retry number */
  readonly onRetry?: ((retry: number, delayMs: number, lastError: unknown) => void) | undefined;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wait before the 1-based `retry`. */
export function backoffDelay(
  retry: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayMs * 2 ** (retry - 1);
  return Math.min(exponential + random() * config.jitterMs, config.maxDelayMs);
}

/**
 * Only an unreachable ledger is worth asking again; anything else is a
 * permanent refusal.
 */
export function isRetryableSessionError(err: unknown): boolean {
  return err instanceof LedgerUnavailableError;
}

/**
 * Request a session until the ledger grants one.
 *
 * A session granted to a stale attempt is closed before the abort is
 * reported, so nothing is left open on the ledger.
 *
 * @throws {RetryAbortedError} once the attempt is stale
 * @throws {RetryExhaustedError} after config.maxAttempts refusals
 * @throws the ledger's error when it is not worth retrying
 */
export async function withRetry(
  request: () => Promise<LedgerSession>,
  options: SessionRetryOptions,
): Promise<LedgerSession> {
  const { ledger, config, isStale } = options;
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    if (attempt > 1) {
      const delayMs = backoffDelay(attempt - 1, config);
      options.onRetry?.(attempt - 1, delayMs, lastError);
      await wait(delayMs);
    }
    if (isStale()) throw new RetryAbortedError(ledger);

    let session: LedgerSession;
    try {
      session = await request();
    } catch (err: unknown) {
      if (isStale()) throw new RetryAbortedError(ledger);
      if (!isRetryableSessionError(err)) throw err;
      lastError = err;
      continue;
    }

    if (isStale()) {
      session.close();
      throw new RetryAbortedError(ledger);
    }
    return session;
  }

  throw new RetryExhaustedError(ledger, config.maxAttempts, lastError);
}
