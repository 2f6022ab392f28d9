/**
 * @ilpcore/ledger-memory — In-process ledger and its adaptor.
 *
 * A reference LedgerAdaptor and the backend it drives. Connectors use it
 * as a test double; it also shows what any real adaptor has to do.
 */

export {
  InMemoryLedger,
  LedgerSession,
  LedgerUnavailableError,
} from "./in-memory-ledger.js";
export type {
  InMemoryLedgerOptions,
  AccountSeed,
  LedgerNotification,
  NotificationListener,
} from "./in-memory-ledger.js";

export { InMemoryLedgerAdaptor } from "./in-memory-adaptor.js";
export type { InMemoryLedgerAdaptorOptions } from "./in-memory-adaptor.js";

export {
  InMemoryAdaptorConfigSchema,
  ReconnectSchema,
  parseAdaptorConfig,
  loadAdaptorConfig,
} from "./config.js";
export type { InMemoryAdaptorConfig } from "./config.js";

export {
  withRetry,
  backoffDelay,
  sleep,
  isRetryableSessionError,
  RetryExhaustedError,
  RetryAbortedError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig, SessionRetryOptions } from "./retry.js";
