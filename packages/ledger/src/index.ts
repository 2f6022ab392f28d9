/**
 * @ilpcore/ledger — Ledger adaptor contract.
 *
 * - Transfer model, conditions and fulfillments
 * - LedgerEvent union, guards and the per-adaptor dispatcher
 * - Conditional-transfer state machine
 * - LedgerAdaptor interface and the registry a connector drives them through
 */

// Types
export type {
  Transfer,
  TransferState,
  RejectionCode,
  TransferRejectedReason,
  AccountInfo,
  LedgerInfo,
  LedgerMessage,
  LedgerAdaptorErrorCode,
} from "./types.js";
export { LedgerAdaptorError } from "./types.js";

// Transfers
export { createTransfer, rejectionReason, millisUntilExpiry } from "./transfer.js";
export type { TransferInput } from "./transfer.js";

// Conditions
export {
  FULFILLMENT_LENGTH,
  CONDITION_LENGTH,
  generateFulfillment,
  conditionFromFulfillment,
  isValidCondition,
  isValidFulfillment,
  fulfillmentMatches,
} from "./condition.js";

// Events
export type {
  LedgerEvent,
  LedgerEventType,
  LedgerEventBody,
  LedgerEventHandler,
  TransferDirection,
  TransferEvent,
  ConnectEvent,
  DisconnectEvent,
  TransferPreparedEvent,
  TransferExecutedEvent,
  TransferRejectedEvent,
  MessageReceivedEvent,
} from "./events.js";
export {
  isLedgerEvent,
  isTransferEvent,
  isTerminalTransferEvent,
  isRejectionCode,
  isTransferRejectedReason,
} from "./events.js";
export { EventDispatcher } from "./dispatcher.js";

// State machine
export {
  TransferStateMachine,
  isValidTransition,
  isTerminalState,
  getAllowedTransitions,
  assertTransition,
} from "./state-machine.js";
export type { StateChange } from "./state-machine.js";

// Adaptor contract
export type { LedgerAdaptor } from "./adaptor.js";
export { AdaptorRegistry } from "./registry.js";
export type { RegistryEventHandler, MultiLedgerResult } from "./registry.js";

// Logging
export { createLogger, componentLogger } from "./logger.js";
export type { Logger, LogLevel, LoggerOptions } from "./logger.js";
