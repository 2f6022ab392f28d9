/**
 * Ledger events.
 *
 * Everything an adaptor learns about its ledger reaches the connector as
 * one of these. Every state change of a transfer is a new event; nothing is
 * updated in place, so the event sequence of an adaptor can be replayed.
 *
 * Rules:
 * - Events are frozen snapshots; they hold no reference into adaptor state
 * - `sequence` increases by one per event within an adaptor
 * - Ledger-reported outcomes (insufficient funds, rejection, expiry) are
 *   events, never exceptions
 */

import type { Address } from "@ilpcore/packet";
import type {
  LedgerMessage,
  RejectionCode,
  Transfer,
  TransferRejectedReason,
} from "./types.js";

/** Direction of a transfer relative to the adaptor's subscribed accounts. */
export type TransferDirection = "incoming" | "outgoing";

interface BaseLedgerEvent {
  /** Ledger prefix the event came from */
  readonly ledger: Address;

  /** Position in this adaptor's event sequence (1-based) */
  readonly sequence: number;

  /** ISO 8601 timestamp at which the adaptor raised the event */
  readonly timestamp: string;
}

export interface ConnectEvent extends BaseLedgerEvent {
  readonly type: "connect";
  readonly account: Address;
}

export interface DisconnectEvent extends BaseLedgerEvent {
  readonly type: "disconnect";
  readonly reason?: string | undefined;
}

interface BaseTransferEvent extends BaseLedgerEvent {
  readonly transfer: Transfer;
  readonly direction: TransferDirection;
}

export interface TransferPreparedEvent extends BaseTransferEvent {
  readonly type: "transfer.prepared";
}

export interface TransferExecutedEvent extends BaseTransferEvent {
  readonly type: "transfer.executed";
  /** Present when a condition was fulfilled */
  readonly fulfillment?: string | undefined;
}

export interface TransferRejectedEvent extends BaseTransferEvent {
  readonly type: "transfer.rejected";
  readonly reason: TransferRejectedReason;
}

export interface MessageReceivedEvent extends BaseLedgerEvent {
  readonly type: "message.received";
  readonly message: LedgerMessage;
}

export type LedgerEvent =
  | ConnectEvent
  | DisconnectEvent
  | TransferPreparedEvent
  | TransferExecutedEvent
  | TransferRejectedEvent
  | MessageReceivedEvent;

export type LedgerEventType = LedgerEvent["type"];

export type TransferEvent =
  | TransferPreparedEvent
  | TransferExecutedEvent
  | TransferRejectedEvent;

/**
 * Handler for ledger events. At most one per adaptor.
 * The adaptor waits for a returned promise before delivering the next event.
 */
export type LedgerEventHandler = (event: LedgerEvent) => void | Promise<void>;

/** Distributes Omit over a union so each variant keeps its own fields. */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event before the adaptor stamps it with sequence and timestamp. */
export type LedgerEventBody = DistributiveOmit<LedgerEvent, "sequence" | "timestamp">;

// =============================================================================
// Guards
// =============================================================================

const EVENT_TYPES = new Set<string>([
  "connect",
  "disconnect",
  "transfer.prepared",
  "transfer.executed",
  "transfer.rejected",
  "message.received",
]);

const REJECTION_CODES = new Set<string>([
  "expired",
  "insufficient-funds",
  "invalid-fulfillment",
  "receiver-unreachable",
  "cancelled",
]);

export function isRejectionCode(value: unknown): value is RejectionCode {
  return typeof value === "string" && REJECTION_CODES.has(value);
}

export function isTransferRejectedReason(value: unknown): value is TransferRejectedReason {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isRejectionCode(v.code) && typeof v.message === "string";
}

export function isLedgerEvent(value: unknown): value is LedgerEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    EVENT_TYPES.has(v.type) &&
    typeof v.sequence === "number" &&
    Number.isInteger(v.sequence) &&
    v.sequence >= 1 &&
    typeof v.timestamp === "string" &&
    v.ledger !== null &&
    typeof v.ledger === "object"
  );
}

export function isTransferEvent(event: LedgerEvent): event is TransferEvent {
  return (
    event.type === "transfer.prepared" ||
    event.type === "transfer.executed" ||
    event.type === "transfer.rejected"
  );
}

/** True for the events that end a transfer's lifecycle. */
export function isTerminalTransferEvent(
  event: LedgerEvent,
): event is TransferExecutedEvent | TransferRejectedEvent {
  return event.type === "transfer.executed" || event.type === "transfer.rejected";
}
