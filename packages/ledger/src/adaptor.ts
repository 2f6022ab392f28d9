/**
 * Ledger Adaptor Interface
 *
 * The uniform contract a connector uses to drive any ledger. Every
 * ledger-specific implementation must satisfy it; the connector sees
 * nothing else.
 *
 * Design rules:
 * - Mutating operations validate locally and return; the ledger-side
 *   effect is reported later as a LedgerEvent
 * - Precondition violations throw LedgerAdaptorError synchronously with
 *   no side effect
 * - Ledger-reported outcomes are events, never exceptions
 * - Connectivity is reported only through connect/disconnect events;
 *   isConnected() reflects the last one raised
 * - One adaptor never shares mutable state with another
 */

import type { Address } from "@ilpcore/packet";
import type { LedgerEventHandler } from "./events.js";
import type {
  AccountInfo,
  LedgerInfo,
  LedgerMessage,
  Transfer,
  TransferRejectedReason,
} from "./types.js";

export interface LedgerAdaptor {
  /** Prefix of the ledger this adaptor drives */
  readonly ledger: Address;

  /** Account the adaptor acts as on that ledger */
  readonly account: Address;

  /**
   * Start connecting. Returns immediately; the outcome arrives as a
   * connect or disconnect event.
   */
  connect(): void;

  /** Snapshot; may be stale by the time the caller acts on it. */
  isConnected(): boolean;

  /** Idempotent. */
  disconnect(): void;

  /** Install the single event handler, replacing any previous one. */
  setEventHandler(handler: LedgerEventHandler | undefined): void;

  getLedgerInfo(): LedgerInfo;

  /**
   * Best-effort, at-most-once delivery to `message.to`.
   * @throws NOT_CONNECTED
   */
  sendMessage(message: LedgerMessage): void;

  /**
   * Propose a transfer from this adaptor's account. The ledger escrows the
   * amount (transfer.prepared) or refuses (transfer.rejected).
   * @throws NOT_CONNECTED, UNAUTHORIZED, INVALID_ACCOUNT, DUPLICATE_TRANSFER, LEDGER_MISMATCH
   */
  sendTransfer(transfer: Transfer): void;

  /**
   * Reject a prepared transfer. Only the receiver may do this.
   * @throws NOT_CONNECTED, TRANSFER_NOT_FOUND, UNAUTHORIZED, INVALID_STATE
   */
  rejectTransfer(transfer: Transfer, reason: TransferRejectedReason): void;

  /** @throws NOT_CONNECTED, ACCOUNT_NOT_FOUND */
  getAccountInfo(account: Address): AccountInfo;

  /**
   * Surface ledger activity on `account` as events. Idempotent, and
   * allowed before connect(): the subscription applies once connected.
   * @throws LEDGER_MISMATCH, INVALID_ACCOUNT
   */
  subscribeToAccountNotifications(account: Address): void;

  /**
   * Connector-owned accounts known to the ledger, sorted. A snapshot.
   * @throws NOT_CONNECTED
   */
  getConnectors(): readonly Address[];
}
