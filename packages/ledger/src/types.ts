/**
 * @ilpcore/ledger — Transfer model and adaptor error types.
 *
 * Rules:
 * - All types are readonly
 * - A Transfer never changes once created; its lifecycle is tracked by the
 *   ledger holding it and reported as events
 * - Fail-closed: operational errors throw synchronously and leave no side effect
 */

import type { Address, PaymentPacket } from "@ilpcore/packet";

// ─── Transfer ────────────────────────────────────────────────────────────

/**
 * A ledger-local, optionally conditional transfer. One leg of an
 * Interledger payment; the packet travels with it unchanged.
 */
export interface Transfer {
  /** Ledger-unique transfer identifier */
  readonly id: string;

  /** Prefix of the ledger the transfer is held on */
  readonly ledger: Address;

  readonly fromAccount: Address;
  readonly toAccount: Address;

  /** Amount in the ledger's smallest unit */
  readonly amount: bigint;

  /** Base64url SHA-256 condition. Absent for unconditional transfers. */
  readonly executionCondition?: string | undefined;

  /** ISO 8601 instant after which a prepared transfer expires */
  readonly expiresAt?: string | undefined;

  /** The Interledger payment this transfer carries */
  readonly packet: PaymentPacket;
}

/**
 * Lifecycle of a conditional transfer.
 *
 * proposed → prepared → executed | rejected | expired
 * proposed → rejected (the ledger refused to escrow)
 */
export type TransferState =
  | "proposed"
  | "prepared"
  | "executed"
  | "rejected"
  | "expired";

// ─── Rejection ───────────────────────────────────────────────────────────

export type RejectionCode =
  | "expired"
  | "insufficient-funds"
  | "invalid-fulfillment"
  | "receiver-unreachable"
  | "cancelled";

export interface TransferRejectedReason {
  readonly code: RejectionCode;
  readonly message: string;
}

// ─── Accounts & Ledger ───────────────────────────────────────────────────

/**
 * Read-only snapshot of an account. Not live-updated.
 */
export interface AccountInfo {
  readonly address: Address;
  readonly name: string;
  /** Available balance in the ledger's smallest unit, escrow excluded */
  readonly balance: bigint;
  readonly currencyCode: string;
  /** Number of decimal places between the smallest unit and one currency unit */
  readonly scale: number;
  /** Whether the account is owned by a connector */
  readonly isConnector: boolean;
}

export interface LedgerInfo {
  readonly prefix: Address;
  readonly currencyCode: string;
  readonly currencySymbol?: string | undefined;
  /** Total significant digits the ledger can represent */
  readonly precision: number;
  readonly scale: number;
}

/**
 * Opaque application message between two accounts on the same ledger.
 * Delivery is best-effort and at most once.
 */
export interface LedgerMessage {
  readonly ledger: Address;
  readonly from: Address;
  readonly to: Address;
  readonly data: Readonly<Record<string, unknown>>;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for adaptor operations. */
export type LedgerAdaptorErrorCode =
  | "NOT_CONNECTED"
  | "ACCOUNT_NOT_FOUND"
  | "UNAUTHORIZED"
  | "INVALID_STATE"
  | "DUPLICATE_TRANSFER"
  | "INVALID_ACCOUNT"
  | "TRANSFER_NOT_FOUND"
  | "INVALID_FULFILLMENT"
  | "LEDGER_MISMATCH"
  | "DUPLICATE_ADAPTOR"
  | "UNKNOWN_LEDGER";

/**
 * Structured error from a ledger adaptor.
 * Raised synchronously when a precondition is violated; the attempted
 * operation has no side effect.
 */
export class LedgerAdaptorError extends Error {
  public readonly code: LedgerAdaptorErrorCode;

  constructor(code: LedgerAdaptorErrorCode, message: string) {
    super(message);
    this.name = "LedgerAdaptorError";
    this.code = code;
  }
}
