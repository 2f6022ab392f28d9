/**
 * @ilpcore/ledger — Transfer construction.
 *
 * createTransfer() is the only way to produce a Transfer. It validates
 * every field and returns a frozen value.
 */

import { z } from "zod";
import { Address, PaymentPacket, ValidationError } from "@ilpcore/packet";
import { isValidCondition } from "./condition.js";
import type { RejectionCode, Transfer, TransferRejectedReason } from "./types.js";

const IsoInstant = z.string().datetime({ offset: true });

/**
 * Input for {@link createTransfer}. Addresses may be given as strings.
 */
export interface TransferInput {
  readonly id: string;
  readonly ledger: Address | string;
  readonly fromAccount: Address | string;
  readonly toAccount: Address | string;
  readonly amount: bigint;
  readonly executionCondition?: string | undefined;
  readonly expiresAt?: string | undefined;
  readonly packet: PaymentPacket;
}

/**
 * Validate and freeze a transfer.
 *
 * Validation rules (fail-closed, all must pass):
 * 1. id is a non-empty string
 * 2. ledger is a prefix address
 * 3. both accounts are leaf addresses under the ledger prefix, and differ
 * 4. amount is a positive bigint
 * 5. executionCondition, when present, is a well-formed condition
 * 6. expiresAt, when present, is an ISO 8601 date-time with Z or an offset
 * 7. packet is a PaymentPacket
 *
 * @throws {ValidationError} ARGUMENT_ERROR or INVALID_ADDRESS
 */
export function createTransfer(input: TransferInput): Transfer {
  if (typeof input.id !== "string" || input.id.length === 0) {
    throw argumentError("Transfer id must be a non-empty string");
  }

  const ledger = Address.from(input.ledger);
  if (!ledger.isPrefix()) {
    throw argumentError(`Transfer ledger must be a prefix, got "${ledger.toString()}"`);
  }

  const fromAccount = accountUnder(ledger, input.fromAccount, "fromAccount");
  const toAccount = accountUnder(ledger, input.toAccount, "toAccount");
  if (fromAccount.equals(toAccount)) {
    throw argumentError(`Transfer ${input.id} sends to its own source account`);
  }

  if (typeof input.amount !== "bigint" || input.amount <= 0n) {
    throw argumentError(`Transfer ${input.id} amount must be a positive bigint`);
  }

  if (input.executionCondition !== undefined && !isValidCondition(input.executionCondition)) {
    throw argumentError(`Transfer ${input.id} has a malformed execution condition`);
  }

  if (input.expiresAt !== undefined && !IsoInstant.safeParse(input.expiresAt).success) {
    throw argumentError(`Transfer ${input.id} has a non-ISO 8601 expiresAt "${input.expiresAt}"`);
  }

  if (!(input.packet instanceof PaymentPacket)) {
    throw argumentError(`Transfer ${input.id} must carry a PaymentPacket`);
  }

  const transfer: Transfer = {
    id: input.id,
    ledger,
    fromAccount,
    toAccount,
    amount: input.amount,
    executionCondition: input.executionCondition,
    expiresAt: input.expiresAt,
    packet: input.packet,
  };
  return Object.freeze(transfer);
}

/**
 * Build a rejection reason.
 */
export function rejectionReason(code: RejectionCode, message: string): TransferRejectedReason {
  return Object.freeze({ code, message });
}

/** Milliseconds from `now` until the transfer expires; undefined when it never does. */
export function millisUntilExpiry(transfer: Transfer, now: number): number | undefined {
  if (transfer.expiresAt === undefined) return undefined;
  return Math.max(0, Date.parse(transfer.expiresAt) - now);
}

function accountUnder(ledger: Address, value: Address | string, field: string): Address {
  const account = Address.from(value);
  if (account.isPrefix()) {
    throw argumentError(`Transfer ${field} must be an account, got prefix "${account.toString()}"`);
  }
  if (!ledger.isPrefixOf(account)) {
    throw argumentError(
      `Transfer ${field} "${account.toString()}" is not on ledger "${ledger.toString()}"`,
    );
  }
  return account;
}

function argumentError(message: string): ValidationError {
  return new ValidationError("ARGUMENT_ERROR", message);
}
