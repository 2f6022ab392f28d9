/**
 * @ilpcore/packet — Interledger payment packet.
 *
 * A PaymentPacket travels with every ledger-local transfer leg of one
 * payment. Connectors read the destination to route it; the receiver checks
 * the amount against what was delivered and hands the data to whichever
 * transport protocol produced it.
 *
 * Rules:
 * - Immutable: the data bytes are copied on the way in and on the way out
 * - Built only when all three fields were supplied
 * - The same packet is carried byte-for-byte across hops; equality is
 *   structural so a receiver can verify that
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { Address } from "./address.js";
import { ValidationError } from "./errors.js";

/**
 * Config struct for {@link PaymentPacket.from}.
 */
export interface PaymentPacketInit {
  readonly destinationAccount: Address | string;
  readonly destinationAmount: bigint;
  readonly data: Uint8Array;
}

/**
 * Logical wire fields of a packet as plain JSON values.
 * Amount in canonical base-10, data in base64.
 */
export interface PaymentPacketJson {
  readonly destination: string;
  readonly amount: string;
  readonly data: string;
}

/** Set once by PaymentPacket's static block; only the builder calls it. */
let newPacket: (destinationAccount: Address, destinationAmount: bigint, data: Uint8Array) => PaymentPacket;

export class PaymentPacket {
  static {
    newPacket = (destinationAccount, destinationAmount, data) =>
      new PaymentPacket(destinationAccount, destinationAmount, new Uint8Array(data));
  }

  readonly destinationAccount: Address;
  readonly destinationAmount: bigint;
  private readonly _data: Uint8Array;

  private constructor(
    destinationAccount: Address,
    destinationAmount: bigint,
    data: Uint8Array,
  ) {
    this.destinationAccount = destinationAccount;
    this.destinationAmount = destinationAmount;
    this._data = data;
    Object.freeze(this);
  }

  static builder(): PaymentPacketBuilder {
    return new PaymentPacketBuilder();
  }

  /**
   * Build a packet from a complete config struct.
   *
   * @throws {ValidationError} on any missing or malformed field
   */
  static from(init: PaymentPacketInit): PaymentPacket {
    return PaymentPacket.builder()
      .destinationAccount(init.destinationAccount)
      .destinationAmount(init.destinationAmount)
      .data(init.data)
      .build();
  }

  /** A fresh copy of the data payload. */
  getData(): Uint8Array {
    return new Uint8Array(this._data);
  }

  get dataLength(): number {
    return this._data.length;
  }

  equals(other: PaymentPacket): boolean {
    if (this === other) return true;
    return (
      this.destinationAccount.equals(other.destinationAccount) &&
      this.destinationAmount === other.destinationAmount &&
      bytesEqual(this._data, other._data)
    );
  }

  /**
   * SHA-256 over the canonical JSON form.
   * Equal packets have equal fingerprints.
   */
  fingerprint(): string {
    return createHash("sha256").update(canonicalize(this.toJSON())).digest("hex");
  }

  toJSON(): PaymentPacketJson {
    return {
      destination: this.destinationAccount.toString(),
      amount: this.destinationAmount.toString(10),
      data: Buffer.from(this._data).toString("base64"),
    };
  }

  toString(): string {
    return (
      `PaymentPacket{destinationAccount=${this.destinationAccount.toString()}` +
      `, destinationAmount=${this.destinationAmount.toString(10)}` +
      `, data=${this._data.length} bytes}`
    );
  }
}

/**
 * Collects the three mandatory fields. Each setter fails fast on bad input;
 * build() fails if any field was never set.
 */
export class PaymentPacketBuilder {
  private _destinationAccount: Address | undefined;
  private _destinationAmount: bigint | undefined;
  private _data: Uint8Array | undefined;

  destinationAccount(account: Address | string): this {
    if (account === null || account === undefined) {
      throw new ValidationError("ARGUMENT_ERROR", "destinationAccount must not be null");
    }
    const address = Address.from(account);
    if (address.isPrefix()) {
      throw new ValidationError(
        "ARGUMENT_ERROR",
        `destinationAccount must be an account address, got prefix "${address.toString()}"`,
      );
    }
    this._destinationAccount = address;
    return this;
  }

  destinationAmount(amount: bigint): this {
    if (typeof amount !== "bigint") {
      throw new ValidationError("ARGUMENT_ERROR", "destinationAmount must be a bigint");
    }
    if (amount < 0n) {
      throw new ValidationError(
        "ARGUMENT_ERROR",
        `destinationAmount must not be negative, got ${amount.toString()}`,
      );
    }
    this._destinationAmount = amount;
    return this;
  }

  data(data: Uint8Array): this {
    if (!(data instanceof Uint8Array)) {
      throw new ValidationError("ARGUMENT_ERROR", "data must be a Uint8Array");
    }
    this._data = new Uint8Array(data);
    return this;
  }

  /**
   * @throws {ValidationError} INCOMPLETE_BUILDER naming every unset field
   */
  build(): PaymentPacket {
    const missing: string[] = [];
    if (this._destinationAccount === undefined) missing.push("destinationAccount");
    if (this._destinationAmount === undefined) missing.push("destinationAmount");
    if (this._data === undefined) missing.push("data");

    if (
      this._destinationAccount === undefined ||
      this._destinationAmount === undefined ||
      this._data === undefined
    ) {
      throw new ValidationError(
        "INCOMPLETE_BUILDER",
        `Cannot build PaymentPacket, missing: ${missing.join(", ")}`,
      );
    }

    return newPacket(
      this._destinationAccount,
      this._destinationAmount,
      this._data,
    );
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
