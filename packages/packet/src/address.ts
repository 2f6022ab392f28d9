/**
 * @ilpcore/packet — Interledger addresses.
 *
 * Grammar:
 *
 *   address := segment ("." segment)* ["."]
 *   segment := [A-Za-z0-9_~-]+
 *
 * A trailing "." marks a prefix (a ledger or connector scope). Without it
 * the address is a leaf and names a billable account.
 *
 * Rules:
 * - Parsing is pure and total: every string either parses or throws
 * - Nothing is truncated or normalised; toString() returns the input
 * - Prefix matching is segment-aligned, never a raw substring match
 */

import { ValidationError } from "./errors.js";

/** Maximum length of an address string, trailing separator included. */
export const MAX_ADDRESS_LENGTH = 1023;

/** Maximum number of segments in an address. */
export const MAX_SEGMENTS = 64;

export const SEPARATOR = ".";

const SEGMENT_PATTERN = /^[A-Za-z0-9_~-]+$/;

export class Address {
  private readonly _segments: readonly string[];
  private readonly _prefix: boolean;
  private readonly _text: string;

  private constructor(segments: readonly string[], prefix: boolean) {
    this._segments = Object.freeze([...segments]);
    this._prefix = prefix;
    this._text = segments.join(SEPARATOR) + (prefix ? SEPARATOR : "");
    Object.freeze(this);
  }

  /**
   * Parse an address string.
   *
   * @throws {ValidationError} INVALID_ADDRESS when the string violates the grammar or limits
   */
  static parse(value: string): Address {
    if (typeof value !== "string") {
      throw new ValidationError("INVALID_ADDRESS", "Address must be a string");
    }
    if (value.length === 0) {
      throw new ValidationError("INVALID_ADDRESS", "Address must not be empty");
    }
    if (value.length > MAX_ADDRESS_LENGTH) {
      throw new ValidationError(
        "INVALID_ADDRESS",
        `Address exceeds ${MAX_ADDRESS_LENGTH} characters (got ${value.length})`,
      );
    }

    const prefix = value.endsWith(SEPARATOR);
    const body = prefix ? value.slice(0, -1) : value;
    const segments = body.split(SEPARATOR);

    assertSegmentCount(segments.length, value);
    for (const segment of segments) {
      assertSegment(segment, value);
    }

    return new Address(segments, prefix);
  }

  /** Check whether a string is a well-formed address. */
  static isValid(value: string): boolean {
    try {
      Address.parse(value);
      return true;
    } catch {
      return false;
    }
  }

  /** Accept an Address as-is or parse a string. */
  static from(value: Address | string): Address {
    return value instanceof Address ? value : Address.parse(value);
  }

  get segments(): readonly string[] {
    return this._segments;
  }

  isPrefix(): boolean {
    return this._prefix;
  }

  /**
   * True iff this address's segments are a leading run of `other`'s segments.
   * An address is a prefix of itself.
   */
  isPrefixOf(other: Address): boolean {
    const mine = this._segments;
    const theirs = other._segments;
    if (mine.length > theirs.length) return false;
    for (let i = 0; i < mine.length; i++) {
      if (mine[i] !== theirs[i]) return false;
    }
    return true;
  }

  /**
   * Append a segment to a prefix, producing a leaf address.
   *
   * @throws {ValidationError} INVALID_ADDRESS when this is not a prefix, or
   *   the segment or the resulting address is malformed
   */
  withSegment(segment: string): Address {
    if (!this._prefix) {
      throw new ValidationError(
        "INVALID_ADDRESS",
        `Cannot append to "${this._text}": not a prefix`,
      );
    }
    const text = this._text + segment;
    if (text.length > MAX_ADDRESS_LENGTH) {
      throw new ValidationError(
        "INVALID_ADDRESS",
        `Address exceeds ${MAX_ADDRESS_LENGTH} characters (got ${text.length})`,
      );
    }
    assertSegmentCount(this._segments.length + 1, text);
    assertSegment(segment, text);
    return new Address([...this._segments, segment], false);
  }

  /** The prefix over the same segments. Identity for prefixes. */
  toPrefix(): Address {
    if (this._prefix) return this;
    if (this._text.length + 1 > MAX_ADDRESS_LENGTH) {
      throw new ValidationError(
        "INVALID_ADDRESS",
        `Address exceeds ${MAX_ADDRESS_LENGTH} characters as a prefix`,
      );
    }
    return new Address(this._segments, true);
  }

  /**
   * The enclosing prefix: `g.usd.bob` → `g.usd.`, `g.usd.` → `g.`.
   * Undefined for single-segment addresses.
   */
  parent(): Address | undefined {
    if (this._segments.length <= 1) return undefined;
    return new Address(this._segments.slice(0, -1), true);
  }

  equals(other: Address): boolean {
    return this._text === other._text;
  }

  toString(): string {
    return this._text;
  }

  toJSON(): string {
    return this._text;
  }
}

function assertSegmentCount(count: number, value: string): void {
  if (count > MAX_SEGMENTS) {
    throw new ValidationError(
      "INVALID_ADDRESS",
      `Address "${truncate(value)}" has ${count} segments (max ${MAX_SEGMENTS})`,
    );
  }
}

function assertSegment(segment: string, value: string): void {
  if (segment.length === 0) {
    throw new ValidationError(
      "INVALID_ADDRESS",
      `Address "${truncate(value)}" contains an empty segment`,
    );
  }
  if (!SEGMENT_PATTERN.test(segment)) {
    throw new ValidationError(
      "INVALID_ADDRESS",
      `Address "${truncate(value)}" has an invalid segment "${truncate(segment)}"`,
    );
  }
}

function truncate(value: string): string {
  return value.length > 64 ? `${value.slice(0, 61)}...` : value;
}
