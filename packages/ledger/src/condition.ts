/**
 * Execution conditions and fulfillments.
 *
 * A condition is the SHA-256 digest of a 32-byte preimage (the
 * fulfillment). Both travel as unpadded base64url strings. Whoever can
 * present the preimage may execute every transfer locked to the digest.
 */

import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

/** Length of a fulfillment preimage in bytes. */
export const FULFILLMENT_LENGTH = 32;

/** Length of a condition digest in bytes. */
export const CONDITION_LENGTH = 32;

const BASE64URL = /^[A-Za-z0-9_-]+$/;

/** Generate a random fulfillment. */
export function generateFulfillment(): string {
  return randomBytes(FULFILLMENT_LENGTH).toString("base64url");
}

/**
 * Compute the condition for a fulfillment.
 *
 * @throws Error if the fulfillment is not a 32-byte base64url string
 */
export function conditionFromFulfillment(fulfillment: string): string {
  const preimage = decodeFixed(fulfillment, FULFILLMENT_LENGTH);
  if (preimage === undefined) {
    throw new Error(
      `Fulfillment must be ${FULFILLMENT_LENGTH} bytes of base64url`,
    );
  }
  return createHash("sha256").update(preimage).digest("base64url");
}

export function isValidCondition(value: unknown): value is string {
  return typeof value === "string" && decodeFixed(value, CONDITION_LENGTH) !== undefined;
}

export function isValidFulfillment(value: unknown): value is string {
  return typeof value === "string" && decodeFixed(value, FULFILLMENT_LENGTH) !== undefined;
}

/**
 * Check a fulfillment against a condition in constant time.
 * Malformed input never matches.
 */
export function fulfillmentMatches(condition: string, fulfillment: string): boolean {
  const expected = decodeFixed(condition, CONDITION_LENGTH);
  const preimage = decodeFixed(fulfillment, FULFILLMENT_LENGTH);
  if (expected === undefined || preimage === undefined) return false;

  const actual = createHash("sha256").update(preimage).digest();
  return timingSafeEqual(actual, expected);
}

/** Decode strict base64url of an exact byte length; undefined otherwise. */
function decodeFixed(value: string, length: number): Buffer | undefined {
  if (!BASE64URL.test(value)) return undefined;
  const bytes = Buffer.from(value, "base64url");
  if (bytes.length !== length) return undefined;
  // Reject non-canonical encodings (stray trailing bits)
  if (bytes.toString("base64url") !== value) return undefined;
  return bytes;
}
