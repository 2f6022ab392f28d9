/**
 * Property-Based Tests for @ilpcore/packet
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Address round-trip (parse → toString is identity)
 * 2. A prefix is a prefix of every account appended to it, never the reverse
 * 3. Packet memo round-trip preserves equality and fingerprint
 * 4. Copies of the data payload never alias the packet
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Address } from "../src/address.js";
import { PaymentPacket } from "../src/payment.js";
import { decodePacketMemo, encodePacketMemo } from "../src/memo.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbSegment = fc.stringMatching(/^[A-Za-z0-9_~-]{1,12}$/);

const arbSegments = fc.array(arbSegment, { minLength: 1, maxLength: 8 });

const arbAddressText = fc
  .tuple(arbSegments, fc.boolean())
  .map(([segments, prefix]) => segments.join(".") + (prefix ? "." : ""));

const arbPrefix = arbSegments.map((segments) => Address.parse(segments.join(".") + "."));

const arbAccountText = arbSegments.map((segments) => segments.join("."));

const arbPacket: fc.Arbitrary<PaymentPacket> = fc
  .tuple(
    arbAccountText,
    fc.bigInt({ min: 0n, max: 2n ** 128n }),
    fc.uint8Array({ maxLength: 64 }),
  )
  .map(([destinationAccount, destinationAmount, data]) =>
    PaymentPacket.from({ destinationAccount, destinationAmount, data }),
  );

// =============================================================================
// Address properties
// =============================================================================

describe("address properties", () => {
  it("parse(a).toString() === a for every well-formed address", () => {
    fc.assert(
      fc.property(arbAddressText, (text) => {
        expect(Address.parse(text).toString()).toBe(text);
      }),
      { numRuns: 200 },
    );
  });

  it("a prefix matches every account appended to it, not the reverse", () => {
    fc.assert(
      fc.property(arbPrefix, arbSegment, (prefix, segment) => {
        const account = prefix.withSegment(segment);
        expect(prefix.isPrefixOf(account)).toBe(true);
        expect(account.isPrefixOf(prefix)).toBe(false);
      }),
      { numRuns: 200 },
    );
  });

  it("the parent of an appended account is the original prefix", () => {
    fc.assert(
      fc.property(arbPrefix, arbSegment, (prefix, segment) => {
        expect(prefix.withSegment(segment).parent()?.equals(prefix)).toBe(true);
      }),
      { numRuns: 100 },
    );
  });
});

// =============================================================================
// Packet properties
// =============================================================================

describe("packet properties", () => {
  it("decode(encode(p)) equals p with the same fingerprint", () => {
    fc.assert(
      fc.property(arbPacket, (packet) => {
        const decoded = decodePacketMemo(encodePacketMemo(packet));
        expect(decoded.equals(packet)).toBe(true);
        expect(decoded.fingerprint()).toBe(packet.fingerprint());
      }),
      { numRuns: 100 },
    );
  });

  it("mutating a returned payload copy never changes the packet", () => {
    fc.assert(
      fc.property(arbPacket, (packet) => {
        const before = packet.fingerprint();
        const copy = packet.getData();
        copy.fill(0xff);
        expect(packet.fingerprint()).toBe(before);
      }),
      { numRuns: 50 },
    );
  });
});
