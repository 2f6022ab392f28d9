/**
 * Tests for the InMemoryLedger backend itself.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Address, ValidationError } from "@ilpcore/packet";
import { LedgerAdaptorError, rejectionReason } from "@ilpcore/ledger";
import { InMemoryLedger, LedgerUnavailableError } from "../src/in-memory-ledger.js";
import type { LedgerNotification } from "../src/in-memory-ledger.js";
import {
  FULFILLMENT,
  START,
  aliceToBob,
  captureError,
  captureLogger,
  packetTo,
  settle,
  usdLedger,
} from "./fixtures.js";

const alice = Address.parse("ilp.usd.alice");
const bob = Address.parse("ilp.usd.bob");

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(START);
});

afterEach(() => {
  vi.useRealTimers();
});

describe("InMemoryLedger accounts", () => {
  it("opens accounts under its prefix", () => {
    const ledger = usdLedger();
    expect(ledger.hasAccount(alice)).toBe(true);
    expect(ledger.getAccount(alice)?.balance).toBe(1000n);
    expect(ledger.getAccount(Address.parse("ilp.usd.dave"))).toBeUndefined();
  });

  it("refuses to open an account twice", () => {
    const ledger = usdLedger();
    const err = captureError(() => ledger.addAccount("alice"));
    expect(err).toBeInstanceOf(LedgerAdaptorError);
    expect(err).toMatchObject({ code: "INVALID_ACCOUNT", message: "Account ilp.usd.alice already exists" });
  });

  it("requires a prefix", () => {
    const err = captureError(() => new InMemoryLedger({ prefix: "ilp.usd", currencyCode: "USD" }));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: "ARGUMENT_ERROR" });
  });

  it("describes itself", () => {
    const ledger = new InMemoryLedger({ prefix: "ilp.jpy.", currencyCode: "JPY", scale: 0 });
    expect(ledger.getInfo()).toEqual({
      prefix: Address.parse("ilp.jpy."),
      currencyCode: "JPY",
      currencySymbol: undefined,
      precision: 19,
      scale: 0,
    });
  });
});

describe("InMemoryLedger sessions", () => {
  it("opens a session after the hand-off delay", async () => {
    const ledger = usdLedger({ latencyMs: 50 });
    let opened = false;
    ledger.openSession(alice, () => undefined).then(() => {
      opened = true;
    }, () => undefined);

    await settle(49);
    expect(opened).toBe(false);
    await settle(1);
    expect(opened).toBe(true);
    expect(ledger.sessionCount).toBe(1);
  });

  it("refuses sessions while down and drops open ones on an outage", async () => {
    const ledger = usdLedger();
    const seen: LedgerNotification[] = [];
    const opening = ledger.openSession(alice, (n) => {
      seen.push(n);
    });
    await settle();
    const session = await opening;

    ledger.setAvailable(false);
    expect(session.open).toBe(false);
    expect(ledger.sessionCount).toBe(0);
    expect(seen).toEqual([{ kind: "session.closed", reason: "Ledger ilp.usd. is unavailable" }]);

    const refused = ledger.openSession(alice, () => undefined);
    const assertion = expect(refused).rejects.toBeInstanceOf(LedgerUnavailableError);
    await settle();
    await assertion;
  });

  it("refuses a session for an unknown account", async () => {
    const ledger = usdLedger();
    const refused = ledger.openSession(Address.parse("ilp.usd.dave"), () => undefined);
    const assertion = expect(refused).rejects.toMatchObject({ code: "INVALID_ACCOUNT" });
    await settle();
    await assertion;
  });
});

describe("InMemoryLedger transfers", () => {
  it("keeps the state history of a transfer", async () => {
    const ledger = usdLedger();
    ledger.proposeTransfer(aliceToBob());
    await settle(1000);
    ledger.fulfillTransfer("t1", FULFILLMENT);
    await settle();

    expect(ledger.getTransferHistory("t1")).toEqual([
      { state: "proposed", at: "2026-01-01T00:00:00.000Z" },
      { state: "prepared", at: "2026-01-01T00:00:00.000Z" },
      { state: "executed", at: "2026-01-01T00:00:01.000Z" },
    ]);
    expect(ledger.getAccount(bob)?.balance).toBe(100n);
  });

  it("returns the packet exactly as proposed", async () => {
    const ledger = usdLedger();
    const packet = packetTo("ilp.eur.zed", 42n, [0, 255, 7]);
    ledger.proposeTransfer(aliceToBob({ packet }));
    await settle();

    const held = ledger.getTransfer("t1");
    expect(held?.packet.equals(packet)).toBe(true);
    expect(held?.packet.fingerprint()).toBe(packet.fingerprint());
  });

  it("lets the first settling action win", async () => {
    const ledger = usdLedger();
    ledger.proposeTransfer(aliceToBob());
    await settle();

    ledger.rejectTransfer("t1", rejectionReason("cancelled", "first"));
    ledger.fulfillTransfer("t1", FULFILLMENT);
    await settle();

    expect(ledger.getTransferState("t1")).toBe("rejected");
    expect(ledger.getAccount(alice)?.balance).toBe(1000n);
    expect(ledger.getAccount(bob)?.balance).toBe(0n);
  });

  it("holds a transfer whose expiry is beyond a single timer's reach until it expires", async () => {
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    const ledger = usdLedger();
    ledger.proposeTransfer(aliceToBob({ expiresAt: new Date(START.getTime() + thirtyDays).toISOString() }));
    await settle();
    expect(ledger.getTransferState("t1")).toBe("prepared");

    await settle(thirtyDays - 1);
    expect(ledger.getTransferState("t1")).toBe("prepared");
    expect(ledger.getAccount(alice)?.balance).toBe(900n);

    await settle(1);
    expect(ledger.getTransferState("t1")).toBe("expired");
    expect(ledger.getAccount(alice)?.balance).toBe(1000n);
    expect(ledger.getTransferHistory("t1")?.at(-1)).toEqual({
      state: "expired",
      at: "2026-01-31T00:00:00.000Z",
    });
  });

  it("expires rather than executes a fulfillment arriving after expiresAt", async () => {
    const ledger = usdLedger();
    const notes: LedgerNotification[] = [];
    const opening = ledger.openSession(bob, (n) => {
      notes.push(n);
    });
    await settle();
    await opening;
    ledger.proposeTransfer(aliceToBob());
    await settle();

    vi.setSystemTime(new Date("2026-01-01T00:00:06.000Z"));
    ledger.fulfillTransfer("t1", FULFILLMENT);
    await settle();

    expect(ledger.getTransferState("t1")).toBe("expired");
    expect(ledger.getAccount(alice)?.balance).toBe(1000n);
    expect(ledger.getAccount(bob)?.balance).toBe(0n);
    expect(notes.map((n) => n.kind)).toEqual(["transfer.prepared", "transfer.rejected"]);

    await settle(10_000);
    expect(notes).toHaveLength(2);
  });

  it("throws TRANSFER_NOT_FOUND when settling an unknown transfer", () => {
    const ledger = usdLedger();
    const err = captureError(() => ledger.fulfillTransfer("nope", FULFILLMENT));
    expect(err).toMatchObject({ code: "TRANSFER_NOT_FOUND" });
  });
});

describe("InMemoryLedger messages", () => {
  it("drops and logs a message nobody is listening for", async () => {
    const { logger, lines } = captureLogger();
    const ledger = usdLedger({ logger });
    ledger.sendMessage({ ledger: ledger.prefix, from: alice, to: bob, data: { n: 1 } });
    await settle();

    const dropped = lines.filter((l) => l.msg === "Dropping undeliverable message");
    expect(dropped).toHaveLength(1);
    expect(dropped[0]).toMatchObject({
      component: "in-memory-ledger",
      ledger: "ilp.usd.",
      from: "ilp.usd.alice",
      to: "ilp.usd.bob",
    });
  });
});
