/**
 * Tests for connection loss and recovery.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { LedgerEvent } from "@ilpcore/ledger";
import type { InMemoryLedger } from "../src/in-memory-ledger.js";
import type { InMemoryLedgerAdaptor } from "../src/in-memory-adaptor.js";
import {
  START,
  adaptorFor,
  aliceToBob,
  captureLogger,
  recordEvents,
  settle,
  usdLedger,
} from "./fixtures.js";

const EXHAUSTED = "Gave up on ledger ilp.usd. after 3 attempts: Ledger ilp.usd. is unavailable";

let ledger: InMemoryLedger;
let adaptor: InMemoryLedgerAdaptor;
let events: LedgerEvent[];

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(START);
  ledger = usdLedger();
  adaptor = adaptorFor(ledger, "alice");
  events = recordEvents(adaptor);
});

afterEach(() => {
  vi.useRealTimers();
});

function types(): string[] {
  return events.map((e) => e.type);
}

describe("session loss", () => {
  it("reports the drop at once and reconnects when the ledger returns", async () => {
    adaptor.connect();
    await settle();

    ledger.setAvailable(false);
    expect(adaptor.isConnected()).toBe(false);

    // First attempt fails at t=0, next one is due at t=100
    await settle();
    ledger.setAvailable(true);
    await settle(100);
    await settle();

    expect(types()).toEqual(["connect", "disconnect", "connect"]);
    expect(events[1]).toMatchObject({ reason: "Ledger ilp.usd. is unavailable" });
    expect(events.map((e) => e.sequence)).toEqual([1, 2, 3]);
    expect(adaptor.isConnected()).toBe(true);
  });

  it("keeps its subscriptions across a reconnect", async () => {
    const bob = adaptorFor(ledger, "bob");
    bob.connect();
    adaptor.connect();
    await settle();

    ledger.setAvailable(false);
    ledger.setAvailable(true);
    await settle(100);

    adaptor.sendTransfer(aliceToBob());
    await settle();
    expect(types()).toEqual(["connect", "disconnect", "connect", "transfer.prepared"]);
  });

  it("gives up after the configured attempts with a disconnect event", async () => {
    adaptor.connect();
    await settle();

    ledger.setAvailable(false);
    await settle(1000);

    expect(types()).toEqual(["connect", "disconnect", "disconnect"]);
    expect(events[2]).toMatchObject({ reason: EXHAUSTED });
    expect(adaptor.isConnected()).toBe(false);

    ledger.setAvailable(true);
    adaptor.connect();
    await settle();
    expect(types()).toEqual(["connect", "disconnect", "disconnect", "connect"]);
  });

  it("logs each retry", async () => {
    const { logger, lines } = captureLogger();
    const logged = adaptorFor(ledger, "bob", logger);
    logged.connect();
    await settle();

    ledger.setAvailable(false);
    await settle(1000);

    const retries = lines.filter((l) => l.msg === "Retrying ledger connection");
    expect(retries.map((l) => l.attempt)).toEqual([1, 2]);
    expect(retries.map((l) => l.delayMs)).toEqual([100, 200]);
    expect(retries[0]).toMatchObject({ component: "in-memory-adaptor", account: "ilp.usd.bob" });
  });

  it("logs at the configured level", async () => {
    const { logger, lines } = captureLogger();
    const quiet = adaptorFor(ledger, "bob", logger, "warn");
    quiet.connect();
    await settle();

    ledger.setAvailable(false);
    await settle(1000);

    expect(lines.map((l) => l.msg)).toEqual([
      "Ledger session lost, reconnecting",
      "Could not connect to ledger",
    ]);
    expect(lines.map((l) => l.level)).toEqual([40, 40]);
  });
});

describe("connecting", () => {
  it("reports an unreachable ledger as a disconnect event", async () => {
    ledger.setAvailable(false);
    adaptor.connect();
    await settle(1000);

    expect(types()).toEqual(["disconnect"]);
    expect(events[0]).toMatchObject({ reason: EXHAUSTED });
    expect(adaptor.isConnected()).toBe(false);
  });

  it("abandons a pending attempt when disconnected", async () => {
    adaptor.connect();
    adaptor.disconnect();
    await settle();

    expect(types()).toEqual([]);
    expect(adaptor.isConnected()).toBe(false);
    expect(ledger.sessionCount).toBe(0);
  });

  it("abandons the backoff when disconnected", async () => {
    adaptor.connect();
    await settle();
    ledger.setAvailable(false);
    await settle();

    adaptor.disconnect();
    ledger.setAvailable(true);
    await settle(1000);

    expect(types()).toEqual(["connect", "disconnect"]);
    expect(adaptor.isConnected()).toBe(false);
    expect(ledger.sessionCount).toBe(0);
  });

  it("ignores connect() while already connecting or connected", async () => {
    adaptor.connect();
    adaptor.connect();
    await settle();
    adaptor.connect();
    await settle();

    expect(types()).toEqual(["connect"]);
    expect(ledger.sessionCount).toBe(1);
  });
});
