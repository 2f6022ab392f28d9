/**
 * Shared setup for ledger-memory tests.
 */

import { vi } from "vitest";
import { pino } from "pino";
import type { Logger } from "pino";
import { Address, PaymentPacket } from "@ilpcore/packet";
import { createTransfer } from "@ilpcore/ledger";
import type { LedgerEvent, LogLevel, Transfer, TransferInput } from "@ilpcore/ledger";
import { parseAdaptorConfig } from "../src/config.js";
import { InMemoryLedger } from "../src/in-memory-ledger.js";
import type { InMemoryLedgerOptions } from "../src/in-memory-ledger.js";
import { InMemoryLedgerAdaptor } from "../src/in-memory-adaptor.js";
import type { RetryConfig } from "../src/retry.js";

export const START = new Date("2026-01-01T00:00:00.000Z");

/** 32 zero bytes, and its SHA-256 condition */
export const FULFILLMENT = "AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA";
export const CONDITION = "Zmh6rfhivXdsj8GLjp-OIAiXFIVu4jOzkCpZHQ1fKSU";
/** 32 bytes of 0x01: a valid fulfillment for some other condition */
export const WRONG_FULFILLMENT = "AQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQE";

export const FAST_RECONNECT: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  jitterMs: 0,
};

/** Advance fake time and let every resulting promise chain finish. */
export async function settle(ms = 0): Promise<void> {
  await vi.advanceTimersByTimeAsync(ms);
}

/**
 * ilp.usd. with alice (1000), bob (0) and connie (500, connector).
 */
export function usdLedger(options: Partial<InMemoryLedgerOptions> = {}): InMemoryLedger {
  const ledger = new InMemoryLedger({ prefix: "ilp.usd.", currencyCode: "USD", currencySymbol: "$", ...options });
  ledger.addAccount("alice", { balance: 1000n });
  ledger.addAccount("bob");
  ledger.addAccount("connie", { balance: 500n, isConnector: true });
  return ledger;
}

/** Silent unless given a logger; then at `logLevel` (default info). */
export function adaptorFor(
  ledger: InMemoryLedger,
  account: string,
  logger?: Logger,
  logLevel: LogLevel = logger === undefined ? "silent" : "info",
): InMemoryLedgerAdaptor {
  const config = parseAdaptorConfig({
    ledgerPrefix: ledger.prefix.toString(),
    account: `${ledger.prefix.toString()}${account}`,
    reconnect: FAST_RECONNECT,
    logLevel,
  });
  return new InMemoryLedgerAdaptor(ledger, config, { logger });
}

/** Install a handler that collects every event the adaptor raises. */
export function recordEvents(adaptor: InMemoryLedgerAdaptor): LedgerEvent[] {
  const events: LedgerEvent[] = [];
  adaptor.setEventHandler((event) => {
    events.push(event);
  });
  return events;
}

export function packetTo(destination: string, amount: bigint, data: number[] = []): PaymentPacket {
  return PaymentPacket.builder()
    .destinationAccount(Address.parse(destination))
    .destinationAmount(amount)
    .data(new Uint8Array(data))
    .build();
}

/**
 * alice → bob, 100, conditional, expiring five seconds after START.
 */
export function aliceToBob(overrides: Partial<TransferInput> = {}): Transfer {
  return createTransfer({
    id: "t1",
    ledger: "ilp.usd.",
    fromAccount: "ilp.usd.alice",
    toAccount: "ilp.usd.bob",
    amount: 100n,
    executionCondition: CONDITION,
    expiresAt: "2026-01-01T00:00:05.000Z",
    packet: packetTo("ilp.usd.bob", 100n),
    ...overrides,
  });
}

/** A pino logger that collects its JSON lines in memory. */
export function captureLogger(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        const parsed: unknown = JSON.parse(msg);
        if (parsed !== null && typeof parsed === "object") {
          lines.push({ ...parsed });
        }
      },
    },
  );
  return { logger, lines };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}
