/**
 * Adaptor Registry
 *
 * Holds the adaptors a connector drives, one per ledger prefix.
 * Provides a single entry point for multi-ledger lifecycle and routing.
 *
 * Design rules:
 * - Adaptors are registered, not auto-discovered
 * - Each ledger prefix has at most one adaptor
 * - Lifecycle calls fan out to every adaptor
 * - One adaptor's failure doesn't block the others
 */

import type { Address } from "@ilpcore/packet";
import type { LedgerAdaptor } from "./adaptor.js";
import type { LedgerEvent } from "./events.js";
import { LedgerAdaptorError } from "./types.js";

/** Connector-level handler: every event, tagged with the adaptor it came from. */
export type RegistryEventHandler = (
  event: LedgerEvent,
  adaptor: LedgerAdaptor,
) => void | Promise<void>;

/**
 * Result of a fan-out operation that may partially fail.
 */
export interface MultiLedgerResult {
  readonly succeeded: readonly string[];
  readonly errors: readonly { readonly ledger: string; readonly error: string }[];
}

export class AdaptorRegistry {
  private readonly adaptors: Map<string, LedgerAdaptor> = new Map();
  private handler: RegistryEventHandler | undefined;

  /**
   * Register an adaptor for its ledger.
   * An installed connector handler is attached to it immediately.
   */
  register(adaptor: LedgerAdaptor): void {
    const key = adaptor.ledger.toString();
    if (this.adaptors.has(key)) {
      throw new LedgerAdaptorError(
        "DUPLICATE_ADAPTOR",
        `An adaptor for ledger '${key}' is already registered`,
      );
    }
    this.adaptors.set(key, adaptor);
    if (this.handler !== undefined) {
      this.attach(adaptor, this.handler);
    }
  }

  /**
   * Remove the adaptor for a ledger and detach its handler.
   * Returns true if an adaptor was removed.
   */
  unregister(ledger: Address | string): boolean {
    const key = ledger.toString();
    const adaptor = this.adaptors.get(key);
    if (adaptor === undefined) return false;
    adaptor.setEventHandler(undefined);
    return this.adaptors.delete(key);
  }

  get(ledger: Address | string): LedgerAdaptor {
    const key = ledger.toString();
    const adaptor = this.adaptors.get(key);
    if (adaptor === undefined) {
      throw new LedgerAdaptorError(
        "UNKNOWN_LEDGER",
        `No adaptor registered for ledger '${key}'`,
      );
    }
    return adaptor;
  }

  has(ledger: Address | string): boolean {
    return this.adaptors.has(ledger.toString());
  }

  /** Registered ledger prefixes, in registration order. */
  listLedgers(): readonly Address[] {
    return [...this.adaptors.values()].map((a) => a.ledger);
  }

  /**
   * The adaptor whose ledger prefix is the longest segment-aligned prefix
   * of `address`, or undefined if none matches.
   */
  resolve(address: Address): LedgerAdaptor | undefined {
    let best: LedgerAdaptor | undefined;
    for (const adaptor of this.adaptors.values()) {
      if (!adaptor.ledger.isPrefixOf(address)) continue;
      if (best === undefined || adaptor.ledger.segments.length > best.ledger.segments.length) {
        best = adaptor;
      }
    }
    return best;
  }

  /**
   * Install one handler across every adaptor, current and future.
   * Pass undefined to detach.
   */
  setEventHandler(handler: RegistryEventHandler | undefined): void {
    this.handler = handler;
    for (const adaptor of this.adaptors.values()) {
      if (handler === undefined) {
        adaptor.setEventHandler(undefined);
      } else {
        this.attach(adaptor, handler);
      }
    }
  }

  /** Start connecting every adaptor. Outcomes arrive as events. */
  connectAll(): MultiLedgerResult {
    return this.fanOut((adaptor) => adaptor.connect());
  }

  disconnectAll(): MultiLedgerResult {
    return this.fanOut((adaptor) => adaptor.disconnect());
  }

  private attach(adaptor: LedgerAdaptor, handler: RegistryEventHandler): void {
    adaptor.setEventHandler((event) => handler(event, adaptor));
  }

  private fanOut(action: (adaptor: LedgerAdaptor) => void): MultiLedgerResult {
    const succeeded: string[] = [];
    const errors: { readonly ledger: string; readonly error: string }[] = [];

    for (const [ledger, adaptor] of this.adaptors) {
      try {
        action(adaptor);
        succeeded.push(ledger);
      } catch (err: unknown) {
        errors.push({
          ledger,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return { succeeded, errors };
  }
}
