/**
 * Per-adaptor event dispatcher.
 *
 * Holds the single handler slot and a FIFO of pending events. Delivery is
 * sequential: the next event is handed over only after the handler (and
 * any promise it returned) has finished. Delivery always starts on a later
 * microtask, never inside the call that raised the event.
 *
 * A slow handler delays only this dispatcher's queue. A failing handler is
 * logged and delivery continues with the next event.
 */

import type { Logger } from "pino";
import type { LedgerEvent, LedgerEventHandler } from "./events.js";
import { componentLogger } from "./logger.js";

export class EventDispatcher {
  private _handler: LedgerEventHandler | undefined;
  private readonly _queue: LedgerEvent[] = [];
  private _draining: Promise<void> | undefined;
  private readonly _logger: Logger;

  constructor(logger?: Logger) {
    this._logger = componentLogger("event-dispatcher", logger);
  }

  /**
   * Install the handler, replacing (and detaching) any previous one.
   * Pass undefined to detach without a replacement. An event already
   * being handled finishes on the handler it started with.
   */
  setHandler(handler: LedgerEventHandler | undefined): void {
    this._handler = handler;
  }

  hasHandler(): boolean {
    return this._handler !== undefined;
  }

  /** Number of events waiting for delivery. */
  get pending(): number {
    return this._queue.length;
  }

  dispatch(event: LedgerEvent): void {
    this._queue.push(event);
    this._schedule();
  }

  /** Resolves once every queued event has been delivered. */
  async idle(): Promise<void> {
    while (this._draining !== undefined) {
      await this._draining;
    }
  }

  private _schedule(): void {
    if (this._draining !== undefined) return;
    this._draining = Promise.resolve()
      .then(() => this._drain())
      .finally(() => {
        this._draining = undefined;
        if (this._queue.length > 0) this._schedule();
      });
  }

  private async _drain(): Promise<void> {
    let event = this._queue.shift();
    while (event !== undefined) {
      await this._deliver(event);
      event = this._queue.shift();
    }
  }

  private async _deliver(event: LedgerEvent): Promise<void> {
    const handler = this._handler;
    if (handler === undefined) {
      this._logger.debug(
        { eventType: event.type, sequence: event.sequence },
        "No handler installed, dropping ledger event",
      );
      return;
    }

    try {
      await handler(event);
    } catch (err: unknown) {
      this._logger.error(
        { err, eventType: event.type, sequence: event.sequence },
        "Ledger event handler failed",
      );
    }
  }
}
