/**
 * @ilpcore/ledger-memory — LedgerAdaptor over an InMemoryLedger.
 *
 * Acts as one account on one ledger. Calls validate synchronously and hand
 * off to the ledger; the ledger's notifications come back as LedgerEvents
 * through this adaptor's own dispatcher.
 *
 * Rules:
 * - A failed precondition throws and leaves nothing behind
 * - isConnected() flips only when a connect or disconnect event is raised
 * - A dropped session is re-opened with exponential backoff; giving up is
 *   reported as a disconnect event
 * - Notifications from a superseded session are ignored
 */

import type { Address } from "@ilpcore/packet";
import {
  EventDispatcher,
  LedgerAdaptorError,
  componentLogger,
  createLogger,
  fulfillmentMatches,
} from "@ilpcore/ledger";
import type {
  AccountInfo,
  LedgerAdaptor,
  LedgerEvent,
  LedgerEventBody,
  LedgerEventHandler,
  LedgerInfo,
  LedgerMessage,
  Logger,
  Transfer,
  TransferDirection,
  TransferRejectedReason,
  TransferState,
} from "@ilpcore/ledger";
import type { InMemoryAdaptorConfig } from "./config.js";
import type { InMemoryLedger, LedgerNotification, LedgerSession } from "./in-memory-ledger.js";
import { RetryAbortedError, sleep, withRetry } from "./retry.js";

export interface InMemoryLedgerAdaptorOptions {
  /** Parent logger. Default: a pino logger on stdout. Either way config.logLevel applies */
  readonly logger?: Logger | undefined;
  /** Backoff sleep between reconnect attempts. Default: setTimeout-based */
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
}

export class InMemoryLedgerAdaptor implements LedgerAdaptor {
  readonly ledger: Address;
  readonly account: Address;

  private readonly backend: InMemoryLedger;
  private readonly config: InMemoryAdaptorConfig;
  private readonly dispatcher: EventDispatcher;
  private readonly logger: Logger;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly subscriptions = new Map<string, Address>();

  private session: LedgerSession | undefined;
  private connected = false;
  /** Whether the caller wants a connection (connect() without a later disconnect()). */
  private wanted = false;
  /** Bumped by every connect()/disconnect(); stale attempts and sessions compare against it. */
  private generation = 0;
  private sequence = 0;

  constructor(
    backend: InMemoryLedger,
    config: InMemoryAdaptorConfig,
    options: InMemoryLedgerAdaptorOptions = {},
  ) {
    if (!config.ledgerPrefix.equals(backend.prefix)) {
      throw new LedgerAdaptorError(
        "LEDGER_MISMATCH",
        `Configured for ${config.ledgerPrefix.toString()} but the ledger is ${backend.prefix.toString()}`,
      );
    }
    this.backend = backend;
    this.config = config;
    this.ledger = backend.prefix;
    this.account = config.account;
    this.logger = componentLogger(
      "in-memory-adaptor",
      options.logger ?? createLogger({ level: config.logLevel }),
      { ledger: this.ledger.toString(), account: this.account.toString() },
      config.logLevel,
    );
    this.dispatcher = new EventDispatcher(this.logger);
    this.sleepFn = options.sleep ?? sleep;
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────

  connect(): void {
    if (this.wanted) return;
    this.wanted = true;
    const generation = ++this.generation;
    this.logger.info("Connecting to ledger");
    this.openSession(generation).catch((err: unknown) => {
      this.logger.error({ err }, "Connection attempt failed unexpectedly");
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  disconnect(): void {
    if (!this.wanted && !this.connected) return;
    this.wanted = false;
    this.generation++;
    const session = this.session;
    this.session = undefined;
    session?.close();
    if (this.connected) {
      this.logger.info("Disconnected from ledger");
      this.raise({ type: "disconnect", ledger: this.ledger, reason: "Disconnected by client" });
    }
  }

  setEventHandler(handler: LedgerEventHandler | undefined): void {
    this.dispatcher.setHandler(handler);
  }

  /** Resolves once every event raised so far has been handled. */
  idle(): Promise<void> {
    return this.dispatcher.idle();
  }

  // ─── Queries ─────────────────────────────────────────────────────────────

  getLedgerInfo(): LedgerInfo {
    return this.backend.getInfo();
  }

  getAccountInfo(account: Address): AccountInfo {
    this.requireConnected("get account info");
    const info = this.backend.getAccount(account);
    if (info === undefined) {
      throw new LedgerAdaptorError("ACCOUNT_NOT_FOUND", `No account ${account.toString()} on ${this.ledger.toString()}`);
    }
    return info;
  }

  getConnectors(): readonly Address[] {
    this.requireConnected("list connectors");
    return this.backend.getConnectors();
  }

  /** Current state of a transfer held by the ledger. */
  getTransferState(transferId: string): TransferState {
    this.requireConnected("get transfer state");
    const state = this.backend.getTransferState(transferId);
    if (state === undefined) {
      throw new LedgerAdaptorError("TRANSFER_NOT_FOUND", `Unknown transfer ${transferId}`);
    }
    return state;
  }

  // ─── Operations ──────────────────────────────────────────────────────────

  subscribeToAccountNotifications(account: Address): void {
    if (!this.ledger.isPrefixOf(account)) {
      throw new LedgerAdaptorError(
        "LEDGER_MISMATCH",
        `${account.toString()} is not on ledger ${this.ledger.toString()}`,
      );
    }
    if (account.isPrefix()) {
      throw new LedgerAdaptorError("INVALID_ACCOUNT", `${account.toString()} is a prefix, not an account`);
    }
    const key = account.toString();
    if (this.subscriptions.has(key)) return;
    this.subscriptions.set(key, account);
    this.session?.subscribe(account);
    this.logger.debug({ subscribed: key }, "Subscribed to account notifications");
  }

  sendMessage(message: LedgerMessage): void {
    this.requireConnected("send a message");
    this.requireLedger(message.ledger, "Message");
    if (!message.from.equals(this.account)) {
      throw new LedgerAdaptorError(
        "UNAUTHORIZED",
        `${this.account.toString()} cannot send a message as ${message.from.toString()}`,
      );
    }
    this.backend.sendMessage(message);
  }

  sendTransfer(transfer: Transfer): void {
    this.requireConnected("send a transfer");
    this.requireLedger(transfer.ledger, `Transfer ${transfer.id}`);
    if (!transfer.fromAccount.equals(this.account)) {
      throw new LedgerAdaptorError(
        "UNAUTHORIZED",
        `${this.account.toString()} cannot send transfer ${transfer.id} from ${transfer.fromAccount.toString()}`,
      );
    }
    this.backend.proposeTransfer(transfer);
    this.logger.debug({ transferId: transfer.id, amount: String(transfer.amount) }, "Transfer proposed");
  }

  rejectTransfer(transfer: Transfer, reason: TransferRejectedReason): void {
    this.requireConnected("reject a transfer");
    this.requireLedger(transfer.ledger, `Transfer ${transfer.id}`);
    this.requirePreparedForReceiver(transfer.id, "reject");
    this.backend.rejectTransfer(transfer.id, reason);
  }

  /**
   * Present the fulfillment of a prepared conditional transfer addressed to
   * this account. Execution is reported as transfer.executed.
   *
   * @throws NOT_CONNECTED, TRANSFER_NOT_FOUND, UNAUTHORIZED, INVALID_STATE, INVALID_FULFILLMENT
   */
  fulfillCondition(transferId: string, fulfillment: string): void {
    this.requireConnected("fulfill a condition");
    const held = this.requirePreparedForReceiver(transferId, "fulfill");
    if (held.executionCondition === undefined) {
      throw new LedgerAdaptorError("INVALID_STATE", `Transfer ${transferId} has no condition to fulfill`);
    }
    if (held.expiresAt !== undefined && Date.now() >= Date.parse(held.expiresAt)) {
      throw new LedgerAdaptorError(
        "INVALID_STATE",
        `Transfer ${transferId} expired at ${held.expiresAt}`,
      );
    }
    if (!fulfillmentMatches(held.executionCondition, fulfillment)) {
      throw new LedgerAdaptorError(
        "INVALID_FULFILLMENT",
        `Fulfillment does not match the condition of transfer ${transferId}`,
      );
    }
    this.backend.fulfillTransfer(transferId, fulfillment);
  }

  // ─── Connection ──────────────────────────────────────────────────────────

  private async openSession(generation: number): Promise<void> {
    let session: LedgerSession;
    try {
      session = await withRetry(
        () => this.backend.openSession(this.account, (n) => this.onNotification(generation, n)),
        {
          ledger: this.ledger.toString(),
          config: this.config.reconnect,
          isStale: () => generation !== this.generation,
          sleep: this.sleepFn,
          onRetry: (attempt, delayMs) => {
            this.logger.info({ attempt, delayMs }, "Retrying ledger connection");
          },
        },
      );
    } catch (err: unknown) {
      if (err instanceof RetryAbortedError) {
        this.logger.debug("Abandoned a superseded connection attempt");
        return;
      }
      const reason = err instanceof Error ? err.message : String(err);
      this.wanted = false;
      this.logger.warn({ err }, "Could not connect to ledger");
      this.raise({ type: "disconnect", ledger: this.ledger, reason });
      return;
    }

    this.session = session;
    for (const account of this.subscriptions.values()) {
      session.subscribe(account);
    }
    this.logger.info("Connected to ledger");
    this.raise({ type: "connect", ledger: this.ledger, account: this.account });
  }

  private onNotification(generation: number, notification: LedgerNotification): void {
    if (generation !== this.generation) return;

    switch (notification.kind) {
      case "transfer.prepared":
        this.raise({
          type: "transfer.prepared",
          ledger: this.ledger,
          transfer: notification.transfer,
          direction: this.directionOf(notification.transfer),
        });
        return;
      case "transfer.executed":
        this.raise({
          type: "transfer.executed",
          ledger: this.ledger,
          transfer: notification.transfer,
          direction: this.directionOf(notification.transfer),
          fulfillment: notification.fulfillment,
        });
        return;
      case "transfer.rejected":
        this.raise({
          type: "transfer.rejected",
          ledger: this.ledger,
          transfer: notification.transfer,
          direction: this.directionOf(notification.transfer),
          reason: notification.reason,
        });
        return;
      case "message":
        this.raise({ type: "message.received", ledger: this.ledger, message: notification.message });
        return;
      case "session.closed":
        this.onSessionLost(generation, notification.reason);
        return;
    }
  }

  private onSessionLost(generation: number, reason: string): void {
    this.session = undefined;
    this.logger.warn({ reason }, "Ledger session lost, reconnecting");
    this.raise({ type: "disconnect", ledger: this.ledger, reason });
    this.openSession(generation).catch((err: unknown) => {
      this.logger.error({ err }, "Reconnect failed unexpectedly");
    });
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────

  private raise(body: LedgerEventBody): void {
    if (body.type === "connect") this.connected = true;
    if (body.type === "disconnect") this.connected = false;

    const event: LedgerEvent = Object.freeze({
      ...body,
      sequence: ++this.sequence,
      timestamp: new Date().toISOString(),
    });
    this.dispatcher.dispatch(event);
  }

  private directionOf(transfer: Transfer): TransferDirection {
    const from = transfer.fromAccount;
    return from.equals(this.account) || this.subscriptions.has(from.toString())
      ? "outgoing"
      : "incoming";
  }

  private requireConnected(action: string): void {
    if (!this.connected) {
      throw new LedgerAdaptorError(
        "NOT_CONNECTED",
        `Cannot ${action}: not connected to ${this.ledger.toString()}`,
      );
    }
  }

  private requireLedger(ledger: Address, subject: string): void {
    if (!ledger.equals(this.ledger)) {
      throw new LedgerAdaptorError(
        "LEDGER_MISMATCH",
        `${subject} is for ledger ${ledger.toString()}, not ${this.ledger.toString()}`,
      );
    }
  }

  /** The held transfer, if it is prepared and addressed to this account. */
  private requirePreparedForReceiver(transferId: string, action: string): Transfer {
    const held = this.backend.getTransfer(transferId);
    const state = this.backend.getTransferState(transferId);
    if (held === undefined || state === undefined) {
      throw new LedgerAdaptorError("TRANSFER_NOT_FOUND", `Unknown transfer ${transferId}`);
    }
    if (!held.toAccount.equals(this.account)) {
      throw new LedgerAdaptorError(
        "UNAUTHORIZED",
        `Only the receiver ${held.toAccount.toString()} may ${action} transfer ${transferId}`,
      );
    }
    if (state !== "prepared") {
      throw new LedgerAdaptorError(
        "INVALID_STATE",
        `Cannot ${action} transfer ${transferId} in state ${state}`,
      );
    }
    return held;
  }
}
