/**
 * @ilpcore/ledger-memory — In-process ledger backend.
 *
 * The ledger an InMemoryLedgerAdaptor drives. It owns everything a real
 * ledger would: balances, escrow, the state machine of every transfer it
 * holds, and the expiry timers. Adaptors reach it through sessions and see
 * its activity only as notifications.
 *
 * Rules:
 * - Escrow is taken on prepare and leaves exactly once: to the receiver on
 *   execute, back to the sender on reject or expiry
 * - Every terminal transition goes through TransferStateMachine's
 *   compare-and-set; the loser of a race is a no-op
 * - The expiry timer is cleared only by the winning transition
 * - Every hand-off completes after `latencyMs`, never inside the caller
 * - Packets are stored in memo form and decoded on the way out
 */

import {
  Address,
  ValidationError,
  decodePacketMemo,
  encodePacketMemo,
} from "@ilpcore/packet";
import {
  LedgerAdaptorError,
  TransferStateMachine,
  componentLogger,
  createTransfer,
  millisUntilExpiry,
  rejectionReason,
} from "@ilpcore/ledger";
import type {
  AccountInfo,
  LedgerInfo,
  LedgerMessage,
  Logger,
  StateChange,
  Transfer,
  TransferRejectedReason,
  TransferState,
} from "@ilpcore/ledger";

// =============================================================================
// Types
// =============================================================================

export interface InMemoryLedgerOptions {
  readonly prefix: Address | string;
  readonly currencyCode: string;
  readonly currencySymbol?: string | undefined;
  /** Default: 19 */
  readonly precision?: number | undefined;
  /** Default: 2 */
  readonly scale?: number | undefined;
  /** Delay applied to every hand-off, in ms. Default: 0 */
  readonly latencyMs?: number | undefined;
  readonly logger?: Logger | undefined;
}

export interface AccountSeed {
  /** Initial available balance. Default: 0 */
  readonly balance?: bigint | undefined;
  readonly isConnector?: boolean | undefined;
}

/** What the ledger tells a session about. */
export type LedgerNotification =
  | { readonly kind: "transfer.prepared"; readonly transfer: Transfer }
  | {
      readonly kind: "transfer.executed";
      readonly transfer: Transfer;
      readonly fulfillment?: string | undefined;
    }
  | {
      readonly kind: "transfer.rejected";
      readonly transfer: Transfer;
      readonly reason: TransferRejectedReason;
    }
  | { readonly kind: "message"; readonly message: LedgerMessage }
  | { readonly kind: "session.closed"; readonly reason: string };

export type NotificationListener = (notification: LedgerNotification) => void;

/**
 * Raised when the ledger cannot be reached. The only failure worth
 * retrying a session for.
 */
export class LedgerUnavailableError extends Error {
  constructor(public readonly prefix: string) {
    super(`Ledger ${prefix} is unavailable`);
    this.name = "LedgerUnavailableError";
  }
}

interface AccountRecord {
  readonly address: Address;
  readonly name: string;
  balance: bigint;
  isConnector: boolean;
}

interface TransferRecord {
  readonly id: string;
  readonly fromAccount: Address;
  readonly toAccount: Address;
  readonly amount: bigint;
  readonly executionCondition: string | undefined;
  readonly expiresAt: string | undefined;
  readonly memo: string;
  readonly machine: TransferStateMachine;
  timer: ReturnType<typeof setTimeout> | undefined;
}

// =============================================================================
// Session
// =============================================================================

/**
 * One adaptor's connection to the ledger. Receives notifications for the
 * accounts it subscribed to, its own account included.
 */
export class LedgerSession {
  readonly account: Address;
  private readonly subscribed = new Set<string>();
  private readonly listener: NotificationListener;
  private readonly onClose: (session: LedgerSession) => void;
  private _open = true;

  constructor(
    account: Address,
    listener: NotificationListener,
    onClose: (session: LedgerSession) => void,
  ) {
    this.account = account;
    this.listener = listener;
    this.onClose = onClose;
    this.subscribed.add(account.toString());
  }

  get open(): boolean {
    return this._open;
  }

  subscribe(account: Address): void {
    this.subscribed.add(account.toString());
  }

  isSubscribed(account: Address): boolean {
    return this.subscribed.has(account.toString());
  }

  /** Client-side close. No notification. */
  close(): void {
    if (!this._open) return;
    this._open = false;
    this.onClose(this);
  }

  /** @internal */
  notify(notification: LedgerNotification): void {
    if (this._open) this.listener(notification);
  }

  /** Ledger-side close: the listener learns why. @internal */
  drop(reason: string): void {
    if (!this._open) return;
    this._open = false;
    this.listener({ kind: "session.closed", reason });
  }
}

// =============================================================================
// Ledger
// =============================================================================

export class InMemoryLedger {
  readonly prefix: Address;
  private readonly info: LedgerInfo;
  private readonly latencyMs: number;
  private readonly logger: Logger;
  private readonly accounts = new Map<string, AccountRecord>();
  private readonly transfers = new Map<string, TransferRecord>();
  private readonly sessions = new Set<LedgerSession>();
  private available = true;

  constructor(options: InMemoryLedgerOptions) {
    this.prefix = Address.from(options.prefix);
    if (!this.prefix.isPrefix()) {
      throw new ValidationError(
        "ARGUMENT_ERROR",
        `Ledger prefix must end in '.', got "${this.prefix.toString()}"`,
      );
    }
    this.info = Object.freeze({
      prefix: this.prefix,
      currencyCode: options.currencyCode,
      currencySymbol: options.currencySymbol,
      precision: options.precision ?? 19,
      scale: options.scale ?? 2,
    });
    this.latencyMs = options.latencyMs ?? 0;
    this.logger = componentLogger("in-memory-ledger", options.logger, {
      ledger: this.prefix.toString(),
    });
  }

  getInfo(): LedgerInfo {
    return this.info;
  }

  // ─── Accounts ────────────────────────────────────────────────────────────

  /**
   * Open an account named `name` under the ledger prefix.
   * @returns the account's address
   */
  addAccount(name: string, seed: AccountSeed = {}): Address {
    const address = this.prefix.withSegment(name);
    const key = address.toString();
    if (this.accounts.has(key)) {
      throw new LedgerAdaptorError("INVALID_ACCOUNT", `Account ${key} already exists`);
    }
    const balance = seed.balance ?? 0n;
    if (balance < 0n) {
      throw new LedgerAdaptorError("INVALID_ACCOUNT", `Account ${key} cannot open with a negative balance`);
    }
    this.accounts.set(key, {
      address,
      name,
      balance,
      isConnector: seed.isConnector ?? false,
    });
    return address;
  }

  hasAccount(address: Address): boolean {
    return this.accounts.has(address.toString());
  }

  /** Snapshot of an account, or undefined if the ledger has none by that address. */
  getAccount(address: Address): AccountInfo | undefined {
    const record = this.accounts.get(address.toString());
    if (record === undefined) return undefined;
    return Object.freeze({
      address: record.address,
      name: record.name,
      balance: record.balance,
      currencyCode: this.info.currencyCode,
      scale: this.info.scale,
      isConnector: record.isConnector,
    });
  }

  /** Flag or unflag an account as connector-owned. */
  setConnector(address: Address, isConnector: boolean): void {
    this.requireAccount(address).isConnector = isConnector;
  }

  /** Connector-owned accounts, sorted by address. */
  getConnectors(): readonly Address[] {
    return [...this.accounts.values()]
      .filter((record) => record.isConnector)
      .map((record) => record.address)
      .sort((a, b) => compareText(a.toString(), b.toString()));
  }

  // ─── Availability & sessions ─────────────────────────────────────────────

  isAvailable(): boolean {
    return this.available;
  }

  /**
   * Simulate an outage (false) or recovery (true). Going down drops every
   * open session.
   */
  setAvailable(available: boolean): void {
    if (this.available === available) return;
    this.available = available;
    this.logger.info({ available }, available ? "Ledger is back" : "Ledger went down");
    if (!available) {
      const reason = `Ledger ${this.prefix.toString()} is unavailable`;
      for (const session of [...this.sessions]) {
        this.sessions.delete(session);
        session.drop(reason);
      }
    }
  }

  /**
   * Open a session acting as `account`.
   *
   * @throws LedgerUnavailableError while the ledger is down
   * @throws LedgerAdaptorError INVALID_ACCOUNT for an unknown account
   */
  async openSession(account: Address, listener: NotificationListener): Promise<LedgerSession> {
    await this.delay();
    if (!this.available) {
      throw new LedgerUnavailableError(this.prefix.toString());
    }
    this.requireAccount(account);
    const session = new LedgerSession(account, listener, (closed) => {
      this.sessions.delete(closed);
    });
    this.sessions.add(session);
    this.logger.debug({ account: account.toString() }, "Session opened");
    return session;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  // ─── Transfers ───────────────────────────────────────────────────────────

  getTransferState(id: string): TransferState | undefined {
    return this.transfers.get(id)?.machine.state;
  }

  getTransferHistory(id: string): readonly StateChange[] | undefined {
    return this.transfers.get(id)?.machine.history;
  }

  /** The transfer as the ledger holds it, packet decoded from its memo. */
  getTransfer(id: string): Transfer | undefined {
    const record = this.transfers.get(id);
    return record === undefined ? undefined : this.toTransfer(record);
  }

  /**
   * Accept a transfer in state proposed. Escrow is attempted after the
   * hand-off delay.
   *
   * @throws LedgerAdaptorError LEDGER_MISMATCH, DUPLICATE_TRANSFER or INVALID_ACCOUNT
   */
  proposeTransfer(transfer: Transfer): void {
    if (!transfer.ledger.equals(this.prefix)) {
      throw new LedgerAdaptorError(
        "LEDGER_MISMATCH",
        `Transfer ${transfer.id} is for ledger ${transfer.ledger.toString()}, not ${this.prefix.toString()}`,
      );
    }
    if (this.transfers.has(transfer.id)) {
      throw new LedgerAdaptorError("DUPLICATE_TRANSFER", `Transfer ${transfer.id} already exists`);
    }
    for (const account of [transfer.fromAccount, transfer.toAccount]) {
      if (!this.hasAccount(account)) {
        throw new LedgerAdaptorError("INVALID_ACCOUNT", `Unknown account ${account.toString()}`);
      }
    }

    const record: TransferRecord = {
      id: transfer.id,
      fromAccount: transfer.fromAccount,
      toAccount: transfer.toAccount,
      amount: transfer.amount,
      executionCondition: transfer.executionCondition,
      expiresAt: transfer.expiresAt,
      memo: encodePacketMemo(transfer.packet),
      machine: new TransferStateMachine(transfer.id),
      timer: undefined,
    };
    this.transfers.set(record.id, record);
    this.handOff(() => this.prepare(record));
  }

  /** Reject a prepared transfer, unless something else settles it first. */
  rejectTransfer(id: string, reason: TransferRejectedReason): void {
    const record = this.requireTransfer(id);
    this.handOff(() => this.settle(record, "rejected", reason));
  }

  /**
   * Execute a prepared transfer with its fulfillment, unless something
   * else settles it first. The caller has checked the fulfillment.
   */
  fulfillTransfer(id: string, fulfillment: string): void {
    const record = this.requireTransfer(id);
    this.handOff(() => this.execute(record, fulfillment));
  }

  // ─── Messages ────────────────────────────────────────────────────────────

  /** At-most-once delivery to every session subscribed to `message.to`. */
  sendMessage(message: LedgerMessage): void {
    const frozen = Object.freeze({ ...message, data: Object.freeze({ ...message.data }) });
    this.handOff(() => {
      const targets = [...this.sessions].filter((s) => s.isSubscribed(frozen.to));
      if (targets.length === 0) {
        this.logger.warn(
          { from: frozen.from.toString(), to: frozen.to.toString() },
          "Dropping undeliverable message",
        );
        return;
      }
      for (const session of targets) {
        session.notify({ kind: "message", message: frozen });
      }
    });
  }

  // ─── State transitions ───────────────────────────────────────────────────

  private prepare(record: TransferRecord): void {
    const from = this.requireAccount(record.fromAccount);

    if (from.balance < record.amount) {
      if (record.machine.tryTransition("proposed", "rejected")) {
        this.logger.info({ transferId: record.id }, "Transfer refused: insufficient funds");
        this.publish(record, {
          kind: "transfer.rejected",
          reason: rejectionReason(
            "insufficient-funds",
            `Account ${record.fromAccount.toString()} cannot cover ${record.amount}`,
          ),
        });
      }
      return;
    }

    if (!record.machine.tryTransition("proposed", "prepared")) return;
    from.balance -= record.amount;
    this.logger.debug({ transferId: record.id, amount: String(record.amount) }, "Transfer prepared");
    this.publish(record, { kind: "transfer.prepared" });

    if (record.executionCondition === undefined) {
      this.execute(record, undefined);
      return;
    }

    this.armExpiry(record);
  }

  /**
   * Schedule expiry, re-arming in steps when the wait is longer than a
   * single timer can hold. record.timer always holds the pending one.
   */
  private armExpiry(record: TransferRecord): void {
    const wait = millisUntilExpiry(this.toTransfer(record), Date.now());
    if (wait === undefined) return;
    if (wait > MAX_TIMER_DELAY_MS) {
      record.timer = setTimeout(() => this.armExpiry(record), MAX_TIMER_DELAY_MS);
      return;
    }
    record.timer = setTimeout(() => this.expire(record), wait);
  }

  private execute(record: TransferRecord, fulfillment: string | undefined): void {
    if (record.executionCondition !== undefined && isPastExpiry(record.expiresAt, Date.now())) {
      this.expire(record);
      return;
    }
    if (!record.machine.tryTransition("prepared", "executed")) return;
    this.clearTimer(record);
    this.requireAccount(record.toAccount).balance += record.amount;
    this.logger.debug({ transferId: record.id }, "Transfer executed");
    this.publish(record, { kind: "transfer.executed", fulfillment });
  }

  private settle(record: TransferRecord, to: "rejected" | "expired", reason: TransferRejectedReason): void {
    if (!record.machine.tryTransition("prepared", to)) return;
    this.clearTimer(record);
    this.requireAccount(record.fromAccount).balance += record.amount;
    this.logger.debug({ transferId: record.id, code: reason.code }, "Transfer rejected");
    this.publish(record, { kind: "transfer.rejected", reason });
  }

  private expire(record: TransferRecord): void {
    this.clearTimer(record);
    this.settle(
      record,
      "expired",
      rejectionReason("expired", `Transfer ${record.id} expired at ${record.expiresAt ?? "an unknown time"}`),
    );
  }

  private clearTimer(record: TransferRecord): void {
    if (record.timer !== undefined) {
      clearTimeout(record.timer);
      record.timer = undefined;
    }
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  /** Tell every session watching either side of the transfer, once each. */
  private publish(
    record: TransferRecord,
    body:
      | { readonly kind: "transfer.prepared" }
      | { readonly kind: "transfer.executed"; readonly fulfillment: string | undefined }
      | { readonly kind: "transfer.rejected"; readonly reason: TransferRejectedReason },
  ): void {
    const transfer = this.toTransfer(record);
    const notification: LedgerNotification = { ...body, transfer };
    for (const session of [...this.sessions]) {
      if (session.isSubscribed(record.fromAccount) || session.isSubscribed(record.toAccount)) {
        session.notify(notification);
      }
    }
  }

  private toTransfer(record: TransferRecord): Transfer {
    return createTransfer({
      id: record.id,
      ledger: this.prefix,
      fromAccount: record.fromAccount,
      toAccount: record.toAccount,
      amount: record.amount,
      executionCondition: record.executionCondition,
      expiresAt: record.expiresAt,
      packet: decodePacketMemo(record.memo),
    });
  }

  private requireAccount(address: Address): AccountRecord {
    const record = this.accounts.get(address.toString());
    if (record === undefined) {
      throw new LedgerAdaptorError("INVALID_ACCOUNT", `Unknown account ${address.toString()}`);
    }
    return record;
  }

  private requireTransfer(id: string): TransferRecord {
    const record = this.transfers.get(id);
    if (record === undefined) {
      throw new LedgerAdaptorError("TRANSFER_NOT_FOUND", `Unknown transfer ${id}`);
    }
    return record;
  }

  private handOff(work: () => void): void {
    setTimeout(() => {
      try {
        work();
      } catch (err: unknown) {
        this.logger.error({ err }, "Ledger hand-off failed");
      }
    }, this.latencyMs);
  }

  private delay(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, this.latencyMs));
  }
}

/** Longest delay setTimeout honours; anything larger fires at once. */
const MAX_TIMER_DELAY_MS = 0x7fffffff;

function isPastExpiry(expiresAt: string | undefined, now: number): boolean {
  return expiresAt !== undefined && now >= Date.parse(expiresAt);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
