/**
 * Conditional-transfer state machine.
 *
 *   proposed ──► prepared ──► executed     (fulfillment presented before expiry)
 *      │            ├───────► rejected     (receiver rejected)
 *      │            └───────► expired      (expiry timer fired)
 *      └──────────────────────► rejected   (ledger refused to escrow)
 *
 * Unconditional transfers pass through prepared with a zero-length window.
 *
 * Every transition goes through a compare-and-set: it succeeds only if the
 * transfer is still in the expected state. Whichever of execute, reject or
 * expire gets there first wins; the others are no-ops.
 */

import type { TransferState } from "./types.js";
import { LedgerAdaptorError } from "./types.js";

const validTransitions: Readonly<Record<TransferState, readonly TransferState[]>> = {
  proposed: ["prepared", "rejected"],
  prepared: ["executed", "rejected", "expired"],
  executed: [],
  rejected: [],
  expired: [],
};

export function isValidTransition(from: TransferState, to: TransferState): boolean {
  return validTransitions[from].includes(to);
}

export function isTerminalState(state: TransferState): boolean {
  return validTransitions[state].length === 0;
}

export function getAllowedTransitions(state: TransferState): readonly TransferState[] {
  return validTransitions[state];
}

/**
 * Throws INVALID_STATE if `to` is not reachable from `from` in one step.
 */
export function assertTransition(
  from: TransferState,
  to: TransferState,
  transferId: string,
): void {
  if (!isValidTransition(from, to)) {
    throw new LedgerAdaptorError(
      "INVALID_STATE",
      `Invalid state transition from ${from} to ${to} for transfer ${transferId}`,
    );
  }
}

/** One entry in a transfer's state history. */
export interface StateChange {
  readonly state: TransferState;
  readonly at: string;
}

/**
 * State of a single transfer. Owned by whichever ledger holds the escrow.
 */
export class TransferStateMachine {
  readonly transferId: string;
  private _state: TransferState = "proposed";
  private readonly _history: StateChange[];
  private readonly _now: () => number;

  constructor(transferId: string, now: () => number = Date.now) {
    this.transferId = transferId;
    this._now = now;
    this._history = [{ state: "proposed", at: this.timestamp() }];
  }

  get state(): TransferState {
    return this._state;
  }

  /** Every state the transfer has been in, oldest first. */
  get history(): readonly StateChange[] {
    return [...this._history];
  }

  isTerminal(): boolean {
    return isTerminalState(this._state);
  }

  /**
   * Move from `from` to `to` if and only if the transfer is currently in
   * `from` and the step is in the transition table.
   *
   * @returns true if this call performed the transition
   */
  tryTransition(from: TransferState, to: TransferState): boolean {
    if (this._state !== from || !isValidTransition(from, to)) {
      return false;
    }
    this._state = to;
    this._history.push({ state: to, at: this.timestamp() });
    return true;
  }

  private timestamp(): string {
    return new Date(this._now()).toISOString();
  }
}
