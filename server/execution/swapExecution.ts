import { type Decimal, ZERO } from "../core/decimal";
import { type DexError, isDexError, toErrorMessage } from "../core/errors";
import { type SwapResult } from "./types";

export type SwapState = "NotApproved" | "Approved" | "Submitted" | "Confirmed" | "Reverted" | "TimedOut";

const TRANSITIONS: Record<SwapState, readonly SwapState[]> = {
  NotApproved: ["Approved"],
  Approved: ["Submitted"],
  Submitted: ["Confirmed", "Reverted", "TimedOut"],
  Confirmed: [],
  Reverted: [],
  TimedOut: [],
};

export interface SwapTransition {
  state: SwapState;
  at: number;
  txHash?: string;
}

/**
 * Approve-then-swap as an explicit state machine, so an approval that
 * succeeded followed by a swap that failed stays observable.
 */
export class SwapExecution {
  private current: SwapState = "NotApproved";
  readonly history: SwapTransition[] = [{ state: "NotApproved", at: Date.now() }];
  approvalTxHash?: string;
  txHash?: string;
  error?: DexError | Error;

  constructor(readonly amountSpent: Decimal) {}

  get state(): SwapState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  private transition(next: SwapState, txHash?: string): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid swap transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push({ state: next, at: Date.now(), txHash });
  }

  /** `approvalTxHash` is absent when the existing allowance already covered the swap. */
  markApproved(approvalTxHash?: string): void {
    this.approvalTxHash = approvalTxHash;
    this.transition("Approved", approvalTxHash);
  }

  markSubmitted(txHash: string): void {
    this.txHash = txHash;
    this.transition("Submitted", txHash);
  }

  confirm(amountReceived: Decimal): SwapResult {
    this.transition("Confirmed", this.txHash);
    return this.result(true, amountReceived);
  }

  revert(error: DexError): SwapResult {
    this.error = error;
    this.transition("Reverted", this.txHash);
    return this.result(false, ZERO);
  }

  timeout(error: DexError): SwapResult {
    this.error = error;
    this.transition("TimedOut", this.txHash);
    return this.result(false, ZERO);
  }

  /** Ends the execution in its current state, e.g. a failed approval stays NotApproved. */
  abort(error: unknown): SwapResult {
    this.error = error instanceof Error ? error : new Error(toErrorMessage(error));
    return this.result(false, ZERO);
  }

  result(success: boolean, amountReceived: Decimal): SwapResult {
    return {
      success,
      amountSpent: this.amountSpent,
      amountReceived,
      txHash: this.txHash,
      approvalTxHash: this.approvalTxHash,
      error: this.error ? toErrorMessage(this.error) : undefined,
      errorCode: isDexError(this.error) ? this.error.code : undefined,
      state: this.current,
    };
  }
}
