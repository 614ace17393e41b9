export type DexErrorCode =
  | "UNSUPPORTED_CHAIN"
  | "UNKNOWN_VENUE"
  | "UNKNOWN_TOKEN"
  | "NO_MARKET"
  | "INVALID_SLIPPAGE"
  | "INSUFFICIENT_BALANCE"
  | "APPROVAL_FAILED"
  | "TRANSACTION_REVERTED"
  | "TRANSACTION_TIMEOUT"
  | "CONFIRMATION_TIMEOUT"
  | "RPC_ERROR"
  | "INVALID_ADDRESS"
  | "NOT_IMPLEMENTED"
  | "INVALID_CONFIG"
  | "UNMATCHED_SALE";

export class DexError extends Error {
  constructor(
    readonly code: DexErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DexError";
  }
}

export class UnsupportedChainError extends DexError {
  constructor(readonly chain: string, detail?: string) {
    super("UNSUPPORTED_CHAIN", detail ?? `Chain '${chain}' is not supported`);
    this.name = "UnsupportedChainError";
  }
}

export class UnknownVenueError extends DexError {
  constructor(readonly venue: string, known: readonly string[]) {
    super("UNKNOWN_VENUE", `Unknown venue '${venue}'. Registered: ${known.join(", ") || "(none)"}`);
    this.name = "UnknownVenueError";
  }
}

export class UnknownTokenError extends DexError {
  constructor(readonly token: string, readonly chain: string) {
    super("UNKNOWN_TOKEN", `Unknown token '${token}' on ${chain}`);
    this.name = "UnknownTokenError";
  }
}

export class NoMarketError extends DexError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NO_MARKET", message, options);
    this.name = "NoMarketError";
  }
}

export class InvalidSlippageError extends DexError {
  constructor(readonly bps: number) {
    super("INVALID_SLIPPAGE", `Slippage must be an integer between 0 and 10000 basis points, got ${bps}`);
    this.name = "InvalidSlippageError";
  }
}

export class InsufficientBalanceError extends DexError {
  constructor(message: string) {
    super("INSUFFICIENT_BALANCE", message);
    this.name = "InsufficientBalanceError";
  }
}

export class ApprovalFailedError extends DexError {
  constructor(
    readonly reason: string,
    readonly txHash?: string,
    options?: { cause?: unknown },
  ) {
    super("APPROVAL_FAILED", `Approval failed: ${reason}`, options);
    this.name = "ApprovalFailedError";
  }
}

export class TransactionRevertedError extends DexError {
  constructor(
    readonly reason: string,
    readonly txHash: string,
  ) {
    super("TRANSACTION_REVERTED", `Transaction ${txHash} reverted: ${reason}`);
    this.name = "TransactionRevertedError";
  }
}

export class TransactionTimeoutError extends DexError {
  constructor(
    readonly txHash: string,
    readonly timeoutMs: number,
  ) {
    super("TRANSACTION_TIMEOUT", `Transaction ${txHash} not confirmed within ${timeoutMs}ms; its outcome is unknown`);
    this.name = "TransactionTimeoutError";
  }
}

export class ConfirmationTimeoutError extends DexError {
  constructor(
    readonly signature: string,
    readonly timeoutMs: number,
  ) {
    super("CONFIRMATION_TIMEOUT", `Signature ${signature} not finalized within ${timeoutMs}ms; its outcome is unknown`);
    this.name = "ConfirmationTimeoutError";
  }
}

export class RpcError extends DexError {
  constructor(operation: string, cause: unknown) {
    super("RPC_ERROR", `${operation} failed: ${toErrorMessage(cause)}`, { cause });
    this.name = "RpcError";
  }
}

export class InvalidAddressError extends DexError {
  constructor(readonly address: string) {
    super("INVALID_ADDRESS", `Invalid address: '${address}'`);
    this.name = "InvalidAddressError";
  }
}

export class NotImplementedError extends DexError {
  constructor(message: string) {
    super("NOT_IMPLEMENTED", message);
    this.name = "NotImplementedError";
  }
}

export class InvalidConfigError extends DexError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "InvalidConfigError";
  }
}

export class UnmatchedSaleError extends DexError {
  constructor(message: string) {
    super("UNMATCHED_SALE", message);
    this.name = "UnmatchedSaleError";
  }
}

export function isDexError(value: unknown): value is DexError {
  return value instanceof DexError;
}

export function toErrorMessage(value: unknown): string {
  if (value instanceof Error) {
    // viem errors carry a one-line summary beside their multi-line message
    if ("shortMessage" in value && typeof value.shortMessage === "string" && value.shortMessage.length > 0) {
      return value.shortMessage;
    }
    return value.message;
  }
  return String(value);
}
