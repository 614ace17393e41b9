import { appendFileSync, existsSync, readFileSync, mkdirSync } from "fs";
import { join } from "path";
import { toErrorMessage } from "../core/errors";

export interface SwapReceipt {
  id: string;
  ts: number;
  chain: string;
  venue: string;
  baseToken: string;
  quoteToken: string;
  amountSpent: string;
  amountReceived: string;
  slippageBps: number;
  success: boolean;
  state: string;
  txHash?: string;
  approvalTxHash?: string;
  error?: string;
  errorCode?: string;
  source: string;
}

/** Append-only JSONL log of executed swaps. */
export class ReceiptStore {
  readonly path: string;

  constructor(private readonly dir: string = join(process.cwd(), "data")) {
    this.path = join(dir, "receipts.jsonl");
  }

  append(receipt: SwapReceipt): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true });
    }
    appendFileSync(this.path, JSON.stringify(receipt) + "\n", "utf-8");
  }

  /** The most recent `limit` receipts, oldest first. */
  list(limit = 50): Record<string, unknown>[] {
    if (!existsSync(this.path)) return [];
    const lines = readFileSync(this.path, "utf-8").split("\n").filter(Boolean);
    const parsed: Record<string, unknown>[] = [];
    for (const [index, line] of lines.entries()) {
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch (err) {
        console.warn(`[receipts] Skipping malformed line ${index + 1}: ${toErrorMessage(err)}`);
        continue;
      }
      if (isRecord(value)) parsed.push(value);
    }
    return limit > 0 ? parsed.slice(-limit) : [];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
