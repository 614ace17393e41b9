import { parseEventLogs, type Log } from "viem";
import { ERC20_ABI } from "./erc20";

/**
 * Sums the raw amounts of ERC-20 `Transfer(from, to, value)` events emitted by
 * `tokenAddress` whose recipient is `recipient`. Several matching logs occur
 * on multi-hop routes and partial fills.
 */
export function sumTransfersTo(logs: Log[], tokenAddress: string, recipient: string): bigint {
  const token = tokenAddress.toLowerCase();
  const to = recipient.toLowerCase();

  let total = 0n;
  for (const log of parseEventLogs({ abi: ERC20_ABI, eventName: "Transfer", logs })) {
    if (log.address.toLowerCase() !== token || log.args.to.toLowerCase() !== to) continue;
    total += log.args.value;
  }
  return total;
}
