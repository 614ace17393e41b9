import { pad } from "viem";
import { describe, expect, it } from "vitest";
import { minedLog, TRANSFER_TOPIC, transferLog } from "../testing/fakeEvmNode";
import { sumTransfersTo } from "./transfers";

const TOKEN = "0x10000000000000000000000000000000000000cd";
const OTHER_TOKEN = "0x1000000000000000000000000000000000000002";
const WALLET = "0x20000000000000000000000000000000000000ab";
const POOL = "0x3000000000000000000000000000000000000003";

describe("sumTransfersTo", () => {
  it("sums every transfer of the token to the recipient", () => {
    const logs = [
      transferLog(TOKEN, POOL, WALLET, 400n),
      transferLog(TOKEN, POOL, WALLET, 600n),
    ];
    expect(sumTransfersTo(logs, TOKEN, WALLET)).toBe(1000n);
  });

  it("ignores other tokens, other recipients and outgoing transfers", () => {
    const logs = [
      transferLog(OTHER_TOKEN, POOL, WALLET, 5n),
      transferLog(TOKEN, POOL, POOL, 7n),
      transferLog(TOKEN, WALLET, POOL, 11n),
      transferLog(TOKEN, POOL, WALLET, 13n),
    ];
    expect(sumTransfersTo(logs, TOKEN, WALLET)).toBe(13n);
  });

  it("matches addresses case-insensitively", () => {
    const logs = [transferLog(TOKEN, POOL, WALLET, 3n)];
    expect(sumTransfersTo(logs, "0x10000000000000000000000000000000000000CD", "0x20000000000000000000000000000000000000AB")).toBe(3n);
  });

  it("returns zero when nothing matches", () => {
    expect(sumTransfersTo([], TOKEN, WALLET)).toBe(0n);
  });

  it("skips logs that are not Transfer events", () => {
    const approval = minedLog(
      TOKEN,
      [
        "0x8c5be1e5ebec7d5bd14f71427d1e84f3dd0314c0f7b2291e5b200ac8c7c3b925",
        "0x00000000000000000000000020000000000000000000000000000000000000ab",
        "0x00000000000000000000000020000000000000000000000000000000000000ab",
      ],
      "0x0000000000000000000000000000000000000000000000000000000000000009",
    );
    expect(sumTransfersTo([approval, transferLog(TOKEN, POOL, WALLET, 2n)], TOKEN, WALLET)).toBe(2n);
  });

  it("skips Transfer logs that do not decode as ERC-20", () => {
    const erc721 = minedLog(TOKEN, [TRANSFER_TOPIC, pad(POOL, { size: 32 }), pad(WALLET, { size: 32 }), pad("0x01", { size: 32 })], "0x");
    expect(sumTransfersTo([erc721], TOKEN, WALLET)).toBe(0n);
  });
});
