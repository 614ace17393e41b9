import type { Express, Response } from "express";
import {
  type EngineContext,
  type HandlerResult,
  handleBalance,
  handleQuote,
  handleReceipts,
} from "./execution/handler";
import { invoke, manifest } from "./skills/tradingSkill";

function send<T>(res: Response, result: HandlerResult<T>): void {
  if (result.ok) {
    res.json(result.data);
    return;
  }
  res.status(400).json({ error: result.error, code: result.code });
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function registerRoutes(app: Express, ctx: EngineContext): Express {
  // GET /api/quote?chain=&tokenOut=&tokenIn=&venue=
  app.get("/api/quote", async (req, res) => {
    const chain = queryString(req.query.chain);
    const tokenOut = queryString(req.query.tokenOut);
    const tokenIn = queryString(req.query.tokenIn);
    if (!chain || !tokenOut || !tokenIn) {
      res.status(400).json({ error: "chain, tokenOut and tokenIn are required" });
      return;
    }
    send(res, await handleQuote(ctx, { chain, tokenOut, tokenIn, venue: queryString(req.query.venue) }));
  });

  app.post("/api/swap", async (req, res) => {
    send(res, await invoke(ctx, "execute_swap", req.body));
  });

  app.post("/api/markets", async (req, res) => {
    send(res, await invoke(ctx, "get_markets", req.body));
  });

  // GET /api/balance?chain=&token=&owner=
  app.get("/api/balance", async (req, res) => {
    const chain = queryString(req.query.chain);
    if (!chain) {
      res.status(400).json({ error: "chain is required" });
      return;
    }
    send(
      res,
      await handleBalance(ctx, { chain, token: queryString(req.query.token), owner: queryString(req.query.owner) }),
    );
  });

  app.get("/api/receipts", (req, res) => {
    const limit = Number(queryString(req.query.limit) ?? 50);
    if (!Number.isInteger(limit) || limit <= 0) {
      res.status(400).json({ error: "limit must be a positive integer" });
      return;
    }
    send(res, handleReceipts(ctx, limit));
  });

  app.get("/api/skill/manifest", (_req, res) => {
    res.json(manifest());
  });

  app.post("/api/skill/invoke", async (req, res) => {
    const body: unknown = req.body;
    if (typeof body !== "object" || body === null || !("action" in body) || typeof body.action !== "string") {
      res.status(400).json({ error: "action is required" });
      return;
    }
    const args = "args" in body ? body.args : {};
    send(res, await invoke(ctx, body.action, args));
  });

  return app;
}
