import express from "express";
import { createServer } from "http";
import { toErrorMessage } from "./core/errors";
import { loadConfig } from "./engine/config";
import { type EngineContext } from "./execution/handler";
import { createDefaultRegistry } from "./execution/venueRegistry";
import { ReceiptStore } from "./receipts/store";
import { registerRoutes } from "./routes";

function createContext(): EngineContext {
  try {
    return {
      config: loadConfig(),
      registry: createDefaultRegistry(),
      receipts: new ReceiptStore(process.env.DATA_DIR),
    };
  } catch (err) {
    console.error(`[server] Failed to load configuration: ${toErrorMessage(err)}`);
    process.exit(1);
  }
}

const ctx = createContext();

const app = express();
app.use(express.json());
registerRoutes(app, ctx);

const port = Number(process.env.PORT ?? 5000);
createServer(app).listen(port, () => {
  console.log(`[server] Listening on :${port} (chains: ${Object.keys(ctx.config.chains).join(", ")}; venues: ${ctx.registry.names().join(", ")})`);
});
