import { createGameApp } from "./app.js";
import { loadConfig } from "./config.js";
import { logger } from "./logger.js";

const cfg = loadConfig();
logger.level = cfg.logLevel;

const game = await createGameApp(cfg);
await game.start();

logger.info(`Snake arena listening on ${cfg.host}:${cfg.port}${game.gameServer.encrypted ? " (TLS)" : ""}`);
logger.info(`Status API: http://localhost:${cfg.httpPort}/api/health`);
logger.info(`API docs: http://localhost:${cfg.httpPort}/docs`);

let stopping = false;
async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, "shutting down");
  try {
    await game.stop();
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "shutdown failed");
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
