/**
 * Registration Backend Server (Entry Point)
 *
 * Thin shell: context creation, migrations, startup/shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { createContext, runtimeConfig } from "./app/context";
import { createApp } from "./app/http";
import { runMigrations } from "./migrate";

const ctx = createContext();
const { logger, db, cartExpiryJob } = ctx;

const migrations = runMigrations(db, logger);
logger.info({ applied: migrations.applied.length, skipped: migrations.skipped.length }, "Database migrations checked");

const app = createApp(ctx);

const port = runtimeConfig.port;
const bindHost = runtimeConfig.bindHost;
const server = app.listen(port, bindHost, () => {
  logger.info({ port, host: bindHost }, "Registration backend listening");
});

if (runtimeConfig.cartExpirySweepEnabled) {
  cartExpiryJob.start();
} else {
  logger.info("Cart expiry job disabled (CART_EXPIRY_SWEEP_ENABLED=false)");
}

const shutdown = () => {
  if (ctx.isShuttingDown()) return;
  logger.info("Received termination signal, initiating graceful shutdown");
  ctx.setShuttingDown(true);

  try {
    cartExpiryJob.stop();
  } catch (error) {
    logger.error({ err: error }, "Error stopping cart expiry job");
  }

  server.close(() => {
    logger.info("HTTP server closed");
    db.close();
    logger.info("Database connection closed, graceful shutdown complete");
    process.exit(0);
  });

  // Force exit after timeout (configurable via GRACEFUL_SHUTDOWN_MS)
  setTimeout(() => {
    logger.warn({ timeoutMs: runtimeConfig.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, runtimeConfig.gracefulShutdownMs).unref();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
