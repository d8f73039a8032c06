// src/server.ts
import http from "http";
import { createApp } from "./app";
import { env } from "./config/env";
import { logger } from "./utils/logger";

const app = createApp(env);
let server: http.Server | null = null;

// Flag to track if shutdown is in progress
let isShuttingDown = false;

// --- Graceful Shutdown Logic ---
const gracefulShutdown = (signal: string): void => {
  if (isShuttingDown) {
    logger.info(`Shutdown already in progress, ignoring ${signal}`);
    return;
  }

  isShuttingDown = true;
  logger.warn(`Received ${signal}. Starting graceful shutdown...`);

  if (!server) {
    logger.warn("Server not started, exiting.");
    process.exit(0);
  }

  // Set a hard shutdown timeout
  const forcedExitTimer = setTimeout(() => {
    logger.error("Graceful shutdown timed out after 15 seconds. Forcing exit.");
    process.exit(1);
  }, 15000);

  server.close((err) => {
    if (err) {
      logger.error("Error closing HTTP server:", { error: err });
    } else {
      logger.info("HTTP server closed successfully.");
    }
    clearTimeout(forcedExitTimer);
    logger.info("Shutdown complete. Exiting with code 0.");
    process.exit(0);
  });
};

// --- Server Startup ---
function startServer(): void {
  logger.info("Initializing server...");

  server = app.listen(env.port, () => {
    logger.info(
      `Server is running at http://localhost:${env.port} in ${env.nodeEnv} mode`,
    );
  });

  process.on("SIGINT", () => gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));

  server.on("error", (error) => {
    logger.error("HTTP server startup error:", { error });
    process.exit(1);
  });
}

// --- Uncaught Exception / Unhandled Rejection ---
process.on("uncaughtException", (err: Error, origin: string) => {
  logger.error("UNCAUGHT EXCEPTION:", { error: err, origin });
  gracefulShutdown("uncaughtException");
});

process.on("unhandledRejection", (reason: unknown) => {
  const reasonObj = reason instanceof Error
    ? { message: reason.message, stack: reason.stack }
    : { reason };
  logger.error("UNHANDLED REJECTION:", reasonObj);
  gracefulShutdown("unhandledRejection");
});

startServer();
