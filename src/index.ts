import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { loadConfig } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createProxySettings } from "./network/proxy-settings.js";
import { validateRequiredEnvVars } from "./validate-env.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // Winston's Console transport is synchronous, so the log line is out before exit.
  process.exit(1);
};

// Only start the server if not imported by tests
if (process.env.NODE_ENV !== "test") {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  // Validate before parsing so a bad value is reported by name, not as a ZodError.
  validateRequiredEnvVars();
  const config = loadConfig();
  logger.level = config.logLevel;

  // Parsed once; read-only for the rest of the process lifetime.
  const settings = createProxySettings(config.proxy);
  const app = createApp(settings);

  serve({ fetch: app.fetch, port: config.port }, () => {
    logger.info(`peer-trust listening on http://0.0.0.0:${config.port}`);
  });
}
