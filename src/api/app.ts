import { type ErrorHandler, Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import type { ProxySettings } from "../network/proxy-settings.js";
import { type ClientIpEnv, clientIp } from "./middleware/client-ip.js";
import { createClientIpRoutes } from "./routes/client-ip.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTokenClaimsRoutes } from "./routes/token-claims.js";

// Global error handler — catches all errors from routes and middleware.
export const errorHandler: ErrorHandler<ClientIpEnv> = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

export function createApp(settings: ProxySettings): Hono<ClientIpEnv> {
  const app = new Hono<ClientIpEnv>();

  app.use("/*", secureHeaders());

  app.route("/health", createHealthRoutes());

  // Everything under /api sees the resolved client IP.
  app.use("/api/*", clientIp(settings));
  app.route("/api/client-ip", createClientIpRoutes());
  app.route("/api/token/claims", createTokenClaimsRoutes());

  app.onError(errorHandler);

  return app;
}
