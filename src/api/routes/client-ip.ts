import { Hono } from "hono";
import type { ClientIpEnv } from "../middleware/client-ip.js";

/** Echo the resolved client IP. Expects the client IP middleware upstream. */
export function createClientIpRoutes(): Hono<ClientIpEnv> {
  const routes = new Hono<ClientIpEnv>();

  routes.get("/", (c) => c.json({ ip: c.get("clientIp") }));

  return routes;
}
