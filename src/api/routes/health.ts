import { hostname } from "node:os";
import { Hono } from "hono";

// Public, unauthenticated, used by load balancers. Mounted outside the
// client IP middleware so a probe never depends on proxy configuration.
export function createHealthRoutes(): Hono {
  const routes = new Hono();

  routes.get("/", (c) =>
    c.json({
      status: "ok",
      service: "peer-trust",
      host: hostname(),
    }),
  );

  return routes;
}
