import { Hono } from "hono";
import { extractBearerToken } from "../../auth/index.js";
import { extractTokenClaimsUnverified, jwtClaimsSchema, TokenClaimsError } from "../../auth/unverified-claims.js";
import { logger } from "../../config/logger.js";
import type { ClientIpEnv } from "../middleware/client-ip.js";

/**
 * Pre-inspect the claims of the caller's bearer token.
 *
 * The signature is NOT checked: the response always carries
 * `verified: false`, and a token that cannot be decoded only means the claims
 * are unavailable, not that authentication failed.
 */
export function createTokenClaimsRoutes(): Hono<ClientIpEnv> {
  const routes = new Hono<ClientIpEnv>();

  routes.get("/", (c) => {
    const token = extractBearerToken(c.req.header("Authorization"));
    if (!token) {
      return c.json({ error: "Bearer token required" }, 401);
    }

    try {
      const claims = extractTokenClaimsUnverified(token, jwtClaimsSchema);
      logger.debug("Inspected unverified token claims", { clientIp: c.get("clientIp"), sub: claims.sub });
      return c.json({ verified: false, claims });
    } catch (err) {
      if (err instanceof TokenClaimsError) {
        return c.json({ error: "Claims unavailable", reason: err.kind }, 422);
      }
      throw err;
    }
  });

  return routes;
}
