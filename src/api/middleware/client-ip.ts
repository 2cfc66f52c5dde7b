/**
 * Client IP middleware for Hono.
 *
 * Resolves the client IP once per request and exposes it to downstream
 * handlers as `c.get("clientIp")`. Requests whose peer tries to override its
 * address without being a trusted proxy, or that arrive without a usable peer
 * address, are refused here.
 */

import type { Context, Next } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import {
  ClientIpError,
  type ClientIpErrorKind,
  type ClientIpSource,
  resolveClientIp,
} from "../../network/client-ip.js";
import type { ProxySettings } from "../../network/proxy-settings.js";
import { honoClientIpSource } from "../../network/request-source.js";

export interface ClientIpEnv {
  Variables: {
    clientIp: string;
  };
}

const STATUS_BY_KIND: Record<ClientIpErrorKind, ContentfulStatusCode> = {
  MissingPeerAddress: 400,
  MalformedPeerAddress: 400,
  UntrustedProxy: 403,
};

/**
 * @param sourceFor - builds the request source; defaults to the
 *   @hono/node-server bindings adapter
 */
export function clientIp(
  settings: ProxySettings,
  sourceFor: (c: Context) => ClientIpSource = honoClientIpSource,
) {
  return async (c: Context<ClientIpEnv>, next: Next) => {
    try {
      const ip = resolveClientIp(sourceFor(c), settings);
      c.set("clientIp", ip.toString());
    } catch (err) {
      if (err instanceof ClientIpError) {
        return c.json({ error: err.message }, STATUS_BY_KIND[err.kind]);
      }
      throw err;
    }
    return next();
  };
}
