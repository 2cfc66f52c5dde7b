import type { ProxyConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { buildTrustedProxies, type CidrRange } from "./trusted-proxies.js";

/**
 * Process-wide proxy trust settings. Built once at startup, frozen, and
 * handed to the client IP resolver and middleware.
 */
export interface ProxySettings {
  readonly trustedProxies: readonly CidrRange[];
  /** Custom header a trusted proxy uses to pass the client IP. */
  readonly peerIpHeaderName: string | undefined;
  /** Fall back to Forwarded / X-Forwarded-For when the peer is a trusted proxy. */
  readonly proxyMode: boolean;
}

/**
 * Throws when TRUSTED_PROXIES is not set at all: the service must not start
 * without an explicit trust list. An empty value is a valid empty list.
 */
export function createProxySettings(proxy: ProxyConfig): ProxySettings {
  if (proxy.trustedProxies === undefined) {
    throw new Error("TRUSTED_PROXIES is not set");
  }

  const trustedProxies = buildTrustedProxies(proxy.trustedProxies);
  logger.info("Loaded trusted proxy list", {
    trustedProxyCount: trustedProxies.length,
    peerIpHeaderName: proxy.peerIpHeaderName,
    proxyMode: proxy.proxyMode,
  });

  return Object.freeze({
    trustedProxies,
    peerIpHeaderName: proxy.peerIpHeaderName,
    proxyMode: proxy.proxyMode,
  });
}
