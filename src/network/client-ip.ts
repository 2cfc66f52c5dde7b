/**
 * Client IP resolution behind trusted proxies.
 *
 * Order of precedence for one request:
 * 1. The custom peer IP header (`PEER_IP_HEADER_NAME`), when configured,
 *    present and a valid IP. The peer must be a trusted proxy.
 * 2. The standard forwarded address, when proxy mode is on. The peer must be
 *    a trusted proxy.
 * 3. The peer address itself.
 *
 * The trust list is only consulted when a header is about to replace the
 * observed peer address. A direct, untrusted peer is never rejected for its
 * origin alone.
 */

import { logger } from "../config/logger.js";
import type { ProxySettings } from "./proxy-settings.js";
import { type IpAddr, isTrustedProxy, parseIpAddr, unmapIpv4 } from "./trusted-proxies.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The parts of a request the resolver needs. Implemented by thin adapters for
 * each request representation (see request-source.ts).
 */
export interface ClientIpSource {
  /** Transport-level peer address, without port. */
  peerAddr(): string | undefined;
  /** First value of a request header, case-insensitive. */
  header(name: string): string | undefined;
  /** The transport's standard forwarded-address result. */
  forwardedAddr(): string | undefined;
}

export type ClientIpErrorKind = "MissingPeerAddress" | "MalformedPeerAddress" | "UntrustedProxy";

export class ClientIpError extends Error {
  readonly kind: ClientIpErrorKind;

  constructor(kind: ClientIpErrorKind, message: string) {
    super(message);
    this.name = "ClientIpError";
    this.kind = kind;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Drop the `%zone` a socket reports for link-local IPv6 peers. Header values keep theirs. */
function withoutZone(peerAddr: string): string {
  const percent = peerAddr.indexOf("%");
  return percent !== -1 && peerAddr.includes(":") ? peerAddr.slice(0, percent) : peerAddr;
}

function parsePeerAddr(value: string | undefined): IpAddr {
  if (value === undefined) {
    logger.error("No peer address in connection info");
    throw new ClientIpError("MissingPeerAddress", "No IP address in connection info");
  }
  try {
    return unmapIpv4(parseIpAddr(withoutZone(value)));
  } catch (error) {
    logger.error("Cannot parse peer IP address", { peerAddr: value, error });
    throw new ClientIpError("MalformedPeerAddress", `Cannot parse peer IP address: "${value}"`);
  }
}

function assertTrustedProxy(settings: ProxySettings, peerIp: IpAddr): void {
  if (isTrustedProxy(settings.trustedProxies, peerIp)) return;

  logger.error("Invalid request from IP which is not a trusted proxy", { peerIp: peerIp.toString() });
  throw new ClientIpError("UntrustedProxy", "Invalid IP Address");
}

function parseForwardedAddr(value: string | undefined, peerIp: IpAddr): IpAddr {
  if (value !== undefined) {
    try {
      return unmapIpv4(parseIpAddr(value));
    } catch (error) {
      logger.error("Cannot parse forwarded client IP address", { peerIp: peerIp.toString(), forwarded: value, error });
      throw new ClientIpError("MalformedPeerAddress", `Cannot parse forwarded client IP address: "${value}"`);
    }
  }
  logger.error("No forwarded client IP address", { peerIp: peerIp.toString() });
  throw new ClientIpError("MalformedPeerAddress", "No forwarded client IP address");
}

/** The client IP from the custom header, or undefined when it cannot be used. */
function ipFromPeerIpHeader(source: ClientIpSource, headerName: string | undefined): IpAddr | undefined {
  if (!headerName) return undefined;

  const value = source.header(headerName);
  if (value !== undefined) {
    try {
      return unmapIpv4(parseIpAddr(value.trim()));
    } catch (error) {
      logger.error("Cannot parse IP from peer IP header", { headerName, error });
    }
  }

  logger.debug("No peer IP from peer IP header", { headerName });
  return undefined;
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

/**
 * Resolve the authoritative client IP for one request.
 * Throws `ClientIpError` when the request must be refused.
 */
export function resolveClientIp(source: ClientIpSource, settings: ProxySettings): IpAddr {
  const peerIp = parsePeerAddr(source.peerAddr());

  const headerIp = ipFromPeerIpHeader(source, settings.peerIpHeaderName);
  if (headerIp) {
    assertTrustedProxy(settings, peerIp);
    return headerIp;
  }

  if (settings.proxyMode) {
    assertTrustedProxy(settings, peerIp);
    return parseForwardedAddr(source.forwardedAddr(), peerIp);
  }

  return peerIp;
}
