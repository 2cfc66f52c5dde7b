/**
 * Trusted proxy list — the CIDR ranges whose requests may override the
 * observed peer address, either through a custom header or the standard
 * Forwarded / X-Forwarded-For headers.
 *
 * The list is built once at startup from a multi-line string (one CIDR per
 * line) and frozen. A malformed line is logged and skipped so that one typo
 * does not drop every trusted proxy.
 */

import ipaddr from "ipaddr.js";
import { logger } from "../config/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type IpAddr = ipaddr.IPv4 | ipaddr.IPv6;

export interface CidrRange {
  address: IpAddr;
  prefixLength: number;
}

export class IpParseError extends Error {
  constructor(value: string) {
    super(`Invalid IP address: "${value}"`);
    this.name = "IpParseError";
  }
}

export class CidrParseError extends Error {
  constructor(value: string, reason: string) {
    super(`Invalid CIDR "${value}": ${reason}`);
    this.name = "CidrParseError";
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Rewrite a trailing dotted quad (`::ffff:1.2.3.4`) as two hex groups
 * (`::ffff:102:304`). The quad must be four-part decimal; undefined otherwise.
 */
function hexTail(value: string): string | undefined {
  if (!value.includes(".")) return value;

  const lastColon = value.lastIndexOf(":");
  if (lastColon === -1) return undefined;
  const tail = value.slice(lastColon + 1);
  if (!ipaddr.IPv4.isValidFourPartDecimal(tail)) return undefined;

  const [a = 0, b = 0, c = 0, d = 0] = ipaddr.IPv4.parse(tail).toByteArray();
  const high = ((a << 8) | b).toString(16);
  const low = ((c << 8) | d).toString(16);
  return `${value.slice(0, lastColon + 1)}${high}:${low}`;
}

/**
 * Parse a plain IP literal. Only four-part decimal IPv4 (no leading zeros,
 * no shorthand like "127.1") and IPv6 without a zone index are accepted,
 * including an embedded four-part decimal IPv4 tail.
 */
export function parseIpAddr(value: string): IpAddr {
  if (ipaddr.IPv4.isValidFourPartDecimal(value)) return ipaddr.IPv4.parse(value);
  if (value.includes("%")) throw new IpParseError(value);

  const v6 = hexTail(value);
  if (v6 !== undefined && ipaddr.IPv6.isValid(v6)) return ipaddr.IPv6.parse(v6);
  throw new IpParseError(value);
}

/** Unwrap `::ffff:a.b.c.d`, which dual-stack sockets report for IPv4 peers. */
export function unmapIpv4(ip: IpAddr): IpAddr {
  return ip instanceof ipaddr.IPv6 && ip.isIPv4MappedAddress() ? ip.toIPv4Address() : ip;
}

function hasHostBits(address: IpAddr, prefixLength: number): boolean {
  const bytes = address.toByteArray();
  for (let bit = prefixLength; bit < bytes.length * 8; bit++) {
    const byte = bytes[bit >> 3] ?? 0;
    if (byte & (0x80 >> (bit & 7))) return true;
  }
  return false;
}

/**
 * Parse a CIDR literal such as `10.0.0.0/8` or `fd00::/8`. A bare address is
 * a single-host range. Ranges with bits set below the prefix are rejected.
 */
export function parseCidr(value: string): CidrRange {
  const slash = value.indexOf("/");
  const addressPart = slash === -1 ? value : value.slice(0, slash);

  let address: IpAddr;
  try {
    address = parseIpAddr(addressPart);
  } catch {
    throw new CidrParseError(value, "address is not a valid IP literal");
  }

  const maxPrefix = address.kind() === "ipv4" ? 32 : 128;
  if (slash === -1) return { address, prefixLength: maxPrefix };

  const prefixPart = value.slice(slash + 1);
  if (!/^\d{1,3}$/.test(prefixPart)) {
    throw new CidrParseError(value, "prefix length is not a number");
  }
  const prefixLength = Number.parseInt(prefixPart, 10);
  if (prefixLength > maxPrefix) {
    throw new CidrParseError(value, `prefix length exceeds ${maxPrefix}`);
  }
  if (hasHostBits(address, prefixLength)) {
    throw new CidrParseError(value, "host bits are set below the prefix");
  }

  return { address, prefixLength };
}

export function formatCidr(range: CidrRange): string {
  return `${range.address.toString()}/${range.prefixLength}`;
}

/**
 * Build the trusted proxy list from its raw configuration value.
 * Lines are trimmed; blank lines are ignored; unparsable lines are logged
 * and left out.
 */
export function buildTrustedProxies(raw: string): readonly CidrRange[] {
  const proxies: CidrRange[] = [];

  for (const line of raw.split(/\r?\n/)) {
    const entry = line.trim();
    if (!entry) continue;
    try {
      proxies.push(parseCidr(entry));
    } catch (error) {
      logger.error("Cannot parse trusted proxy entry to CIDR", { entry, error });
    }
  }

  return Object.freeze(proxies);
}

// ---------------------------------------------------------------------------
// Membership
// ---------------------------------------------------------------------------

function rangeContains(range: CidrRange, ip: IpAddr): boolean {
  if (ip instanceof ipaddr.IPv4 && range.address instanceof ipaddr.IPv4) {
    return ip.match(range.address, range.prefixLength);
  }
  if (ip instanceof ipaddr.IPv6 && range.address instanceof ipaddr.IPv6) {
    return ip.match(range.address, range.prefixLength);
  }
  // Address family mismatch never matches.
  return false;
}

/** True when `ip` falls inside at least one trusted range. */
export function isTrustedProxy(trusted: readonly CidrRange[], ip: IpAddr): boolean {
  return trusted.some((range) => rangeContains(range, ip));
}
