/**
 * Standard forwarded-address resolution, the way most HTTP stacks compute a
 * "real IP": the `for=` parameter of the first `Forwarded` element (RFC 7239),
 * else the first `X-Forwarded-For` entry, else the peer address.
 *
 * The value is returned unvalidated. Callers must only consult it when the
 * peer is a trusted proxy, and must parse it themselves.
 */

type HeaderReader = (name: string) => string | undefined;

/** Strip quotes, `[v6]:port` brackets and an IPv4 `:port` suffix from a node name. */
function stripNodePort(node: string): string {
  const unquoted = node.startsWith('"') && node.endsWith('"') && node.length >= 2 ? node.slice(1, -1) : node;

  if (unquoted.startsWith("[")) {
    const close = unquoted.indexOf("]");
    return close === -1 ? unquoted : unquoted.slice(1, close);
  }

  // Exactly one colon means host:port; more than one is a bare IPv6 literal.
  const colon = unquoted.indexOf(":");
  if (colon !== -1 && colon === unquoted.lastIndexOf(":")) {
    return unquoted.slice(0, colon);
  }
  return unquoted;
}

/** The `for=` node of the first element of a `Forwarded` header. */
export function parseForwardedFor(header: string): string | undefined {
  const firstElement = header.split(",")[0] ?? "";
  for (const pair of firstElement.split(";")) {
    const eq = pair.indexOf("=");
    if (eq === -1) continue;
    const key = pair.slice(0, eq).trim().toLowerCase();
    if (key !== "for") continue;
    const node = stripNodePort(pair.slice(eq + 1).trim());
    return node || undefined;
  }
  return undefined;
}

/** The first (leftmost, client-side) entry of an `X-Forwarded-For` header. */
export function parseXForwardedFor(header: string): string | undefined {
  const first = header.split(",")[0]?.trim();
  return first || undefined;
}

export function resolveForwardedAddr(header: HeaderReader, peerAddr: string | undefined): string | undefined {
  const forwarded = header("forwarded");
  if (forwarded) {
    const node = parseForwardedFor(forwarded);
    if (node) return node;
  }

  const xff = header("x-forwarded-for");
  if (xff) {
    const first = parseXForwardedFor(xff);
    if (first) return first;
  }

  return peerAddr;
}
