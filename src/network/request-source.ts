import type { IncomingMessage } from "node:http";
import type { Context } from "hono";
import type { ClientIpSource } from "./client-ip.js";
import { resolveForwardedAddr } from "./forwarded.js";

/** The node:http request @hono/node-server passes in its env bindings, if any. */
function incomingFromBindings(env: unknown): object | undefined {
  if (typeof env !== "object" || env === null || !("incoming" in env)) return undefined;
  const incoming = env.incoming;
  return typeof incoming === "object" && incoming !== null ? incoming : undefined;
}

/**
 * Read `incoming.socket.remoteAddress` from the bindings. Other runtimes (and
 * test requests without bindings) have no peer address.
 */
function remoteAddressFromBindings(env: unknown): string | undefined {
  const incoming = incomingFromBindings(env);
  if (!incoming || !("socket" in incoming)) return undefined;
  const socket = incoming.socket;
  if (typeof socket !== "object" || socket === null || !("remoteAddress" in socket)) return undefined;
  const address = socket.remoteAddress;
  return typeof address === "string" ? address : undefined;
}

/**
 * Every value of a header, one per header line, from `incoming.headersDistinct`.
 * Null when the bindings carry no node:http request.
 */
function distinctHeaderFromBindings(env: unknown, name: string): string[] | null {
  const incoming = incomingFromBindings(env);
  if (!incoming || !("headersDistinct" in incoming)) return null;
  const distinct = incoming.headersDistinct;
  if (typeof distinct !== "object" || distinct === null) return null;
  const values: unknown = Object.getOwnPropertyDescriptor(distinct, name.toLowerCase())?.value;
  return Array.isArray(values) ? values.filter((v): v is string => typeof v === "string") : [];
}

/**
 * Client IP source over a Hono context served by @hono/node-server.
 * Repeated header lines yield the first one. Without node bindings the Fetch
 * `Headers` value is used, which joins repeated lines with ", ".
 */
export function honoClientIpSource(c: Context): ClientIpSource {
  const header = (name: string): string | undefined => {
    const distinct = distinctHeaderFromBindings(c.env, name);
    return distinct === null ? c.req.header(name) : distinct[0];
  };
  const peerAddr = (): string | undefined => remoteAddressFromBindings(c.env);
  return {
    peerAddr,
    header,
    forwardedAddr: () => resolveForwardedAddr(header, peerAddr()),
  };
}

/** Client IP source over a raw node:http request (WebSocket upgrades, plain handlers). */
export function incomingMessageClientIpSource(req: IncomingMessage): ClientIpSource {
  const header = (name: string): string | undefined => req.headersDistinct[name.toLowerCase()]?.[0];
  const peerAddr = (): string | undefined => req.socket.remoteAddress;
  return {
    peerAddr,
    header,
    forwardedAddr: () => resolveForwardedAddr(header, peerAddr()),
  };
}
