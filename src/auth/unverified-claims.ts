/**
 * Unverified token claims — reads the payload of a `header.body.signature`
 * token without looking at the signature.
 *
 * CAUTION: nothing returned from here is authenticated. Use it to pre-inspect
 * `sub` / `iss` before real verification, or for diagnostics. Never make an
 * access decision on these values.
 */

import { z } from "zod";
import { logger } from "../config/logger.js";
import { base64UrlNoPadDecode } from "../utils/base64.js";

export type TokenClaimsErrorKind = "MalformedToken" | "MalformedTokenBody" | "MalformedTokenClaims";

export class TokenClaimsError extends Error {
  readonly kind: TokenClaimsErrorKind;

  constructor(kind: TokenClaimsErrorKind, message: string) {
    super(message);
    this.name = "TokenClaimsError";
    this.kind = kind;
  }
}

/** Registered JWT claims; unknown claims pass through untouched. */
export const jwtClaimsSchema = z
  .object({
    iss: z.string().optional(),
    sub: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    exp: z.number().finite().optional(),
    nbf: z.number().finite().optional(),
    iat: z.number().finite().optional(),
    jti: z.string().optional(),
  })
  .passthrough();

export type JwtClaims = z.infer<typeof jwtClaimsSchema>;

/** The middle segment of `header.body.signature`, or null without two dots. */
function tokenBody(token: string): string | null {
  const firstDot = token.indexOf(".");
  if (firstDot === -1) return null;
  const rest = token.slice(firstDot + 1);
  const secondDot = rest.indexOf(".");
  if (secondDot === -1) return null;
  return rest.slice(0, secondDot);
}

/**
 * Decode the token body and parse it with `schema`.
 * Throws `TokenClaimsError`; callers should treat that as "claims unavailable".
 */
export function extractTokenClaimsUnverified<S extends z.ZodTypeAny>(token: string, schema: S): z.output<S> {
  const body = tokenBody(token);
  if (body === null) {
    throw new TokenClaimsError("MalformedToken", "Invalid or malformed JWT Token");
  }

  let bytes: Buffer;
  try {
    bytes = base64UrlNoPadDecode(body);
  } catch (error) {
    logger.error("Error decoding JWT token body from base64", { body, error });
    throw new TokenClaimsError("MalformedTokenBody", "Invalid JWT Token body");
  }

  // Lossy: invalid UTF-8 sequences become U+FFFD.
  const text = bytes.toString("utf8");

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    logger.error("Error deserializing JWT Token claims", { error });
    throw new TokenClaimsError("MalformedTokenClaims", "Invalid JWT Token claims");
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    logger.error("Error deserializing JWT Token claims", { error: parsed.error.issues });
    throw new TokenClaimsError("MalformedTokenClaims", "Invalid JWT Token claims");
  }
  return parsed.data;
}
