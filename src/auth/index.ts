/**
 * Auth — bearer token handling.
 *
 * Provides:
 * - `extractBearerToken` for the `Authorization` header
 * - Unverified claim extraction for pre-inspection (see unverified-claims.ts)
 *
 * Signature verification is out of scope here and happens downstream.
 */

export {
  extractTokenClaimsUnverified,
  type JwtClaims,
  jwtClaimsSchema,
  TokenClaimsError,
  type TokenClaimsErrorKind,
} from "./unverified-claims.js";

/**
 * Extract the token from an `Authorization: Bearer <token>` header.
 * Returns null when the header is absent, uses another scheme, or is empty.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const trimmed = header.trim();
  if (!trimmed.toLowerCase().startsWith("bearer ")) return null;
  const token = trimmed.slice(7).trim();
  return token || null;
}
