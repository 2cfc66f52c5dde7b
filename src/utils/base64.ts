/**
 * Strict base64 codecs.
 *
 * Node's own decoder silently skips characters outside the alphabet and
 * ignores bad padding. These decoders reject anything that is not the
 * canonical encoding of some byte string.
 */

const STANDARD_PADDED = /^[A-Za-z0-9+/]*={0,2}$/;
const URL_SAFE_PADDED = /^[A-Za-z0-9_-]*={0,2}$/;
const URL_SAFE_NO_PAD = /^[A-Za-z0-9_-]*$/;

export class Base64DecodeError extends Error {
  constructor(reason: string) {
    super(`B64 decoding error: ${reason}`);
    this.name = "Base64DecodeError";
  }
}

function withPadding(unpadded: string): string {
  return unpadded + "=".repeat((4 - (unpadded.length % 4)) % 4);
}

function decodeStrict(input: string, alphabet: RegExp, encoding: "base64" | "base64url", padded: boolean): Buffer {
  if (!alphabet.test(input)) {
    throw new Base64DecodeError("invalid character");
  }
  const bytes = Buffer.from(input, encoding);
  // Node emits padded "base64" and unpadded "base64url".
  const native = bytes.toString(encoding);
  const canonical = encoding === "base64url" && padded ? withPadding(native) : native;
  if (canonical !== input) {
    throw new Base64DecodeError("invalid length, padding or trailing bits");
  }
  return bytes;
}

/** Standard alphabet, padded. */
export function base64Encode(input: Uint8Array): string {
  return Buffer.from(input).toString("base64");
}

export function base64Decode(b64: string): Buffer {
  return decodeStrict(b64, STANDARD_PADDED, "base64", true);
}

/** URL-safe alphabet, no padding. */
export function base64UrlEncode(input: Uint8Array): string {
  return Buffer.from(input).toString("base64url");
}

/** URL-safe alphabet, padding required. */
export function base64UrlDecode(b64: string): Buffer {
  return decodeStrict(b64, URL_SAFE_PADDED, "base64url", true);
}

/** URL-safe alphabet, padding rejected. */
export function base64UrlNoPadDecode(b64: string): Buffer {
  return decodeStrict(b64, URL_SAFE_NO_PAD, "base64url", false);
}
