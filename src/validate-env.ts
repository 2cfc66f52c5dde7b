import { parseCidr } from "./network/trusted-proxies.js";

/** RFC 9110 token characters, the only ones allowed in a header name. */
const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

const NODE_ENVS = ["development", "production", "test"];
const LOG_LEVELS = ["error", "warn", "info", "debug"];

function isValidCidr(entry: string): boolean {
  try {
    parseCidr(entry);
    return true;
  } catch {
    return false;
  }
}

/**
 * Startup environment variable validation.
 *
 * Throws on missing or invalid critical vars. Warns on settings that refuse
 * every request. Malformed trusted proxy lines are reported once, when the
 * list is built. Skipped in test environment.
 */
export function validateRequiredEnvVars(): void {
  if (process.env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical ---

  const trustedProxies = process.env.TRUSTED_PROXIES;
  if (trustedProxies === undefined) {
    errors.push("TRUSTED_PROXIES is required but not set (use an empty value for no trusted proxies)");
  }

  const headerName = process.env.PEER_IP_HEADER_NAME?.trim();
  if (headerName && !HEADER_NAME.test(headerName)) {
    errors.push(`PEER_IP_HEADER_NAME "${headerName}" is not a valid HTTP header name`);
  }

  const proxyMode = process.env.PROXY_MODE?.trim().toLowerCase();
  if (proxyMode && proxyMode !== "true" && proxyMode !== "false") {
    errors.push(`PROXY_MODE must be "true" or "false", got "${process.env.PROXY_MODE}"`);
  }

  const port = process.env.PORT?.trim();
  if (port) {
    const n = Number(port);
    if (!Number.isInteger(n) || n < 1 || n > 65535) {
      errors.push(`PORT must be an integer between 1 and 65535, got "${process.env.PORT}"`);
    }
  }

  const nodeEnv = process.env.NODE_ENV;
  if (nodeEnv?.trim() && !NODE_ENVS.includes(nodeEnv)) {
    errors.push(`NODE_ENV must be one of ${NODE_ENVS.join(", ")}, got "${nodeEnv}"`);
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel?.trim() && !LOG_LEVELS.includes(logLevel)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${process.env.LOG_LEVEL}"`);
  }

  // --- Recommended ---

  const validProxyCount = (trustedProxies ?? "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((entry) => entry && isValidCidr(entry)).length;

  if (trustedProxies !== undefined && proxyMode === "true" && validProxyCount === 0) {
    warnings.push("PROXY_MODE is enabled but no trusted proxies are configured: every request will be refused.");
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`[env] WARNING: ${w}`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
