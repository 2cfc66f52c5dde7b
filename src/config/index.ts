import { z } from "zod";

/** Env flags are spelled out; `z.coerce.boolean()` would read "false" as true. */
const envFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const proxyConfigSchema = z.object({
  /** Raw trusted proxy list, one CIDR per line. `createProxySettings` requires it. */
  trustedProxies: z.string().optional(),
  /** Custom header carrying the client IP, set by a trusted proxy. */
  peerIpHeaderName: z.string().trim().min(1).optional(),
  /** Resolve the client IP from Forwarded / X-Forwarded-For behind a trusted proxy. */
  proxyMode: envFlag,
});

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3100),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  proxy: proxyConfigSchema,
});

export type Config = z.infer<typeof configSchema>;
export type ProxyConfig = z.infer<typeof proxyConfigSchema>;

/** Empty strings count as unset, the way shells and compose files pass them. */
function optionalEnv(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: optionalEnv(env.PORT),
    nodeEnv: optionalEnv(env.NODE_ENV),
    logLevel: optionalEnv(env.LOG_LEVEL),
    proxy: {
      trustedProxies: env.TRUSTED_PROXIES,
      peerIpHeaderName: optionalEnv(env.PEER_IP_HEADER_NAME),
      proxyMode: optionalEnv(env.PROXY_MODE)?.trim().toLowerCase(),
    },
  });
}
