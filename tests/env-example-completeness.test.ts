import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

const envExample = readFileSync(fileURLToPath(new URL("../.env.example", import.meta.url)), "utf-8");

describe(".env.example completeness", () => {
  it("should contain the proxy trust vars", () => {
    expect(envExample).toContain("TRUSTED_PROXIES=");
    expect(envExample).toContain("PEER_IP_HEADER_NAME=");
    expect(envExample).toContain("PROXY_MODE=");
  });

  it("should contain the server vars", () => {
    expect(envExample).toContain("PORT=");
    expect(envExample).toContain("NODE_ENV=");
    expect(envExample).toContain("LOG_LEVEL=");
  });
});
