import { describe, expect, it } from "vitest";
import { parseEnv } from "@/config/env.js";

describe("parseEnv", () => {
  it("fills defaults", () => {
    const parsed = parseEnv({ API_AUTH_TOKEN: "test-token" });

    expect(parsed).toMatchObject({
      NODE_ENV: "development",
      PORT: 3000,
      POOL_STORE: "memory",
      MONGODB_DB: "proceeds-pool",
    });
    expect(parsed.LOG_LEVEL).toBeUndefined();
    expect(parsed.DEFAULT_POOL_ID).toBeUndefined();
  });

  it("treats blank values as unset", () => {
    const parsed = parseEnv({ API_AUTH_TOKEN: "test-token", LOG_LEVEL: " ", CORS_ORIGIN: "" });

    expect(parsed.LOG_LEVEL).toBeUndefined();
    expect(parsed.CORS_ORIGIN).toBeUndefined();
  });

  it("requires an api token", () => {
    expect(() => parseEnv({})).toThrow();
  });

  it("requires a connection string for the mongo store", () => {
    expect(() => parseEnv({ API_AUTH_TOKEN: "test-token", POOL_STORE: "mongo" })).toThrow(
      "MONGODB_URI is required when POOL_STORE=mongo"
    );
    expect(
      parseEnv({ API_AUTH_TOKEN: "test-token", POOL_STORE: "mongo", MONGODB_URI: "mongodb://localhost:27017" })
        .MONGODB_URI
    ).toBe("mongodb://localhost:27017");
  });

  it("wants the default pool id and admin together", () => {
    expect(() => parseEnv({ API_AUTH_TOKEN: "test-token", DEFAULT_POOL_ID: "main" })).toThrow(
      "DEFAULT_POOL_ID and DEFAULT_POOL_ADMIN must be set together"
    );

    const parsed = parseEnv({
      API_AUTH_TOKEN: "test-token",
      DEFAULT_POOL_ID: "main",
      DEFAULT_POOL_ADMIN: "0x9999999999999999999999999999999999999999",
    });
    expect(parsed.DEFAULT_POOL_ID).toBe("main");
  });
});
