import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      POOL_STORE: "memory",
      API_AUTH_TOKEN: "test-token",
    },
    testTimeout: 10_000,
  },
  resolve: {
    alias: [{ find: /^@\/(.*)\.js$/, replacement: path.join(rootDir, "src/$1") }],
  },
});
