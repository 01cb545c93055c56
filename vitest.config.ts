import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      LEDGER_OWNER_ADDRESS: "0x00000000000000000000000000000000000000a1",
      NODE_PRIVATE_KEY: "0x1111111111111111111111111111111111111111111111111111111111111111",
      IP_HASH_SALT: "test-salt",
    },
    testTimeout: 10000,
  },
})
