import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      JWT_SECRET: "test-secret",
      VAULT_OWNER: "owner",
      VAULT_ADDRESS: "vault",
    },
  },
});
