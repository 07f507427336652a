import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "state-migration",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
