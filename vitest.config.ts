import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["gateway/src/**/*.test.ts"],
    environment: "node",
  },
});
