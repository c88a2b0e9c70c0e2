import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tailmail-cli/src/**/*.test.ts"],
    environment: "node",
  },
});
