import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["search-launcher/src/**/*.test.ts", "wiki-summary/src/**/*.test.ts"],
    environment: "node",
  },
});
