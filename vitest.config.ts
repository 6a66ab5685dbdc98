import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    env: {
      PEPTIDE_HARVEST_LOG_LEVEL: "error",
    },
  },
});
