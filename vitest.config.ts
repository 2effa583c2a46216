import { fileURLToPath } from "url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
      "@tests": fileURLToPath(new URL("./tests", import.meta.url)),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    watch: false,
    testTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
    reporters: ["default"],
  },
});
