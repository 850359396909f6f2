import { defineConfig } from "vitest/config";
import { dirname } from "path";
import { fileURLToPath } from "url";

export default defineConfig({
  resolve: {
    alias: {
      "@": dirname(fileURLToPath(import.meta.url)),
    },
  },
  test: {
    include: ["lib/**/*.test.ts", "worker/**/*.test.ts"],
    environment: "node",
  },
});
