import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ["lib/**/__tests__/**/*.spec.ts"],
    exclude: [
      "**/node_modules/**",
      "**/dist/**",
    ],
  },
  resolve: {
    alias: {
      "@": root,
    },
  },
});
