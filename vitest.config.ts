import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const dir = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": dir("./src"),
      "~shared": dir("./deps/shared/src"),
      "~test": dir("./test"),
    },
  },
  test: {
    include: ["test/**/*.test.ts", "deps/**/test/**/*.test.ts"],
    environment: "node",
  },
});
