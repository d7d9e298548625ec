import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/*.test.ts"],
    server: {
      deps: {
        // clipanion's ESM build imports "../platform" as a bare directory,
        // which Node's ESM loader rejects; let Vite resolve it instead.
        inline: ["clipanion"],
      },
    },
  },
});
