import { defineConfig } from "vitest/config";

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    benchmark: {
      include: ["src/**/__benches__/**/*.bench.ts"],
    },
  },
});
