import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "scripts/**/*.test.ts", "scripts/**/*.spec.ts", "tests/**/*.test.ts", "tests/**/*.spec.ts"],
    restoreMocks: true,
  },
});
