import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["core/src/**/*.test.ts", "hook/src/**/*.test.ts", "hooktest/src/**/*.test.ts"],
    environment: "node",
  },
});
