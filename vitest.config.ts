import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // Forwarding tests bind backends on ephemeral ports; run files one at a time
    fileParallelism: false,
  },
});
