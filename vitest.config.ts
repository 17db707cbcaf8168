import { defineConfig } from "vitest/config";

export default defineConfig({
  // Keep tests hermetic: never pick up local `.env` files.
  envDir: ".vitest-env",
  test: {
    globals: true,
    // Threads avoid forking child processes in restricted sandboxes.
    pool: "threads",
    include: ["packages/**/src/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
  },
});
