import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // config tests chdir into fixture directories
    pool: "forks",
  },
});
