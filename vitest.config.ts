import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // convert.test.ts changes the working directory, which worker threads forbid
    pool: "forks",
  },
});
