import {defineConfig} from "vitest/config";

export default defineConfig({
  test: {
    pool: "threads",
    include: ["packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/.{idea,git,cache,output,temp}/**"],
    reporters: ["default"],
    coverage: {
      enabled: process.env.CI === "true",
      clean: true,
      all: false,
      extension: [".ts"],
      provider: "v8",
      reporter: [["lcovonly", {file: "lcov.info"}], ["text"]],
      reportsDirectory: "./coverage",
      exclude: ["**/*.d.ts", "**/*.js", "**/coverage/**", "**/test/**", "**/node_modules/**"],
    },
  },
});
