import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    target: [
      "es2022",
      "node20",
    ],
  },
  test: {
    // process.chdir はワーカースレッドでは使えない
    pool: "forks",
    include: [
      "tests/**/*.test.ts",
    ],
  },
});
