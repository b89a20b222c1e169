import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [
    tsconfigPaths(),
  ],
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
    },
    testTimeout: 10000,
  },
});
