import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["app/server/src/**/*.spec.ts"],
    env: {
      LOG_LEVEL: "silent"
    }
  }
});
