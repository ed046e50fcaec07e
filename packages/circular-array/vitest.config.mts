import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "circular-array",
    environment: "node",
    include: ["src/**/*.test.mts"],
  },
});
