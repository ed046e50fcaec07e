import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "logger",
    environment: "node",
    include: ["src/**/*.test.mts"],
    // vi.stubEnv is undone between tests
    unstubEnvs: true,
  },
});
