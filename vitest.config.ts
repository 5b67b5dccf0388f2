import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Spies and stubbed env vars are undone after every test
    restoreMocks: true,
    unstubEnvs: true,
  },
});
