import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["aero-parser/src/**/*.test.ts", "aerodata-api/src/**/*.test.ts"],
    environment: "node",
  },
});
