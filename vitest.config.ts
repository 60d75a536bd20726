import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["docs/.vitepress/**/*.test.ts"],
    environment: "node",
  },
});
