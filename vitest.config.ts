import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.spec.ts"],
    // better-sqlite3 and sharp are native add-ons; keep each file in its own process
    pool: "forks",
  },
});
