import { defineConfig } from "vitest/config";
import path from "path";

const pkg = (name: string) => path.resolve(__dirname, "packages", name, "src/index.ts");

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.spec.ts", "apps/*/tests/**/*.spec.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
  resolve: {
    alias: {
      "@edgeline/contracts": pkg("contracts"),
      "@edgeline/core": pkg("core"),
      "@edgeline/adapters": pkg("adapters"),
      "@edgeline/db": pkg("db"),
    },
  },
});
