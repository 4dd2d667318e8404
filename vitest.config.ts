import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
    jsxImportSource: "preact",
  },
  test: {
    include: ["{shared,packages,interfaces}/*/test/**/*.test.{ts,tsx}"],
    environment: "node",
  },
});
