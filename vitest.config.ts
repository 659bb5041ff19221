import { fileURLToPath } from "node:url";
import { defineConfig, configDefaults } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@mailstore\/shared\/(.*)\.js$/,
        replacement: fileURLToPath(new URL("./shared/$1.ts", import.meta.url)),
      },
    ],
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "dist/**"],
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**", "shared/**"],
    },
  },
});
