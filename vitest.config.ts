import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const cliSrc = fileURLToPath(new URL("./apps/cli/src/", import.meta.url));
const sharedEntry = fileURLToPath(
  new URL("./packages/shared/src/index.ts", import.meta.url),
);

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@\//, replacement: cliSrc },
      { find: /^@myjob\/shared$/, replacement: sharedEntry },
    ],
  },
  test: {
    include: ["apps/**/*.test.ts", "packages/**/*.test.ts"],
    environment: "node",
  },
});
