import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const config = defineConfig({
  resolve: {
    alias: [
      {
        find: /^@overlay\//,
        replacement: fileURLToPath(new URL("./app/overlay/src/", import.meta.url))
      }
    ]
  },
  test: {
    environment: "node",
    include: ["app/**/*.test.ts", "app/**/*.test.tsx", "scripts/**/*.test.ts"]
  }
});

export default config;
