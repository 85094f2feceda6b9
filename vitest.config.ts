import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.{ts,tsx}"],
    environment: "node",
    server: {
      deps: {
        // Its ESM build uses directory imports that Node refuses.
        inline: ["clipanion"],
      },
    },
  },
});
