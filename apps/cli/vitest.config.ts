import { defineConfig } from "vitest/config";
import { sharedConfig } from "../../packages/vitest-config/index";

export default defineConfig({
  ...sharedConfig,
  test: {
    ...sharedConfig.test,
    name: "cli",
    // Run CLI tests in a Node environment
    environment: "node",
  },
});
