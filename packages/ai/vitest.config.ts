import { defineConfig } from "vitest/config";
import { sharedConfig } from "../vitest-config/index";

export default defineConfig({
  ...sharedConfig,
  test: {
    ...sharedConfig.test,
    name: "ai",
  },
});
