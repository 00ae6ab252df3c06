import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/core/vitest.config.ts",
  "packages/ai/vitest.config.ts",
  "apps/cli/vitest.config.ts",
]);
