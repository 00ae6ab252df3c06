import type { UserConfig } from "vitest/config";

export const sharedConfig = {
  test: {
    include: ["src/**/*.test.ts"],
    restoreMocks: true,
  },
} satisfies UserConfig;
