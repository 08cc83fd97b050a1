// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // TEXFORM_* entries from .env files land in process.env, where configFromEnv reads by default
  const env = loadEnv(mode, process.cwd(), "TEXFORM_");

  return {
    test: {
      env,
      include: ["test/**/*.spec.ts"],
    },
  };
});
