import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    env: {
      // Keep the developer's shell from leaking into config resolution.
      GREEN_MODE: "",
      TRIAGE_DEBUG: "",
      TRIAGE_CONFIG: "",
      CLASSIFIER_URL: "",
      SUITE_TIMEOUT: "",
      EXECUTOR_PATH: "",
    },
  },
});
