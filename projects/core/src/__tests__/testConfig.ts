/**
 * Shared paths and switches for tests.
 */

import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { describe } from "vitest";

function findProjectRoot(): string {
  const thisDir = fileURLToPath(new URL(".", import.meta.url));
  // src/__tests__ -> src -> core -> projects -> repository root
  return resolve(thisDir, "../../../..");
}

export const PROJECT_ROOT = findProjectRoot();

/**
 * Downloaded models live outside the source tree.
 */
export const TRANSFORMERS_CACHE_DIR = resolve(PROJECT_ROOT, ".models", "transformers-cache");

/**
 * Integration tests download models or need a running XTTS server.
 * Set RUN_INTEGRATION_TESTS=true to enable them.
 */
export const RUN_INTEGRATION_TESTS = process.env["RUN_INTEGRATION_TESTS"] === "true";

/**
 * XTTS server used by integration tests.
 */
export const XTTS_TEST_URL = process.env["XTTS_TEST_URL"] ?? "http://localhost:8000";

/**
 * Skips the suite unless RUN_INTEGRATION_TESTS is enabled.
 */
export const describeIntegration = RUN_INTEGRATION_TESTS ? describe : describe.skip;
