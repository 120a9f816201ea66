/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so tests can use
 * vi.stubEnv() and have the change picked up by the config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep test output readable; individual tests can still stub LOG_LEVEL
process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
