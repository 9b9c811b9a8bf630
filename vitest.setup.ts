/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so tests can use
 * vi.stubEnv() and have the values picked up on the next getConfig().
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep pino quiet unless a run asks for logs explicitly
process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
