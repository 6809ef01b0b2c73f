/**
 * Test setup - runs before each test file.
 * Suppresses logging output during tests to reduce noise.
 *
 * Environment variables:
 * - TEST_VERBOSE: Set to "1" to see log output
 */

import { configureLogging } from "./core/logging/logger.js";

if (process.env.TEST_VERBOSE !== "1") {
  configureLogging({ level: "silent" });
}
