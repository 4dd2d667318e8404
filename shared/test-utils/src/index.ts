/**
 * @quire/test-utils
 *
 * Shared test helpers: loggers that stay quiet, progress recording and
 * temporary project directories.
 */

// Logger utilities
export {
  createSilentLogger,
  createTestLogger,
  createMockLogger,
} from "./mock-logger";

// Progress
export { createProgressRecorder } from "./progress-recorder";
export type { ProgressRecorder } from "./progress-recorder";

// Filesystem fixtures
export { createTempProject } from "./fixtures";
export type { TempProject } from "./fixtures";
