import { vi } from "vitest";
import { Logger, LogLevel } from "@quire/utils";

/**
 * Create a silent logger for tests
 * This is a real logger with LogLevel.NONE - no output
 *
 * Use when you just need a logger that doesn't print anything
 */
export function createSilentLogger(context?: string): Logger {
  return Logger.createFresh({
    level: LogLevel.NONE,
    ...(context ? { context } : {}),
  });
}

/**
 * Create a test logger with a specific log level
 * Useful for debugging tests
 */
export function createTestLogger(
  level: LogLevel = LogLevel.NONE,
  context?: string,
): Logger {
  return Logger.createFresh({
    level,
    ...(context ? { context } : {}),
  });
}

/**
 * Create a silent Logger whose level methods are spies.
 * Children are the same logger, so calls made through `child()` are
 * recorded on the returned instance.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * await buildSite(loaded, {}, undefined, logger);
 *
 * expect(logger.warn).toHaveBeenCalledWith("Skipping missing chapter: b.qmd");
 * ```
 */
export function createMockLogger(): Logger {
  const logger = createSilentLogger();
  vi.spyOn(logger, "debug");
  vi.spyOn(logger, "info");
  vi.spyOn(logger, "warn");
  vi.spyOn(logger, "error");
  vi.spyOn(logger, "child").mockReturnValue(logger);
  return logger;
}
