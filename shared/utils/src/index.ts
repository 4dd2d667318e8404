/**
 * Quire Utils Package
 *
 * Shared utilities used by the site builder and the CLI.
 */

// Logger
export { Logger, LogLevel, parseLogLevel } from "./logger";
export type { LoggerOptions } from "./logger";
export { default as defaultLogger } from "./logger";

// Markdown utilities
export {
  parseMarkdown,
  extractHeading,
  markdownToHtml,
  stripMarkdown,
} from "./markdown";

// Progress utilities
export { ProgressReporter } from "./progress";
export type { ProgressCallback, ProgressNotification } from "./progress";

// YAML utilities
export { fromYaml } from "./yaml";

// Strings
export { slugify } from "./string-utils";

// Hashing
export { computeContentHash } from "./hash";

// HTML escaping
export { escapeHtml, escapeXml } from "./html";

// Error helpers
export { getErrorMessage, getErrorCode } from "./error";

// Zod
export { z } from "./zod";
export type { ZodIssue } from "./zod";
