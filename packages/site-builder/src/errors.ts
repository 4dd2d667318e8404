/**
 * Base error class for site builder operations
 */
export class SiteBuilderError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SiteBuilderError";
  }
}

/**
 * Manifest is not valid YAML or does not have the expected structure.
 * Always fatal: no navigation can be built without a valid manifest.
 */
export class ManifestParseError extends SiteBuilderError {
  public readonly issues: string[];

  constructor(
    message: string,
    issues: string[] = [],
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(
      issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message,
      context,
      options,
    );
    this.name = "ManifestParseError";
    this.issues = issues;
  }
}

/**
 * A chapter listed in the manifest does not resolve to an existing file
 */
export class ManifestReferenceError extends SiteBuilderError {
  constructor(
    public readonly chapterPath: string,
    public readonly resolvedPath: string,
  ) {
    super(`Chapter not found: ${chapterPath}`, { chapterPath, resolvedPath });
    this.name = "ManifestReferenceError";
  }
}

/**
 * A single document could not be converted to HTML
 */
export class RenderError extends SiteBuilderError {
  constructor(
    public readonly documentPath: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Failed to render ${documentPath}: ${reason}`,
      { documentPath },
      options,
    );
    this.name = "RenderError";
  }
}

export type IOOperation = "read" | "write" | "remove";

/**
 * Filesystem failure, carrying the offending path
 */
export class SiteIOError extends SiteBuilderError {
  constructor(
    public readonly path: string,
    public readonly operation: IOOperation,
    options?: { cause?: unknown },
  ) {
    super(
      `Failed to ${operation} ${path}${describeCause(options?.cause)}`,
      { path, operation },
      options,
    );
    this.name = "SiteIOError";
  }
}

/**
 * Errors reported per document without stopping the build
 */
export type DocumentError = RenderError | ManifestReferenceError | SiteIOError;

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `: ${cause.message}`;
  return cause === undefined ? "" : `: ${String(cause)}`;
}
