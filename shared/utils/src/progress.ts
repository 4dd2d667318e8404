/**
 * Progress notification for long-running operations
 */
export interface ProgressNotification {
  progress: number;
  total?: number;
  message?: string;
}

/**
 * Progress callback type
 */
export type ProgressCallback = (
  notification: ProgressNotification,
) => Promise<void>;

/**
 * Wraps an optional progress callback
 *
 * @example
 * ```typescript
 * const progress = ProgressReporter.from(onProgress);
 *
 * await progress?.report({ message: "Rendering", progress: 1, total: 4 });
 * ```
 */
export class ProgressReporter {
  private constructor(private readonly callback: ProgressCallback) {}

  /**
   * Create a progress reporter from a callback
   */
  static from(
    callback: ProgressCallback | undefined,
  ): ProgressReporter | undefined {
    if (!callback) return undefined;
    return new ProgressReporter(callback);
  }

  async report(notification: ProgressNotification): Promise<void> {
    await this.callback(notification);
  }
}
