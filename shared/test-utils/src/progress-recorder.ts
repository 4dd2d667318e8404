import type { ProgressCallback, ProgressNotification } from "@quire/utils";

export interface ProgressRecorder {
  callback: ProgressCallback;
  notifications: ProgressNotification[];
}

/**
 * Progress callback that keeps every notification it receives
 *
 * @example
 * ```typescript
 * const recorder = createProgressRecorder();
 * await buildSite(loaded, {}, recorder.callback);
 *
 * expect(recorder.notifications.at(-1)?.message).toBe("Site build complete");
 * ```
 */
export function createProgressRecorder(): ProgressRecorder {
  const notifications: ProgressNotification[] = [];
  return {
    notifications,
    callback: async (notification) => {
      notifications.push(notification);
    },
  };
}
