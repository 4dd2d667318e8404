import type { BuildContext } from "../types/build";
import type { BookManifest } from "../types/manifest";

/**
 * Create the per-build context. The clock is read once here so every page
 * of a build sees the same date.
 */
export function createBuildContext(
  manifest: BookManifest,
  paths: { projectDir: string; outputDir: string },
  now: Date = new Date(),
): BuildContext {
  return {
    now,
    today: now.toISOString().slice(0, 10),
    manifest,
    projectDir: paths.projectDir,
    outputDir: paths.outputDir,
  };
}

/**
 * Resolve a manifest or chapter date; "today" and "now" become the build date
 */
export function resolveDate(
  date: string | undefined,
  context: Pick<BuildContext, "today">,
): string | undefined {
  if (date === undefined) return undefined;
  const keyword = date.trim().toLowerCase();
  return keyword === "today" || keyword === "now" ? context.today : date;
}
