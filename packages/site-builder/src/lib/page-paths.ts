import { posix } from "path";

export const INDEX_PAGE = "index.html";

/**
 * Output page for a chapter: its manifest path with an .html extension
 */
export function outputPathFor(chapterPath: string): string {
  const slashed = chapterPath.replace(/\\/g, "/");
  const extension = posix.extname(slashed);
  const stem = extension ? slashed.slice(0, -extension.length) : slashed;
  return `${stem}.html`;
}

/**
 * Link from one page to another, both relative to the site root
 */
export function relativeHref(fromPage: string, toPage: string): string {
  const relative = posix.relative(posix.dirname(fromPage), toPage);
  return relative === "" ? posix.basename(toPage) : relative;
}
