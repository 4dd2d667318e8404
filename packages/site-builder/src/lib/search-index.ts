import type { RenderedChapter } from "../types/chapter";
import type { NavigationTree } from "../types/navigation";
import { flattenNavigation, sectionOf } from "./navigation";

export interface SearchEntry {
  href: string;
  title: string;
  /** Part the page belongs to, empty for top-level pages */
  section: string;
  text: string;
}

/**
 * Build search entries for rendered chapters in navigation order
 */
export function buildSearchIndex(
  navigation: NavigationTree,
  rendered: ReadonlyMap<string, RenderedChapter>,
): SearchEntry[] {
  const entries: SearchEntry[] = [];
  for (const leaf of flattenNavigation(navigation)) {
    const chapter = rendered.get(leaf.source);
    if (!chapter) continue;
    entries.push({
      href: leaf.href,
      title: chapter.title,
      section: sectionOf(navigation, leaf.href) ?? "",
      text: chapter.searchText,
    });
  }
  return entries;
}

export function serializeSearchIndex(entries: SearchEntry[]): string {
  return JSON.stringify(entries, null, 2) + "\n";
}
