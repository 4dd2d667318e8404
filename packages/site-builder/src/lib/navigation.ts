import type { BookManifest, ChapterRef } from "../types/manifest";
import type {
  NavigationLeaf,
  NavigationNode,
  NavigationTree,
} from "../types/navigation";
import { fallbackTitle } from "./markdown-renderer";
import { outputPathFor } from "./page-paths";

export const APPENDICES_TITLE = "Appendices";

/**
 * Build the navigation tree in manifest order. Nothing is sorted or
 * deduplicated; chapters without a known title use their file name.
 */
export function buildNavigation(
  manifest: BookManifest,
  titles: ReadonlyMap<string, string>,
): NavigationTree {
  const leaf = (chapter: ChapterRef): NavigationLeaf => ({
    kind: "chapter",
    title: titles.get(chapter.path) ?? fallbackTitle(chapter.path),
    href: outputPathFor(chapter.path),
    source: chapter.path,
  });

  const tree = manifest.entries.map(
    (entry): NavigationNode =>
      entry.kind === "chapter"
        ? leaf(entry)
        : {
            kind: "part",
            title: entry.title,
            children: entry.chapters.map(leaf),
          },
  );

  if (manifest.appendices.length > 0) {
    tree.push({
      kind: "part",
      title: APPENDICES_TITLE,
      children: manifest.appendices.map(leaf),
    });
  }

  return tree;
}

/**
 * Every page link in reading order
 */
export function flattenNavigation(tree: NavigationTree): NavigationLeaf[] {
  return tree.flatMap((node) =>
    node.kind === "chapter" ? [node] : node.children,
  );
}

/**
 * Title of the group a page belongs to, or undefined for top-level pages
 */
export function sectionOf(
  tree: NavigationTree,
  href: string,
): string | undefined {
  for (const node of tree) {
    if (node.kind === "part" && node.children.some((c) => c.href === href)) {
      return node.title;
    }
  }
  return undefined;
}

/**
 * Every chapter of the manifest in reading order
 */
export function listChapters(manifest: BookManifest): ChapterRef[] {
  return [
    ...manifest.entries.flatMap((entry) =>
      entry.kind === "chapter" ? [entry] : entry.chapters,
    ),
    ...manifest.appendices,
  ];
}
