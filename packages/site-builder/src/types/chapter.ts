export type ChapterFormat = "markdown" | "notebook";

/**
 * A content file as read from disk. Read once per build, never mutated.
 */
export interface ChapterDocument {
  /** Manifest-relative path, unique per book */
  path: string;
  absolutePath: string;
  format: ChapterFormat;
  raw: string;
  contentHash: string;
}

/**
 * Output of rendering one chapter
 */
export interface RenderedChapter {
  path: string;
  title: string;
  /** Title came from metadata and is not part of the body */
  showTitle: boolean;
  /** Date from the chapter's metadata, unresolved ("today" stays as is) */
  date?: string;
  html: string;
  searchText: string;
  fromCache: boolean;
}

const MARKDOWN_EXTENSIONS = [".md", ".qmd", ".markdown", ".rmd"];
const NOTEBOOK_EXTENSIONS = [".ipynb"];

/**
 * Detect the chapter format from its file extension
 */
export function detectChapterFormat(path: string): ChapterFormat | undefined {
  const dot = path.lastIndexOf(".");
  if (dot === -1) return undefined;
  const extension = path.slice(dot).toLowerCase();
  if (MARKDOWN_EXTENSIONS.includes(extension)) return "markdown";
  if (NOTEBOOK_EXTENSIONS.includes(extension)) return "notebook";
  return undefined;
}
