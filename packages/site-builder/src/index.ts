// Site builder package - turns a book manifest into a static HTML site
export { SiteBuilder, buildSite } from "./lib/site-builder";
export { loadManifest, parseManifest } from "./lib/manifest-loader";
export type {
  LoadedManifest,
  LoadManifestOptions,
} from "./lib/manifest-loader";
export { readChapter } from "./lib/chapter-reader";
export { renderChapter } from "./lib/chapter-renderer";
export {
  renderMarkdownChapter,
  preprocessMarkdown,
} from "./lib/markdown-renderer";
export {
  renderNotebookChapter,
  parseNotebook,
  splitCellOptions,
} from "./lib/notebook-renderer";
export type { Notebook, NotebookCell, NotebookOutput } from "./lib/notebook-renderer";
export {
  buildNavigation,
  flattenNavigation,
  listChapters,
  APPENDICES_TITLE,
} from "./lib/navigation";
export { createBuildContext, resolveDate } from "./lib/build-context";
export { FreezeCache } from "./lib/freeze-cache";
export { buildSearchIndex } from "./lib/search-index";
export type { SearchEntry } from "./lib/search-index";
export { generateSitemap } from "./lib/sitemap-generator";
export { INDEX_PAGE, outputPathFor, relativeHref } from "./lib/page-paths";

export {
  siteBuilderOptionsSchema,
  missingChapterPolicySchema,
} from "./config";
export type {
  SiteBuilderOptions,
  ParsedSiteBuilderOptions,
  MissingChapterPolicy,
} from "./config";

export {
  SiteBuilderError,
  ManifestParseError,
  ManifestReferenceError,
  RenderError,
  SiteIOError,
} from "./errors";
export type { DocumentError, IOOperation } from "./errors";

export * from "./types/manifest";
export * from "./types/chapter";
export * from "./types/navigation";
export * from "./types/build";
