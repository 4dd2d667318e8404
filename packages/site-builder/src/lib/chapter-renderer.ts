import { getErrorMessage } from "@quire/utils";
import { RenderError, SiteBuilderError } from "../errors";
import type { ChapterDocument, RenderedChapter } from "../types/chapter";
import { renderMarkdownChapter } from "./markdown-renderer";
import { renderNotebookChapter } from "./notebook-renderer";

/**
 * Convert a chapter document into an HTML fragment, keeping the source
 * order of prose, code and recorded output
 *
 * @throws RenderError when the document cannot be converted
 */
export function renderChapter(document: ChapterDocument): RenderedChapter {
  try {
    switch (document.format) {
      case "markdown":
        return renderMarkdownChapter(document);
      case "notebook":
        return renderNotebookChapter(document);
    }
  } catch (error) {
    if (error instanceof SiteBuilderError) throw error;
    throw new RenderError(document.path, getErrorMessage(error), {
      cause: error,
    });
  }
}
