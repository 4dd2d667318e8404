import {
  escapeHtml,
  extractHeading,
  getErrorMessage,
  markdownToHtml,
  parseMarkdown,
  z,
} from "@quire/utils";
import type { ZodIssue } from "@quire/utils";
import { RenderError } from "../errors";
import type { ChapterDocument, RenderedChapter } from "../types/chapter";
import {
  dateField,
  fallbackTitle,
  preprocessMarkdown,
  stringField,
  toSearchText,
} from "./markdown-renderer";

/**
 * nbformat 4 stores multi-line text either as a string or as a list of lines
 */
const multilineSchema = z.union([z.string(), z.array(z.string())]);

const mimeBundleSchema = z.record(z.unknown());

const outputSchema = z.discriminatedUnion("output_type", [
  z.object({
    output_type: z.literal("stream"),
    name: z.string().default("stdout"),
    text: multilineSchema,
  }),
  z.object({
    output_type: z.literal("execute_result"),
    data: mimeBundleSchema,
  }),
  z.object({
    output_type: z.literal("display_data"),
    data: mimeBundleSchema,
  }),
  z.object({
    output_type: z.literal("error"),
    ename: z.string(),
    evalue: z.string(),
    traceback: z.array(z.string()).default([]),
  }),
]);

const cellSchema = z.discriminatedUnion("cell_type", [
  z.object({ cell_type: z.literal("markdown"), source: multilineSchema }),
  z.object({
    cell_type: z.literal("code"),
    source: multilineSchema,
    outputs: z.array(outputSchema).default([]),
  }),
  z.object({ cell_type: z.literal("raw"), source: multilineSchema }),
]);

export const notebookSchema = z.object({
  nbformat: z.literal(4),
  metadata: z
    .object({
      kernelspec: z.object({ language: z.string().optional() }).optional(),
      language_info: z.object({ name: z.string().optional() }).optional(),
    })
    .default({}),
  cells: z.array(cellSchema),
});

export type Notebook = z.infer<typeof notebookSchema>;
export type NotebookCell = Notebook["cells"][number];
export type NotebookOutput = z.infer<typeof outputSchema>;

const DEFAULT_LANGUAGE = "python";

/**
 * Render a notebook chapter: cells in order, code followed by its recorded
 * outputs. Nothing is executed.
 *
 * @throws RenderError for invalid JSON, an unsupported notebook shape, or
 * malformed markdown in a cell
 */
export function renderNotebookChapter(
  document: ChapterDocument,
): RenderedChapter {
  const notebook = parseNotebook(document);
  const language =
    notebook.metadata.kernelspec?.language ??
    notebook.metadata.language_info?.name ??
    DEFAULT_LANGUAGE;

  let metadata: Record<string, unknown> = {};
  const fragments: string[] = [];
  const markdownCells: string[] = [];
  const searchSources: string[] = [];

  notebook.cells.forEach((cell, index) => {
    const source = joinText(cell.source);

    switch (cell.cell_type) {
      case "raw":
        // A leading raw cell may hold the document's YAML frontmatter
        if (index === 0 && source.trimStart().startsWith("---")) {
          metadata = parseCellFrontmatter(document.path, source);
        }
        break;

      case "markdown":
        markdownCells.push(source);
        searchSources.push(source);
        fragments.push(renderMarkdownCell(document.path, source, index));
        break;

      case "code":
        searchSources.push(source);
        fragments.push(renderCodeCell(source, cell.outputs, language));
        break;
    }
  });

  const metadataTitle = stringField(metadata, "title");
  const date = dateField(metadata, "date");
  const firstHeading = markdownCells
    .map((source) => extractHeading(source))
    .find((heading) => heading !== undefined);

  return {
    path: document.path,
    title: metadataTitle ?? firstHeading ?? fallbackTitle(document.path),
    showTitle: metadataTitle !== undefined,
    ...(date !== undefined && { date }),
    html: fragments.join("\n"),
    searchText: toSearchText(searchSources.join("\n\n")),
    fromCache: false,
  };
}

export function parseNotebook(document: ChapterDocument): Notebook {
  let json: unknown;
  try {
    json = JSON.parse(document.raw);
  } catch (error) {
    throw new RenderError(
      document.path,
      `invalid notebook JSON: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  const result = notebookSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue).join("; ");
    throw new RenderError(document.path, `invalid notebook: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function renderMarkdownCell(
  documentPath: string,
  source: string,
  index: number,
): string {
  try {
    return markdownToHtml(preprocessMarkdown(source));
  } catch (error) {
    throw new RenderError(
      documentPath,
      `cell ${index + 1}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

function renderCodeCell(
  source: string,
  outputs: NotebookOutput[],
  language: string,
): string {
  const { options, code } = splitCellOptions(source);
  const parts: string[] = ['<div class="cell">'];

  if (options["echo"] !== "false") {
    parts.push(
      `<pre class="cell-code"><code class="language-${escapeHtml(language)}">${escapeHtml(code)}</code></pre>`,
    );
  }

  if (options["output"] !== "false") {
    for (const output of outputs) {
      const rendered = renderOutput(output);
      if (rendered) parts.push(rendered);
    }
  }

  parts.push("</div>");
  return parts.join("\n");
}

/**
 * Render one recorded output; undefined when it has nothing displayable
 */
export function renderOutput(output: NotebookOutput): string | undefined {
  switch (output.output_type) {
    case "stream":
      return `<pre class="cell-output cell-output-${escapeHtml(output.name)}">${escapeHtml(joinText(output.text))}</pre>`;

    case "error": {
      const traceback =
        output.traceback.length > 0
          ? output.traceback.join("\n")
          : `${output.ename}: ${output.evalue}`;
      return `<pre class="cell-output cell-output-error">${escapeHtml(stripAnsi(traceback))}</pre>`;
    }

    case "execute_result":
    case "display_data":
      return renderMimeBundle(output.data);
  }
}

function renderMimeBundle(data: Record<string, unknown>): string | undefined {
  const html = mimeText(data, "text/html");
  if (html !== undefined) {
    return `<div class="cell-output cell-output-display">${html}</div>`;
  }

  for (const mime of ["image/png", "image/jpeg"]) {
    const image = mimeText(data, mime);
    if (image !== undefined) {
      const base64 = image.replace(/\s+/g, "");
      return `<div class="cell-output cell-output-display"><img src="data:${mime};base64,${base64}" alt=""></div>`;
    }
  }

  const svg = mimeText(data, "image/svg+xml");
  if (svg !== undefined) {
    return `<div class="cell-output cell-output-display">${svg}</div>`;
  }

  const text = mimeText(data, "text/plain");
  if (text !== undefined) {
    return `<pre class="cell-output cell-output-result">${escapeHtml(text)}</pre>`;
  }

  return undefined;
}

function mimeText(
  data: Record<string, unknown>,
  mime: string,
): string | undefined {
  const parsed = multilineSchema.safeParse(data[mime]);
  return parsed.success ? joinText(parsed.data) : undefined;
}

/**
 * Split leading `#| key: value` option lines from a code cell's source
 */
export function splitCellOptions(source: string): {
  options: Record<string, string>;
  code: string;
} {
  const options: Record<string, string> = {};
  const lines = source.split("\n");
  let start = 0;

  for (const line of lines) {
    const match = line.match(/^\s*#\|\s*([\w-]+)\s*:\s*(.*?)\s*$/);
    if (!match?.[1]) break;
    options[match[1]] = match[2] ?? "";
    start++;
  }

  return { options, code: lines.slice(start).join("\n") };
}

function parseCellFrontmatter(
  documentPath: string,
  source: string,
): Record<string, unknown> {
  try {
    return parseMarkdown(source).frontmatter;
  } catch (error) {
    throw new RenderError(
      documentPath,
      `invalid frontmatter: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

function joinText(text: string | string[]): string {
  return Array.isArray(text) ? text.join("") : text;
}

function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*[A-Za-z]/g, "");
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}
