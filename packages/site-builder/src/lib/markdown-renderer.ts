import { basename, extname } from "path";
import {
  escapeHtml,
  extractHeading,
  getErrorMessage,
  markdownToHtml,
  parseMarkdown,
  stripMarkdown,
} from "@quire/utils";
import { RenderError } from "../errors";
import type { ChapterDocument, RenderedChapter } from "../types/chapter";

interface OpenFence {
  marker: string;
  line: number;
  /** Executable cell (```{python}); its `#|` option lines are dropped */
  executable: boolean;
}

const FENCE_OPEN = /^\s{0,3}(`{3,}|~{3,})\s*(.*)$/;
const DIV_OPEN = /^\s{0,3}(:{3,})\s*(\{[^}]*\}|[\w-]+)\s*$/;
const DIV_CLOSE = /^\s{0,3}:{3,}\s*$/;

/**
 * Rewrite Quarto markdown extensions into plain markdown/HTML:
 * executable fences become ordinary fences, fenced divs become <div> blocks
 *
 * @throws Error naming the line of an unterminated or unmatched fence
 */
export function preprocessMarkdown(content: string, lineOffset = 0): string {
  const output: string[] = [];
  const divs: number[] = [];
  let fence: OpenFence | undefined;

  const lines = content.split(/\r?\n/);
  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1 + lineOffset;

    if (fence) {
      if (isFenceClose(line, fence.marker)) {
        fence = undefined;
        output.push(line);
      } else if (!(fence.executable && /^\s*#\|/.test(line))) {
        output.push(line);
      }
      continue;
    }

    const fenceMatch = line.match(FENCE_OPEN);
    if (fenceMatch?.[1] !== undefined) {
      const marker = fenceMatch[1];
      const info = fenceMatch[2] ?? "";
      // Backtick fences may not carry backticks in their info string
      if (!(marker.startsWith("`") && info.includes("`"))) {
        const language = parseFenceLanguage(info);
        const executable = info.startsWith("{");
        fence = { marker, line: lineNumber, executable };
        output.push(`${marker}${language}`);
        continue;
      }
    }

    const divMatch = line.match(DIV_OPEN);
    if (divMatch?.[2] !== undefined) {
      divs.push(lineNumber);
      output.push(divOpenTag(divMatch[2]), "");
      continue;
    }

    if (DIV_CLOSE.test(line)) {
      if (divs.pop() === undefined) {
        throw new Error(`unmatched fenced div close at line ${lineNumber}`);
      }
      output.push("", "</div>", "");
      continue;
    }

    output.push(line);
  }

  if (fence) {
    throw new Error(`unterminated code fence opened at line ${fence.line}`);
  }
  const openDiv = divs.pop();
  if (openDiv !== undefined) {
    throw new Error(`unterminated fenced div opened at line ${openDiv}`);
  }

  return output.join("\n");
}

/**
 * Render a markdown chapter to an HTML fragment
 *
 * @throws RenderError
 */
export function renderMarkdownChapter(
  document: ChapterDocument,
): RenderedChapter {
  let frontmatter: Record<string, unknown>;
  let content: string;
  try {
    ({ frontmatter, content } = parseMarkdown(document.raw));
  } catch (error) {
    throw new RenderError(
      document.path,
      `invalid frontmatter: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }

  let prepared: string;
  try {
    const offset = bodyLineOffset(document.raw, content);
    prepared = preprocessMarkdown(content, offset);
  } catch (error) {
    throw new RenderError(document.path, getErrorMessage(error), {
      cause: error,
    });
  }

  const metadataTitle = stringField(frontmatter, "title");
  const date = dateField(frontmatter, "date");
  return {
    path: document.path,
    title:
      metadataTitle ?? extractHeading(content) ?? fallbackTitle(document.path),
    showTitle: metadataTitle !== undefined,
    ...(date !== undefined && { date }),
    html: markdownToHtml(prepared),
    searchText: toSearchText(content),
    fromCache: false,
  };
}

/**
 * Title for a chapter with no title of its own: the file name without
 * extension
 */
export function fallbackTitle(path: string): string {
  return basename(path, extname(path));
}

export function toSearchText(markdown: string): string {
  return stripMarkdown(markdown).replace(/\s+/g, " ").trim();
}

export function stringField(
  record: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim().length > 0
    ? value.trim()
    : undefined;
}

/**
 * Frontmatter date as written; YAML reads unquoted dates as Date objects
 */
export function dateField(
  record: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = record[key];
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return stringField(record, key);
}

/**
 * Lines in the file before the body, so errors point at file lines
 */
function bodyLineOffset(raw: string, body: string): number {
  const start = body.length > 0 ? raw.indexOf(body) : -1;
  return start > 0 ? raw.slice(0, start).split("\n").length - 1 : 0;
}

function isFenceClose(line: string, marker: string): boolean {
  const match = line.match(/^\s{0,3}(`{3,}|~{3,})\s*$/);
  const closing = match?.[1];
  return (
    closing !== undefined &&
    closing[0] === marker[0] &&
    closing.length >= marker.length
  );
}

/**
 * `{python}`, `{.python}`, `{python echo=false}` and `python` all name python
 */
function parseFenceLanguage(info: string): string {
  const trimmed = info.trim();
  if (trimmed.startsWith("{")) {
    const inner = trimmed.replace(/^\{|\}$/g, "").trim();
    const first = inner.split(/[\s,]+/)[0] ?? "";
    return first.replace(/^\./, "");
  }
  return trimmed.split(/\s+/)[0] ?? "";
}

function divOpenTag(attributes: string): string {
  if (!attributes.startsWith("{")) {
    return `<div class="${escapeHtml(attributes)}">`;
  }

  const tokens = attributes.slice(1, -1).trim().split(/\s+/).filter(Boolean);
  const classes = tokens
    .filter((token) => token.startsWith("."))
    .map((token) => token.slice(1));
  const id = tokens.find((token) => token.startsWith("#"))?.slice(1);

  const attrs: string[] = [];
  if (id) attrs.push(`id="${escapeHtml(id)}"`);
  if (classes.length > 0) {
    attrs.push(`class="${escapeHtml(classes.join(" "))}"`);
  }
  return attrs.length > 0 ? `<div ${attrs.join(" ")}>` : "<div>";
}
