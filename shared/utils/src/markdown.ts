import matter from "gray-matter";
import { Marked } from "marked";
import { remark } from "remark";
import { toString } from "mdast-util-to-string";
import type { RootContent } from "mdast";

/**
 * Parse frontmatter and content from markdown
 * Throws when the frontmatter block is not valid YAML
 */
export function parseMarkdown(markdown: string): {
  frontmatter: Record<string, unknown>;
  content: string;
} {
  // Passing options skips gray-matter's per-string result cache
  const { data, content } = matter(markdown, {});
  return {
    frontmatter: isRecord(data) ? data : {},
    content: content.trim(),
  };
}

/**
 * First level-one ATX heading outside fenced code
 */
export function extractHeading(content: string): string | undefined {
  let inFence = false;
  for (const line of content.split("\n")) {
    if (/^\s*(```|~~~)/.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;
    const match = line.match(/^#\s+(.+?)\s*#*\s*$/);
    if (match?.[1]) {
      return match[1].trim();
    }
  }
  return undefined;
}

const marked = new Marked({
  gfm: true, // GitHub Flavored Markdown
  breaks: false,
  pedantic: false,
});

/**
 * Convert markdown to HTML
 */
export function markdownToHtml(markdown: string): string {
  const html = marked.parse(markdown, { async: false });
  // Only async extensions return a promise, and none are registered
  if (typeof html !== "string") {
    throw new Error("Markdown renderer returned a promise");
  }
  return html;
}

/**
 * Strip markdown formatting from text to get plain text.
 * Blocks are separated by blank lines, list items by newlines.
 */
export function stripMarkdown(text: string): string {
  const tree = remark().parse(text);
  return tree.children.map(blockText).join("\n\n");
}

function blockText(node: RootContent): string {
  switch (node.type) {
    case "list":
      return node.children.map(blockText).join("\n");
    case "listItem":
    case "blockquote":
      return node.children.map(blockText).join("\n");
    default:
      return toString(node);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
