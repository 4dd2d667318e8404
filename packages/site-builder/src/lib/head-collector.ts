import { escapeHtml } from "@quire/utils";

/**
 * Props for head metadata
 */
export interface HeadProps {
  title: string;
  description?: string;
  author?: string;
  canonicalUrl?: string;
  /** Stylesheet hrefs, relative to the page */
  stylesheets?: string[];
}

/**
 * Renders the <head> contents for one page
 */
export class HeadCollector {
  constructor(private readonly headProps: HeadProps) {}

  /**
   * Generate HTML string for the head section
   */
  generateHeadHTML(): string {
    const tags: string[] = [];

    // Essential meta tags (always included)
    tags.push('<meta charset="UTF-8">');
    tags.push(
      '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    );
    tags.push('<meta name="generator" content="quire">');

    const { title, description, author, canonicalUrl, stylesheets } =
      this.headProps;

    tags.push(`<title>${escapeHtml(title)}</title>`);

    if (description) {
      tags.push(`<meta name="description" content="${escapeHtml(description)}">`);
    }
    if (author) {
      tags.push(`<meta name="author" content="${escapeHtml(author)}">`);
    }

    // Open Graph
    tags.push(`<meta property="og:title" content="${escapeHtml(title)}">`);
    if (description) {
      tags.push(
        `<meta property="og:description" content="${escapeHtml(description)}">`,
      );
    }
    tags.push('<meta property="og:type" content="article">');

    if (canonicalUrl) {
      tags.push(`<link rel="canonical" href="${escapeHtml(canonicalUrl)}">`);
    }

    for (const href of stylesheets ?? []) {
      tags.push(`<link rel="stylesheet" href="${escapeHtml(href)}">`);
    }

    return tags.join("\n    ");
  }
}
