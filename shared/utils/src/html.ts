const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#039;",
};

/**
 * Escape text for use in HTML content and attribute values
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (m) => HTML_ESCAPES[m] ?? m);
}

/**
 * Escape special XML characters
 */
export function escapeXml(text: string): string {
  return escapeHtml(text).replace(/&#039;/g, "&apos;");
}
