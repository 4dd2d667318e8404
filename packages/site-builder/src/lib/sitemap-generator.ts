import { escapeXml } from "@quire/utils";
import { INDEX_PAGE } from "./page-paths";

interface SitemapEntry {
  url: string;
  lastmod: string;
  changefreq: "daily" | "weekly" | "monthly";
  priority: number;
}

/**
 * Generate sitemap.xml content for the written pages
 *
 * @param pages output paths relative to the site root
 * @param lastmod build date (YYYY-MM-DD), shared by every entry
 */
export function generateSitemap(
  pages: string[],
  siteUrl: string,
  lastmod: string,
): string {
  const baseUrl = siteUrl.replace(/\/+$/, "");

  const entries: SitemapEntry[] = pages.map((page) => ({
    url: page === INDEX_PAGE ? `${baseUrl}/` : `${baseUrl}/${page}`,
    lastmod,
    // Home page changes more frequently
    changefreq: page === INDEX_PAGE ? "weekly" : "monthly",
    priority: page === INDEX_PAGE ? 1.0 : 0.8,
  }));

  const urlEntries = entries
    .map(
      (entry) => `  <url>
    <loc>${escapeXml(entry.url)}</loc>
    <lastmod>${entry.lastmod}</lastmod>
    <changefreq>${entry.changefreq}</changefreq>
    <priority>${entry.priority.toFixed(1)}</priority>
  </url>`,
    )
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urlEntries}
</urlset>
`;
}
