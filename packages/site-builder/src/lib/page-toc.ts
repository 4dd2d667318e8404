import { slugify } from "@quire/utils";

export interface PageHeading {
  level: 2 | 3;
  id: string;
  /** Heading contents as rendered HTML */
  label: string;
}

/**
 * Give the chapter's level 2 and 3 headings ids and list them for the
 * in-page table of contents. Headings that already carry attributes are
 * left alone.
 */
export function anchorHeadings(html: string): {
  html: string;
  headings: PageHeading[];
} {
  const headings: PageHeading[] = [];
  const used = new Set<string>();

  const anchored = html.replace(
    /<h([23])>([\s\S]*?)<\/h\1>/g,
    (_match, level: string, label: string) => {
      const id = uniqueId(headingSlug(label), used);
      headings.push({ level: level === "2" ? 2 : 3, id, label });
      return `<h${level} id="${id}">${label}</h${level}>`;
    },
  );

  return { html: anchored, headings };
}

function headingSlug(label: string): string {
  const text = label.replace(/<[^>]*>/g, "").replace(/&[#\w]+;/g, " ");
  return slugify(text) || "section";
}

function uniqueId(slug: string, used: Set<string>): string {
  let id = slug;
  for (let n = 1; used.has(id); n++) id = `${slug}-${n}`;
  used.add(id);
  return id;
}
