import type { JSX } from "preact";
import type { PageHeading } from "../lib/page-toc";
import { TitleBlock } from "./title-block";

export interface ChapterPageProps {
  title: string;
  showTitle: boolean;
  date?: string;
  html: string;
  /** Headings for the in-page table of contents; none renders no list */
  headings?: PageHeading[];
}

/**
 * Body of a chapter page: optional title block and the rendered fragment
 */
export function ChapterPage({
  title,
  showTitle,
  date,
  html,
  headings = [],
}: ChapterPageProps): JSX.Element {
  return (
    <article class="chapter">
      {showTitle && <TitleBlock title={title} date={date} />}
      {headings.length > 0 && (
        <nav class="page-toc" aria-label="On this page">
          <h2 class="page-toc-title">On this page</h2>
          <ul>
            {headings.map((heading) => (
              <li key={heading.id} class={`page-toc-level-${heading.level}`}>
                <a
                  href={`#${heading.id}`}
                  dangerouslySetInnerHTML={{ __html: heading.label }}
                />
              </li>
            ))}
          </ul>
        </nav>
      )}
      <div class="chapter-body" dangerouslySetInnerHTML={{ __html: html }} />
    </article>
  );
}
