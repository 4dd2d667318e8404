import type { JSX } from "preact";

export interface TitleBlockProps {
  title: string;
  subtitle?: string;
  authors?: string[];
  date?: string;
}

export function TitleBlock({
  title,
  subtitle,
  authors = [],
  date,
}: TitleBlockProps): JSX.Element {
  return (
    <header class="title-block">
      <h1 class="title">{title}</h1>
      {subtitle && <p class="subtitle">{subtitle}</p>}
      {authors.length > 0 && <p class="meta author">{authors.join(", ")}</p>}
      {date && <p class="meta date">{date}</p>}
    </header>
  );
}
