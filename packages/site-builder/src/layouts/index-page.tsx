import type { JSX } from "preact";
import type { NavigationLeaf, NavigationTree } from "../types/navigation";
import { relativeHref } from "../lib/page-paths";
import { TitleBlock } from "./title-block";
import type { TitleBlockProps } from "./title-block";

export interface IndexPageProps {
  book: TitleBlockProps & { description?: string };
  navigation: NavigationTree;
  currentPage: string;
  unavailable: ReadonlySet<string>;
}

/**
 * Generated home page for books without an index chapter
 */
export function IndexPage({
  book,
  navigation,
  currentPage,
  unavailable,
}: IndexPageProps): JSX.Element {
  const entry = (leaf: NavigationLeaf): JSX.Element => (
    <li key={leaf.href}>
      {unavailable.has(leaf.href) ? (
        <span>{leaf.title}</span>
      ) : (
        <a href={relativeHref(currentPage, leaf.href)}>{leaf.title}</a>
      )}
    </li>
  );

  return (
    <article class="book-index">
      <TitleBlock {...book} />
      {book.description && <p class="description">{book.description}</p>}
      <h2>Contents</h2>
      <ol class="toc">
        {navigation.map((node) =>
          node.kind === "chapter" ? (
            entry(node)
          ) : (
            <li key={`part:${node.title}`}>
              <strong>{node.title}</strong>
              <ol>{node.children.map(entry)}</ol>
            </li>
          ),
        )}
      </ol>
    </article>
  );
}
