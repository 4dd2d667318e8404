import type { JSX } from "preact";
import type { NavigationLeaf, NavigationTree } from "../types/navigation";
import { relativeHref } from "../lib/page-paths";

export interface SidebarProps {
  bookTitle: string;
  navigation: NavigationTree;
  /** Page being rendered, relative to the site root */
  currentPage: string;
  homePage: string;
  /** Pages that failed to render; listed without a link */
  unavailable: ReadonlySet<string>;
  themeToggle?: boolean;
  repoUrl?: string;
}

/**
 * Table of contents in manifest order
 */
export function Sidebar({
  bookTitle,
  navigation,
  currentPage,
  homePage,
  unavailable,
  themeToggle = false,
  repoUrl,
}: SidebarProps): JSX.Element {
  const link = (leaf: NavigationLeaf): JSX.Element => {
    if (unavailable.has(leaf.href)) {
      return (
        <li key={leaf.href}>
          <span class="sidebar-link unavailable">{leaf.title}</span>
        </li>
      );
    }
    const active = leaf.href === currentPage;
    return (
      <li key={leaf.href}>
        <a
          class={active ? "sidebar-link active" : "sidebar-link"}
          href={relativeHref(currentPage, leaf.href)}
          aria-current={active ? "page" : undefined}
        >
          {leaf.title}
        </a>
      </li>
    );
  };

  return (
    <nav class="sidebar" aria-label="Table of contents">
      <a class="sidebar-title" href={relativeHref(currentPage, homePage)}>
        {bookTitle}
      </a>
      {repoUrl && (
        <a class="sidebar-repo" href={repoUrl}>
          Source repository
        </a>
      )}
      {themeToggle && (
        <button type="button" class="theme-toggle">
          Toggle dark mode
        </button>
      )}
      <ul class="sidebar-nav">
        {navigation.map((node) =>
          node.kind === "chapter" ? (
            link(node)
          ) : (
            <li class="sidebar-part" key={`part:${node.title}`}>
              <span class="sidebar-part-title">{node.title}</span>
              <ul>{node.children.map(link)}</ul>
            </li>
          ),
        )}
      </ul>
    </nav>
  );
}
