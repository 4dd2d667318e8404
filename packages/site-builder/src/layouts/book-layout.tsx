import type { ComponentChildren, JSX } from "preact";
import type { NavigationLeaf, NavigationTree } from "../types/navigation";
import { relativeHref } from "../lib/page-paths";
import { Sidebar } from "./sidebar";

export interface RepoLink {
  label: string;
  href: string;
}

export interface BookLayoutProps {
  bookTitle: string;
  navigation: NavigationTree;
  currentPage: string;
  homePage: string;
  unavailable: ReadonlySet<string>;
  /** Offer a light/dark switch in the sidebar */
  themeToggle: boolean;
  repoUrl?: string;
  content: ComponentChildren;
  previous?: NavigationLeaf;
  next?: NavigationLeaf;
  repoLinks?: RepoLink[];
}

/**
 * Page frame shared by every page of the book
 */
export function BookLayout({
  bookTitle,
  navigation,
  currentPage,
  homePage,
  unavailable,
  themeToggle,
  repoUrl,
  content,
  previous,
  next,
  repoLinks = [],
}: BookLayoutProps): JSX.Element {
  return (
    <div class="book">
      <Sidebar
        bookTitle={bookTitle}
        navigation={navigation}
        currentPage={currentPage}
        homePage={homePage}
        unavailable={unavailable}
        themeToggle={themeToggle}
        repoUrl={repoUrl}
      />
      <main class="content">
        {content}
        {(previous || next) && (
          <nav class="page-navigation" aria-label="Pages">
            {previous ? (
              <a
                class="page-previous"
                rel="prev"
                href={relativeHref(currentPage, previous.href)}
              >
                ← {previous.title}
              </a>
            ) : (
              <span />
            )}
            {next && (
              <a
                class="page-next"
                rel="next"
                href={relativeHref(currentPage, next.href)}
              >
                {next.title} →
              </a>
            )}
          </nav>
        )}
        {repoLinks.length > 0 && (
          <div class="repo-actions">
            {repoLinks.map((link) => (
              <a key={link.label} href={link.href}>
                {link.label}
              </a>
            ))}
          </div>
        )}
      </main>
    </div>
  );
}
