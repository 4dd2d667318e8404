/**
 * A page link in the navigation tree
 */
export interface NavigationLeaf {
  kind: "chapter";
  title: string;
  /** Output path relative to the site root */
  href: string;
  /** Manifest path of the chapter */
  source: string;
}

/**
 * A named group of page links (a part, or the appendices)
 */
export interface NavigationGroup {
  kind: "part";
  title: string;
  children: NavigationLeaf[];
}

export type NavigationNode = NavigationLeaf | NavigationGroup;

/**
 * Navigation in manifest order
 */
export type NavigationTree = NavigationNode[];
