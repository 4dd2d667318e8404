import { describe, it, expect } from "vitest";
import { HeadCollector } from "../src/lib/head-collector";
import { createHTMLShell } from "../src/lib/html-generator";
import { anchorHeadings } from "../src/lib/page-toc";
import { generateSitemap } from "../src/lib/sitemap-generator";
import {
  buildSearchIndex,
  serializeSearchIndex,
} from "../src/lib/search-index";
import type { RenderedChapter } from "../src/types/chapter";
import type { NavigationTree } from "../src/types/navigation";

describe("HeadCollector", () => {
  it("should render escaped head tags in order", () => {
    const collector = new HeadCollector({
      title: "Intro | Tom & Jerry",
      description: "A book",
      canonicalUrl: "https://notes.example.com/intro.html",
      stylesheets: ["styles/main.css"],
    });

    expect(collector.generateHeadHTML()).toBe(
      [
        '<meta charset="UTF-8">',
        '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
        '<meta name="generator" content="quire">',
        "<title>Intro | Tom &amp; Jerry</title>",
        '<meta name="description" content="A book">',
        '<meta property="og:title" content="Intro | Tom &amp; Jerry">',
        '<meta property="og:description" content="A book">',
        '<meta property="og:type" content="article">',
        '<link rel="canonical" href="https://notes.example.com/intro.html">',
        '<link rel="stylesheet" href="styles/main.css">',
      ].join("\n    "),
    );
  });
});

describe("createHTMLShell", () => {
  it("should set the theme and wire the toggle only for a dark theme", () => {
    const light = createHTMLShell("<p>x</p>", "<title>T</title>", {
      theme: "cosmo",
    });
    expect(light).toContain('<html lang="en" data-theme="cosmo">');
    expect(light).not.toContain("<script>");

    const toggled = createHTMLShell("<p>x</p>", "<title>T</title>", {
      theme: "flatly",
      darkTheme: "darkly",
    });
    expect(toggled).toContain("var dark = 'darkly';");
    expect(toggled).toContain(
      "var toggle = document.querySelector('.theme-toggle');",
    );
  });
});

describe("generateSitemap", () => {
  it("should list pages with the build date", () => {
    expect(
      generateSitemap(
        ["index.html", "deep/topic.html"],
        "https://notes.example.com/",
        "2024-05-06",
      ),
    ).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url>
    <loc>https://notes.example.com/</loc>
    <lastmod>2024-05-06</lastmod>
    <changefreq>weekly</changefreq>
    <priority>1.0</priority>
  </url>
  <url>
    <loc>https://notes.example.com/deep/topic.html</loc>
    <lastmod>2024-05-06</lastmod>
    <changefreq>monthly</changefreq>
    <priority>0.8</priority>
  </url>
</urlset>
`);
  });
});

describe("buildSearchIndex", () => {
  it("should index rendered pages in navigation order with their part", () => {
    const navigation: NavigationTree = [
      { kind: "chapter", title: "Welcome", href: "index.html", source: "index.qmd" },
      {
        kind: "part",
        title: "Basics",
        children: [
          { kind: "chapter", title: "intro", href: "intro.html", source: "intro.qmd" },
          { kind: "chapter", title: "broken", href: "broken.html", source: "broken.qmd" },
        ],
      },
    ];
    const chapter = (path: string, title: string): RenderedChapter => ({
      path,
      title,
      showTitle: false,
      html: "",
      searchText: `${title} text`,
      fromCache: false,
    });
    const rendered = new Map([
      ["intro.qmd", chapter("intro.qmd", "Introduction")],
      ["index.qmd", chapter("index.qmd", "Welcome")],
    ]);

    const entries = buildSearchIndex(navigation, rendered);

    expect(entries).toEqual([
      { href: "index.html", title: "Welcome", section: "", text: "Welcome text" },
      {
        href: "intro.html",
        title: "Introduction",
        section: "Basics",
        text: "Introduction text",
      },
    ]);
    expect(JSON.parse(serializeSearchIndex(entries))).toEqual(entries);
  });
});

describe("anchorHeadings", () => {
  it("should give section headings unique ids and list them", () => {
    const result = anchorHeadings(
      [
        "<h2>Getting <em>started</em></h2>",
        "<p>x</p>",
        "<h3>Notes &amp; tips</h3>",
        "<h2>Getting started</h2>",
        '<h2 id="kept">Kept</h2>',
      ].join("\n"),
    );

    expect(result.html).toBe(
      [
        '<h2 id="getting-started">Getting <em>started</em></h2>',
        "<p>x</p>",
        '<h3 id="notes-tips">Notes &amp; tips</h3>',
        '<h2 id="getting-started-1">Getting started</h2>',
        '<h2 id="kept">Kept</h2>',
      ].join("\n"),
    );
    expect(result.headings).toEqual([
      { level: 2, id: "getting-started", label: "Getting <em>started</em>" },
      { level: 3, id: "notes-tips", label: "Notes &amp; tips" },
      { level: 2, id: "getting-started-1", label: "Getting started" },
    ]);
  });

  it("should fall back to a generic id for symbol-only headings", () => {
    expect(anchorHeadings("<h2>???</h2>").html).toBe('<h2 id="section">???</h2>');
  });
});
