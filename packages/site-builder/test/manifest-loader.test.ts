import { describe, it, expect, afterEach } from "vitest";
import { createSilentLogger, createTempProject } from "@quire/test-utils";
import type { TempProject } from "@quire/test-utils";
import { loadManifest, parseManifest } from "../src/lib/manifest-loader";
import {
  ManifestParseError,
  ManifestReferenceError,
  SiteIOError,
} from "../src/errors";

const TWO_PARTS = `book:
  title: Field Notes
  chapters:
    - index.qmd
    - part: Basics
      chapters:
        - intro.qmd
        - setup.qmd
    - part: Advanced
      chapters:
        - deep/topic.qmd
`;

function parseError(source: string): ManifestParseError {
  try {
    parseManifest(source);
  } catch (error) {
    if (error instanceof ManifestParseError) return error;
    throw error;
  }
  throw new Error("expected a ManifestParseError");
}

describe("parseManifest", () => {
  it("should keep entries in manifest order", () => {
    const manifest = parseManifest(TWO_PARTS);

    expect(manifest.entries).toEqual([
      { kind: "chapter", path: "index.qmd" },
      {
        kind: "part",
        title: "Basics",
        chapters: [
          { kind: "chapter", path: "intro.qmd" },
          { kind: "chapter", path: "setup.qmd" },
        ],
      },
      {
        kind: "part",
        title: "Advanced",
        chapters: [{ kind: "chapter", path: "deep/topic.qmd" }],
      },
    ]);
  });

  it("should apply defaults", () => {
    const manifest = parseManifest(TWO_PARTS);

    expect(manifest.title).toBe("Field Notes");
    expect(manifest.authors).toEqual([]);
    expect(manifest.appendices).toEqual([]);
    expect(manifest.repoBranch).toBe("main");
    expect(manifest.repoActions).toEqual([]);
    expect(manifest.formats).toEqual(["html"]);
    expect(manifest.html).toEqual({ themes: ["default"], css: [], toc: true });
    expect(manifest.freeze).toBe(false);
    expect(manifest.outputDir).toBe("_book");
  });

  it("should normalize optional book settings", () => {
    const manifest = parseManifest(`project:
  type: book
  output-dir: site
book:
  title: Notes
  author: [Ada, Grace]
  date: 2024-01-31
  repo-url: https://example.com/notes/
  repo-actions: edit
  site-url: https://notes.example.com/
  chapters:
    - ./a.qmd
  appendices:
    - refs.md
bibliography: refs.bib
format:
  html:
    theme:
      light: flatly
      dark: darkly
    css: custom.css
    toc: false
  pdf: default
execute:
  freeze: auto
`);

    expect(manifest.authors).toEqual(["Ada", "Grace"]);
    expect(manifest.date).toBe("2024-01-31");
    expect(manifest.repoUrl).toBe("https://example.com/notes");
    expect(manifest.repoActions).toEqual(["edit"]);
    expect(manifest.siteUrl).toBe("https://notes.example.com");
    expect(manifest.entries).toEqual([{ kind: "chapter", path: "a.qmd" }]);
    expect(manifest.appendices).toEqual([{ kind: "chapter", path: "refs.md" }]);
    expect(manifest.bibliography).toEqual(["refs.bib"]);
    expect(manifest.formats).toEqual(["html", "pdf"]);
    expect(manifest.html).toEqual({
      themes: ["flatly"],
      darkTheme: "darkly",
      css: ["custom.css"],
      toc: false,
    });
    expect(manifest.freeze).toBe("auto");
    expect(manifest.outputDir).toBe("site");
  });

  it("should accept a theme list and keep date: today unresolved", () => {
    const manifest = parseManifest(`book:
  title: Notes
  date: today
  chapters:
    - index.qmd
    - part: WebService
      chapters:
        - "content/backend/intro.qmd"
        - "content/backend/client.ipynb"
format:
  html:
    theme:
      - cosmo
freeze: auto
`);

    expect(manifest.date).toBe("today");
    expect(manifest.html.themes).toEqual(["cosmo"]);
    expect(manifest.freeze).toBe("auto");
    expect(manifest.entries[1]).toEqual({
      kind: "part",
      title: "WebService",
      chapters: [
        { kind: "chapter", path: "content/backend/intro.qmd" },
        { kind: "chapter", path: "content/backend/client.ipynb" },
      ],
    });
  });

  it("should prefer the top-level freeze setting", () => {
    const manifest = parseManifest(
      "freeze: true\nexecute:\n  freeze: false\nbook:\n  title: T\n  chapters: [a.qmd]\n",
    );
    expect(manifest.freeze).toBe(true);
  });

  it("should reject invalid YAML", () => {
    expect(parseError("book: [").message).toMatch(/^Invalid manifest YAML: /);
  });

  it("should reject a document that is not a mapping", () => {
    expect(parseError("- a.qmd\n- b.qmd\n").message).toBe(
      "Manifest must be a YAML mapping",
    );
  });

  it("should list structural issues", () => {
    const error = parseError("book:\n  chapters:\n    - a.qmd\n");
    expect(error.issues).toEqual(["book.title: Required"]);
    expect(error.message).toBe(
      "Invalid manifest structure\n  book.title: Required",
    );
  });

  it("should reject unknown keys inside book", () => {
    const error = parseError(
      "book:\n  title: T\n  colour: red\n  chapters: [a.qmd]\n",
    );
    expect(error.issues).toEqual(['book: unknown key(s) "colour"']);
  });

  it("should reject an empty part", () => {
    const error = parseError(
      "book:\n  title: T\n  chapters:\n    - part: Empty\n      chapters: []\n",
    );
    expect(error.issues).toEqual([
      "book.chapters.0.chapters: A part must list at least one chapter",
    ]);
  });

  it("should reject a missing book section", () => {
    expect(parseError("format: html\n").issues).toEqual(["book: Required"]);
  });

  it("should reject duplicate, escaping and unsupported chapter paths", () => {
    const error = parseError(`book:
  title: T
  chapters:
    - a.qmd
    - part: P
      chapters:
        - ./a.qmd
        - ../outside.qmd
    - notes.txt
`);

    expect(error.message).toMatch(/^Invalid chapter references/);
    expect(error.issues).toEqual([
      "book.chapters.1.chapters.0: chapter listed more than once (./a.qmd)",
      "book.chapters.1.chapters.1: chapter path must stay inside the project (../outside.qmd)",
      "book.chapters.2: unsupported chapter type (notes.txt)",
    ]);
  });

  it("should reject chapters that render to the same page", () => {
    const error = parseError(`book:
  title: T
  chapters:
    - a.md
    - a.qmd
  appendices:
    - extra/b.ipynb
    - extra/b.md
`);

    expect(error.issues).toEqual([
      "book.chapters.1: chapter a.qmd and a.md both render to a.html",
      "book.appendices.1: chapter extra/b.md and extra/b.ipynb both render to extra/b.html",
    ]);
  });
});

describe("loadManifest", () => {
  let project: TempProject;
  const logger = createSilentLogger();

  afterEach(async () => {
    await project.cleanup();
  });

  it("should load a manifest whose chapters all exist", async () => {
    project = await createTempProject({
      "_quarto.yml": TWO_PARTS,
      "index.qmd": "# Welcome\n",
      "intro.qmd": "# Intro\n",
      "setup.qmd": "# Setup\n",
      "deep/topic.qmd": "# Topic\n",
    });

    const loaded = await loadManifest(project.path("_quarto.yml"), { logger });

    expect(loaded.projectDir).toBe(project.dir);
    expect(loaded.manifestPath).toBe(project.path("_quarto.yml"));
    expect(loaded.manifest.entries).toHaveLength(3);
    expect(loaded.issues).toEqual([]);
    expect(loaded.warnings).toEqual([]);
  });

  it("should fail on the first missing chapter by default", async () => {
    project = await createTempProject({
      "_quarto.yml": TWO_PARTS,
      "index.qmd": "# Welcome\n",
      "intro.qmd": "# Intro\n",
      "deep/topic.qmd": "# Topic\n",
    });

    const promise = loadManifest(project.path("_quarto.yml"), { logger });

    await expect(promise).rejects.toBeInstanceOf(ManifestReferenceError);
    await expect(promise).rejects.toMatchObject({
      message: "Chapter not found: setup.qmd",
      chapterPath: "setup.qmd",
      resolvedPath: project.path("setup.qmd"),
    });
  });

  it("should drop missing chapters and emptied parts when skipping", async () => {
    project = await createTempProject({
      "_quarto.yml": TWO_PARTS,
      "index.qmd": "# Welcome\n",
      "intro.qmd": "# Intro\n",
    });

    const loaded = await loadManifest(project.path("_quarto.yml"), {
      missingChapters: "skip",
      logger,
    });

    expect(loaded.manifest.entries).toEqual([
      { kind: "chapter", path: "index.qmd" },
      {
        kind: "part",
        title: "Basics",
        chapters: [{ kind: "chapter", path: "intro.qmd" }],
      },
    ]);
    expect(loaded.issues.map((issue) => issue.chapterPath)).toEqual([
      "setup.qmd",
      "deep/topic.qmd",
    ]);
    expect(loaded.warnings).toEqual(['Part "Advanced" has no remaining chapters']);
  });

  it("should warn about a missing bibliography", async () => {
    project = await createTempProject({
      "_quarto.yml": "book:\n  title: T\n  chapters: [a.qmd]\nbibliography: refs.bib\n",
      "a.qmd": "A\n",
    });

    const loaded = await loadManifest(project.path("_quarto.yml"), { logger });

    expect(loaded.warnings).toEqual(["Bibliography file not found: refs.bib"]);
  });

  it("should report an unreadable manifest", async () => {
    project = await createTempProject();

    await expect(
      loadManifest(project.path("_quarto.yml"), { logger }),
    ).rejects.toMatchObject({
      name: "SiteIOError",
      path: project.path("_quarto.yml"),
      operation: "read",
    });
    await expect(
      loadManifest(project.path("_quarto.yml"), { logger }),
    ).rejects.toBeInstanceOf(SiteIOError);
  });
});
