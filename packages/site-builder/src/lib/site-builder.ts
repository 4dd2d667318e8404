import { promises as fs } from "fs";
import { dirname, join, posix, relative, resolve } from "path";
import { h } from "preact";
import type { ComponentChildren } from "preact";
import { render } from "preact-render-to-string";
import type { Logger, ProgressCallback } from "@quire/utils";
import { ProgressReporter, defaultLogger } from "@quire/utils";
import { siteBuilderOptionsSchema } from "../config";
import type { SiteBuilderOptions } from "../config";
import {
  ManifestReferenceError,
  RenderError,
  SiteBuilderError,
  SiteIOError,
} from "../errors";
import type { DocumentError } from "../errors";
import type {
  BuildContext,
  BuildResult,
  DocumentFailure,
} from "../types/build";
import type { RenderedChapter } from "../types/chapter";
import type { ChapterRef, RepoAction } from "../types/manifest";
import type { NavigationLeaf, NavigationTree } from "../types/navigation";
import { BookLayout } from "../layouts/book-layout";
import type { BookLayoutProps, RepoLink } from "../layouts/book-layout";
import { ChapterPage } from "../layouts/chapter-page";
import type { ChapterPageProps } from "../layouts/chapter-page";
import { IndexPage } from "../layouts/index-page";
import type { IndexPageProps } from "../layouts/index-page";
import { TitleBlock } from "../layouts/title-block";
import type { TitleBlockProps } from "../layouts/title-block";
import { createBuildContext, resolveDate } from "./build-context";
import { renderChapter } from "./chapter-renderer";
import { readChapter } from "./chapter-reader";
import { FreezeCache } from "./freeze-cache";
import { HeadCollector } from "./head-collector";
import { createHTMLShell } from "./html-generator";
import type { ThemeAttributes } from "./html-generator";
import type { LoadedManifest } from "./manifest-loader";
import { buildNavigation, flattenNavigation, listChapters } from "./navigation";
import { INDEX_PAGE, relativeHref } from "./page-paths";
import { anchorHeadings } from "./page-toc";
import { buildSearchIndex, serializeSearchIndex } from "./search-index";
import { generateSitemap } from "./sitemap-generator";
import { buildStylesheet, effectiveTheme } from "./theme";

const MAIN_STYLESHEET = "styles/main.css";
const SEARCH_INDEX = "search.json";
const SITEMAP = "sitemap.xml";

const REPO_ACTION_LABELS: Record<RepoAction, string> = {
  source: "View source",
  edit: "Edit this page",
  issue: "Report an issue",
};

interface Neighbours {
  previous?: NavigationLeaf | undefined;
  next?: NavigationLeaf | undefined;
}

/**
 * Values shared by every page of one build
 */
interface PageSetup {
  context: BuildContext;
  navigation: NavigationTree;
  unavailable: ReadonlySet<string>;
  stylesheets: string[];
  theme: ThemeAttributes;
}

/**
 * Builds a static site from a loaded manifest: chapters are rendered one at
 * a time in manifest order, documents that fail are reported and skipped,
 * and every page shares navigation that mirrors the manifest.
 */
export class SiteBuilder {
  private static instance: SiteBuilder | null = null;
  private logger: Logger;

  public static getInstance(logger?: Logger): SiteBuilder {
    SiteBuilder.instance ??= new SiteBuilder(
      logger ?? defaultLogger.child("SiteBuilder"),
    );
    return SiteBuilder.instance;
  }

  public static resetInstance(): void {
    SiteBuilder.instance = null;
  }

  public static createFresh(logger: Logger): SiteBuilder {
    return new SiteBuilder(logger);
  }

  private constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Build the site
   *
   * @throws SiteIOError when output cannot be written
   * @throws SiteBuilderError when asked to clean a directory holding the project
   */
  async build(
    loaded: LoadedManifest,
    options: SiteBuilderOptions = {},
    progress?: ProgressCallback,
  ): Promise<BuildResult> {
    // Parse options through schema to apply defaults
    const parsedOptions = siteBuilderOptionsSchema.parse(options);
    const { manifest, projectDir } = loaded;
    const outputDir = resolve(
      projectDir,
      parsedOptions.outputDir ?? manifest.outputDir,
    );
    const context = createBuildContext(
      manifest,
      { projectDir, outputDir },
      parsedOptions.now,
    );
    const reporter = ProgressReporter.from(progress);

    const warnings = [...loaded.warnings];
    const failures: DocumentFailure[] = loaded.issues.map((error) => ({
      path: error.chapterPath,
      error,
    }));

    const chapters = listChapters(manifest);
    const totalSteps = chapters.length + 1;

    this.logger.info(
      `Building "${manifest.title}" (${chapters.length} chapters) into ${outputDir}`,
    );

    if (parsedOptions.clean) {
      // Never remove the project itself or a directory holding it
      if (!relative(outputDir, projectDir).startsWith("..")) {
        throw new SiteBuilderError(
          `Refusing to clean ${outputDir}: it contains the project`,
          { outputDir, projectDir },
        );
      }
      await this.removeDirectory(outputDir);
    }

    const cache = new FreezeCache(
      resolve(projectDir, parsedOptions.freezeDir),
      manifest.freeze,
      this.logger.child("FreezeCache"),
    );

    const rendered = new Map<string, RenderedChapter>();
    for (const [index, chapter] of chapters.entries()) {
      await reporter?.report({
        message: `Rendering ${chapter.path}`,
        progress: index,
        total: totalSteps,
      });

      try {
        rendered.set(
          chapter.path,
          await this.renderWithCache(chapter, projectDir, cache),
        );
      } catch (error) {
        if (!isDocumentError(error)) throw error;
        this.logger.warn(`Skipping ${chapter.path}: ${error.message}`);
        failures.push({ path: chapter.path, error });
      }
    }

    await reporter?.report({
      message: "Writing pages",
      progress: chapters.length,
      total: totalSteps,
    });

    const titles = new Map(
      Array.from(
        rendered.values(),
        (chapter): [string, string] => [chapter.path, chapter.title],
      ),
    );
    const navigation = buildNavigation(manifest, titles);
    const leaves = flattenNavigation(navigation);
    const available = leaves.filter((leaf) => rendered.has(leaf.source));
    const unavailable = new Set(
      leaves
        .filter((leaf) => !rendered.has(leaf.source))
        .map((leaf) => leaf.href),
    );

    const stylesheet = await buildStylesheet(
      manifest.html.darkTheme !== undefined
        ? [...manifest.html.themes, manifest.html.darkTheme]
        : manifest.html.themes,
    );
    for (const theme of stylesheet.unknownThemes) {
      warnings.push(`Unknown theme "${theme}", using the default theme`);
    }
    await this.writeOutput(outputDir, MAIN_STYLESHEET, stylesheet.css);

    const extraStylesheets = await this.copyStylesheets(
      context,
      manifest.html.css,
      warnings,
    );

    const theme: ThemeAttributes = {
      theme: effectiveTheme(manifest.html.themes[0], stylesheet.unknownThemes),
    };
    if (manifest.html.darkTheme !== undefined) {
      theme.darkTheme = effectiveTheme(
        manifest.html.darkTheme,
        stylesheet.unknownThemes,
      );
    }

    const setup: PageSetup = {
      context,
      navigation,
      unavailable,
      stylesheets: [MAIN_STYLESHEET, ...extraStylesheets],
      theme,
    };

    // Reading order for previous/next links; a generated index page leads
    const hasIndexChapter = available.some((leaf) => leaf.href === INDEX_PAGE);
    const sequence: NavigationLeaf[] = hasIndexChapter
      ? available
      : [
          {
            kind: "chapter",
            title: manifest.title,
            href: INDEX_PAGE,
            source: "",
          },
          ...available,
        ];

    const pages: string[] = [];
    for (const [index, leaf] of sequence.entries()) {
      const chapter = rendered.get(leaf.source);
      const neighbours: Neighbours = {
        previous: sequence[index - 1],
        next: sequence[index + 1],
      };
      const html = chapter
        ? this.renderChapterPage(setup, leaf, chapter, neighbours)
        : this.renderIndexPage(setup, neighbours.next);

      await this.writeOutput(outputDir, leaf.href, html);
      pages.push(leaf.href);
      this.logger.debug(`Wrote ${leaf.href}`);
    }

    const searchIndex = buildSearchIndex(navigation, rendered);
    await this.writeOutput(
      outputDir,
      SEARCH_INDEX,
      serializeSearchIndex(searchIndex),
    );

    if (manifest.siteUrl) {
      await this.writeOutput(
        outputDir,
        SITEMAP,
        generateSitemap(pages, manifest.siteUrl, context.today),
      );
    }

    const cached = Array.from(rendered.values()).filter(
      (chapter) => chapter.fromCache,
    ).length;

    await reporter?.report({
      message: "Site build complete",
      progress: totalSteps,
      total: totalSteps,
    });

    const result: BuildResult = {
      success: failures.length === 0,
      outputDir,
      pages,
      navigation,
      failures,
      warnings,
      rendered: rendered.size - cached,
      cached,
    };

    if (result.success) {
      this.logger.info(`Site built: ${pages.length} pages in ${outputDir}`);
    } else {
      this.logger.warn(
        `Site built with ${failures.length} failed document(s): ${pages.length} pages in ${outputDir}`,
      );
    }

    return result;
  }

  private async renderWithCache(
    chapter: ChapterRef,
    projectDir: string,
    cache: FreezeCache,
  ): Promise<RenderedChapter> {
    const document = await readChapter(chapter.path, projectDir);

    const frozen = await cache.get(document);
    if (frozen) {
      this.logger.debug(`Using frozen render for ${chapter.path}`);
      return frozen;
    }

    this.logger.debug(`Rendering ${chapter.path}`);
    const rendered = renderChapter(document);
    await cache.put(document, rendered);
    return rendered;
  }

  private renderChapterPage(
    setup: PageSetup,
    leaf: NavigationLeaf,
    chapter: RenderedChapter,
    neighbours: Neighbours,
  ): string {
    const { manifest } = setup.context;
    const page = leaf.href;
    const isHome = page === INDEX_PAGE;

    const { html, headings } = manifest.html.toc
      ? anchorHeadings(chapter.html)
      : { html: chapter.html, headings: [] };

    const body: ChapterPageProps = {
      title: chapter.title,
      showTitle: chapter.showTitle && !isHome,
      date: resolveDate(chapter.date, setup.context),
      html,
      headings,
    };

    // The index chapter carries the book's title block above its own body
    const content: ComponentChildren = isHome
      ? [h(TitleBlock, this.bookTitle(setup.context)), h(ChapterPage, body)]
      : h(ChapterPage, body);

    return this.renderPage(setup, page, {
      title: isHome ? manifest.title : `${chapter.title} | ${manifest.title}`,
      content,
      neighbours,
      repoLinks: this.repoLinks(setup.context, chapter.path),
    });
  }

  private renderIndexPage(setup: PageSetup, next?: NavigationLeaf): string {
    const { manifest } = setup.context;

    const props: IndexPageProps = {
      book: {
        ...this.bookTitle(setup.context),
        description: manifest.description,
      },
      navigation: setup.navigation,
      currentPage: INDEX_PAGE,
      unavailable: setup.unavailable,
    };

    return this.renderPage(setup, INDEX_PAGE, {
      title: manifest.title,
      content: h(IndexPage, props),
      neighbours: { next },
      repoLinks: [],
    });
  }

  private renderPage(
    setup: PageSetup,
    page: string,
    parts: {
      title: string;
      content: ComponentChildren;
      neighbours: Neighbours;
      repoLinks: RepoLink[];
    },
  ): string {
    const { manifest } = setup.context;

    const layout: BookLayoutProps = {
      bookTitle: manifest.title,
      navigation: setup.navigation,
      currentPage: page,
      homePage: INDEX_PAGE,
      unavailable: setup.unavailable,
      themeToggle: setup.theme.darkTheme !== undefined,
      repoUrl: manifest.repoUrl,
      content: parts.content,
      previous: parts.neighbours.previous,
      next: parts.neighbours.next,
      repoLinks: parts.repoLinks,
    };
    const layoutHtml = render(h(BookLayout, layout));

    const headCollector = new HeadCollector({
      title: parts.title,
      description: manifest.description,
      author:
        manifest.authors.length > 0 ? manifest.authors.join(", ") : undefined,
      canonicalUrl: manifest.siteUrl
        ? canonicalUrl(manifest.siteUrl, page)
        : undefined,
      stylesheets: setup.stylesheets.map((href) => relativeHref(page, href)),
    });

    return createHTMLShell(
      layoutHtml,
      headCollector.generateHeadHTML(),
      setup.theme,
    );
  }

  private bookTitle(context: BuildContext): TitleBlockProps {
    const { manifest } = context;
    return {
      title: manifest.title,
      subtitle: manifest.subtitle,
      authors: manifest.authors,
      date: resolveDate(manifest.date, context),
    };
  }

  private repoLinks(context: BuildContext, chapterPath: string): RepoLink[] {
    const { repoUrl, repoBranch, repoActions } = context.manifest;
    if (!repoUrl) return [];

    return repoActions.map((action) => {
      const href =
        action === "issue"
          ? `${repoUrl}/issues/new`
          : `${repoUrl}/${action === "edit" ? "edit" : "blob"}/${repoBranch}/${chapterPath}`;
      return { label: REPO_ACTION_LABELS[action], href };
    });
  }

  /**
   * Copy stylesheets named by the manifest; returns the ones copied
   */
  private async copyStylesheets(
    context: BuildContext,
    stylesheets: string[],
    warnings: string[],
  ): Promise<string[]> {
    const copied: string[] = [];
    for (const stylesheet of stylesheets) {
      const relative = posix.normalize(stylesheet.replace(/\\/g, "/"));
      if (relative.startsWith("../") || posix.isAbsolute(relative)) {
        warnings.push(`Stylesheet outside the project ignored: ${stylesheet}`);
        continue;
      }

      let css: string;
      try {
        css = await fs.readFile(join(context.projectDir, relative), "utf-8");
      } catch {
        warnings.push(`Stylesheet not found: ${stylesheet}`);
        continue;
      }

      await this.writeOutput(context.outputDir, relative, css);
      copied.push(relative);
    }
    return copied;
  }

  private async writeOutput(
    outputDir: string,
    relativePath: string,
    contents: string,
  ): Promise<void> {
    const target = join(outputDir, relativePath);
    try {
      await fs.mkdir(dirname(target), { recursive: true });
      await fs.writeFile(target, contents, "utf-8");
    } catch (error) {
      throw new SiteIOError(target, "write", { cause: error });
    }
  }

  private async removeDirectory(directory: string): Promise<void> {
    try {
      await fs.rm(directory, { recursive: true, force: true });
    } catch (error) {
      throw new SiteIOError(directory, "remove", { cause: error });
    }
  }
}

function canonicalUrl(siteUrl: string, page: string): string {
  return page === INDEX_PAGE ? `${siteUrl}/` : `${siteUrl}/${page}`;
}

/**
 * Errors that fail one document without stopping the build
 */
function isDocumentError(error: unknown): error is DocumentError {
  return (
    error instanceof RenderError ||
    error instanceof ManifestReferenceError ||
    (error instanceof SiteIOError && error.operation === "read")
  );
}

/**
 * Build a site with a fresh builder
 */
export async function buildSite(
  loaded: LoadedManifest,
  options?: SiteBuilderOptions,
  progress?: ProgressCallback,
  logger: Logger = defaultLogger.child("SiteBuilder"),
): Promise<BuildResult> {
  return SiteBuilder.createFresh(logger).build(loaded, options, progress);
}
