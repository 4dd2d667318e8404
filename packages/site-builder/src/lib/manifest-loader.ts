import { promises as fs } from "fs";
import { dirname, posix, resolve } from "path";
import type { Logger, ZodIssue } from "@quire/utils";
import { defaultLogger, fromYaml, getErrorMessage } from "@quire/utils";
import {
  ManifestParseError,
  ManifestReferenceError,
  SiteIOError,
} from "../errors";
import type { MissingChapterPolicy } from "../config";
import { detectChapterFormat } from "../types/chapter";
import { outputPathFor } from "./page-paths";
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_THEME,
  rawManifestSchema,
} from "../types/manifest";
import type {
  BookManifest,
  ChapterRef,
  FreezeMode,
  HtmlFormatOptions,
  ManifestEntry,
  RawManifest,
} from "../types/manifest";

export interface LoadManifestOptions {
  /** What to do with chapters whose file does not exist (default "error") */
  missingChapters?: MissingChapterPolicy;
  logger?: Logger;
}

export interface LoadedManifest {
  manifest: BookManifest;
  manifestPath: string;
  projectDir: string;
  /** Missing chapters dropped under the "skip" policy */
  issues: ManifestReferenceError[];
  warnings: string[];
}

/**
 * Read, validate and normalize a book manifest
 *
 * @throws ManifestParseError when the file is not a valid manifest
 * @throws ManifestReferenceError for a missing chapter under the "error" policy
 * @throws SiteIOError when the manifest cannot be read
 */
export async function loadManifest(
  manifestPath: string,
  options: LoadManifestOptions = {},
): Promise<LoadedManifest> {
  const logger = (options.logger ?? defaultLogger).child("ManifestLoader");
  const policy = options.missingChapters ?? "error";
  const absolutePath = resolve(manifestPath);
  const projectDir = dirname(absolutePath);

  let source: string;
  try {
    source = await fs.readFile(absolutePath, "utf-8");
  } catch (error) {
    throw new SiteIOError(absolutePath, "read", { cause: error });
  }

  const manifest = parseManifest(source, absolutePath);
  const issues: ManifestReferenceError[] = [];
  const warnings: string[] = [];

  const exists = async (ref: ChapterRef): Promise<boolean> => {
    const resolvedPath = resolve(projectDir, ref.path);
    if (await isFile(resolvedPath)) return true;

    const error = new ManifestReferenceError(ref.path, resolvedPath);
    if (policy === "error") throw error;

    logger.warn(`Skipping missing chapter: ${ref.path}`);
    issues.push(error);
    return false;
  };

  const entries: ManifestEntry[] = [];
  for (const entry of manifest.entries) {
    if (entry.kind === "chapter") {
      if (await exists(entry)) entries.push(entry);
      continue;
    }

    const chapters: ChapterRef[] = [];
    for (const chapter of entry.chapters) {
      if (await exists(chapter)) chapters.push(chapter);
    }
    if (chapters.length > 0) {
      entries.push({ ...entry, chapters });
    } else {
      warnings.push(`Part "${entry.title}" has no remaining chapters`);
    }
  }

  const appendices: ChapterRef[] = [];
  for (const chapter of manifest.appendices) {
    if (await exists(chapter)) appendices.push(chapter);
  }

  for (const bibliography of manifest.bibliography) {
    if (!(await isFile(resolve(projectDir, bibliography)))) {
      warnings.push(`Bibliography file not found: ${bibliography}`);
    }
  }

  const chapterCount = countChapters(entries, appendices);
  logger.debug(
    `Loaded manifest "${manifest.title}" with ${chapterCount} chapters`,
  );

  return {
    manifest: { ...manifest, entries, appendices },
    manifestPath: absolutePath,
    projectDir,
    issues,
    warnings,
  };
}

/**
 * Parse and validate manifest YAML without touching the filesystem
 *
 * @throws ManifestParseError
 */
export function parseManifest(
  source: string,
  filename?: string,
): BookManifest {
  let document: unknown;
  try {
    document = fromYaml(source, filename);
  } catch (error) {
    throw new ManifestParseError(
      `Invalid manifest YAML: ${getErrorMessage(error)}`,
      [],
      { filename },
      { cause: error },
    );
  }

  if (
    typeof document !== "object" ||
    document === null ||
    Array.isArray(document)
  ) {
    throw new ManifestParseError("Manifest must be a YAML mapping", [], {
      filename,
    });
  }

  const result = rawManifestSchema.safeParse(document);
  if (!result.success) {
    throw new ManifestParseError(
      "Invalid manifest structure",
      result.error.issues.map(formatIssue),
      { filename },
    );
  }

  return normalizeManifest(result.data);
}

function normalizeManifest(raw: RawManifest): BookManifest {
  const { book } = raw;
  const problems: string[] = [];
  const seen = new Set<string>();
  // Output page -> chapter that renders to it
  const pages = new Map<string, string>();

  const toRef = (path: string, location: string): ChapterRef => {
    const normalized = normalizeChapterPath(path);
    if (normalized === undefined) {
      problems.push(
        `${location}: chapter path must stay inside the project (${path})`,
      );
    } else if (!detectChapterFormat(normalized)) {
      problems.push(`${location}: unsupported chapter type (${path})`);
    } else if (seen.has(normalized)) {
      problems.push(`${location}: chapter listed more than once (${path})`);
    } else {
      const page = outputPathFor(normalized);
      const other = pages.get(page);
      if (other !== undefined) {
        problems.push(
          `${location}: chapter ${normalized} and ${other} both render to ${page}`,
        );
      } else {
        pages.set(page, normalized);
      }
    }
    const ref: ChapterRef = { kind: "chapter", path: normalized ?? path };
    seen.add(ref.path);
    return ref;
  };

  const entries: ManifestEntry[] = book.chapters.map((entry, index) => {
    if (typeof entry === "string") {
      return toRef(entry, `book.chapters.${index}`);
    }
    return {
      kind: "part",
      title: entry.part,
      chapters: entry.chapters.map((path, chapterIndex) =>
        toRef(path, `book.chapters.${index}.chapters.${chapterIndex}`),
      ),
    };
  });

  const appendices = (book.appendices ?? []).map((path, index) =>
    toRef(path, `book.appendices.${index}`),
  );

  if (problems.length > 0) {
    throw new ManifestParseError("Invalid chapter references", problems);
  }

  const manifest: BookManifest = {
    title: book.title,
    authors: toList(book.author),
    repoBranch: book["repo-branch"] ?? "main",
    repoActions: toList(book["repo-actions"]),
    bibliography: toList(raw.bibliography),
    entries,
    appendices,
    formats: formatNames(raw.format),
    html: htmlOptions(raw.format),
    freeze: freezeMode(raw),
    outputDir: raw.project?.["output-dir"] ?? DEFAULT_OUTPUT_DIR,
  };

  if (book.subtitle !== undefined) manifest.subtitle = book.subtitle;
  if (book.date !== undefined) manifest.date = formatDate(book.date);
  if (book.description !== undefined) manifest.description = book.description;
  if (book["repo-url"] !== undefined) {
    manifest.repoUrl = book["repo-url"].replace(/\/+$/, "");
  }
  if (book["site-url"] !== undefined) {
    manifest.siteUrl = book["site-url"].replace(/\/+$/, "");
  }

  return manifest;
}

/**
 * Collapse `./` and `a/../` segments; undefined when the path leaves the
 * project directory or is absolute
 */
function normalizeChapterPath(path: string): string | undefined {
  const slashed = path.replace(/\\/g, "/");
  if (posix.isAbsolute(slashed) || /^[A-Za-z]:/.test(slashed)) {
    return undefined;
  }
  const normalized = posix.normalize(slashed);
  if (normalized === ".." || normalized.startsWith("../")) return undefined;
  return normalized;
}

function formatNames(format: RawManifest["format"]): string[] {
  if (format === undefined) return ["html"];
  if (typeof format === "string") return [format];
  const names = Object.keys(format);
  return names.length > 0 ? names : ["html"];
}

function htmlOptions(format: RawManifest["format"]): HtmlFormatOptions {
  const options: HtmlFormatOptions = {
    themes: [DEFAULT_THEME],
    css: [],
    toc: true,
  };
  if (format === undefined || typeof format === "string") return options;

  const html = format.html;
  if (html === undefined || html === "default") return options;

  const theme = html.theme;
  if (typeof theme === "string") {
    options.themes = [theme];
  } else if (Array.isArray(theme)) {
    options.themes = theme;
  } else if (theme !== undefined) {
    options.themes = toList(theme.light);
    const dark = toList(theme.dark);
    if (dark[0] !== undefined) options.darkTheme = dark[0];
  }

  options.css = toList(html.css);
  if (html.toc !== undefined) options.toc = html.toc;
  return options;
}

function freezeMode(raw: RawManifest): FreezeMode {
  return raw.freeze ?? raw.execute?.freeze ?? false;
}

function formatDate(date: string | Date): string {
  return typeof date === "string" ? date : date.toISOString().slice(0, 10);
}

function toList<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  if (issue.code === "unrecognized_keys") {
    const keys = issue.keys.map((key) => `"${key}"`).join(", ");
    return `${path}: unknown key(s) ${keys}`;
  }
  return `${path}: ${issue.message}`;
}

function countChapters(
  entries: ManifestEntry[],
  appendices: ChapterRef[],
): number {
  return (
    entries.reduce(
      (count, entry) =>
        count + (entry.kind === "chapter" ? 1 : entry.chapters.length),
      0,
    ) + appendices.length
  );
}

async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}
