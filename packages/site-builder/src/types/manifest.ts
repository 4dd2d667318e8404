import { z } from "@quire/utils";

/**
 * Schemas for the raw manifest document (`_quarto.yml` style).
 * Keys use the manifest's kebab-case spelling; the loader normalizes the
 * validated document into a {@link BookManifest}.
 */

const chapterPathSchema = z.string().trim().min(1, "Chapter path is empty");

export const rawPartSchema = z
  .object({
    part: z.string().trim().min(1, "Part title is empty"),
    chapters: z
      .array(chapterPathSchema)
      .min(1, "A part must list at least one chapter"),
  })
  .strict();

export const rawChapterEntrySchema = z.union([chapterPathSchema, rawPartSchema]);

const stringOrList = z.union([z.string(), z.array(z.string())]);

export const repoActionSchema = z.enum(["edit", "source", "issue"]);
export type RepoAction = z.infer<typeof repoActionSchema>;

export const freezeModeSchema = z.union([z.boolean(), z.literal("auto")]);
export type FreezeMode = z.infer<typeof freezeModeSchema>;

export const rawBookSchema = z
  .object({
    title: z.string().trim().min(1, "Book title is required"),
    subtitle: z.string().optional(),
    author: stringOrList.optional(),
    // YAML reads an unquoted 2024-01-31 as a Date
    date: z.union([z.string(), z.date()]).optional(),
    description: z.string().optional(),
    "repo-url": z.string().url().optional(),
    "repo-branch": z.string().min(1).optional(),
    "repo-actions": z
      .union([repoActionSchema, z.array(repoActionSchema)])
      .optional(),
    "site-url": z.string().url().optional(),
    chapters: z
      .array(rawChapterEntrySchema)
      .min(1, "The book must list at least one chapter"),
    appendices: z.array(chapterPathSchema).optional(),
  })
  .strict();

export const rawThemeSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
  z
    .object({
      light: stringOrList,
      dark: stringOrList.optional(),
    })
    .strict(),
]);

export const rawHtmlFormatSchema = z
  .object({
    theme: rawThemeSchema.optional(),
    css: stringOrList.optional(),
    toc: z.boolean().optional(),
  })
  .strict();

export const rawManifestSchema = z
  .object({
    project: z
      .object({
        type: z.literal("book").optional(),
        "output-dir": z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    book: rawBookSchema,
    bibliography: stringOrList.optional(),
    format: z
      .union([
        z.string().min(1),
        z
          .object({
            html: z
              .union([rawHtmlFormatSchema, z.literal("default")])
              .optional(),
          })
          .catchall(z.unknown()),
      ])
      .optional(),
    freeze: freezeModeSchema.optional(),
    execute: z
      .object({ freeze: freezeModeSchema.optional() })
      .catchall(z.unknown())
      .optional(),
  })
  .strict();

export type RawManifest = z.infer<typeof rawManifestSchema>;
export type RawPart = z.infer<typeof rawPartSchema>;

/**
 * Chapter reference by manifest-relative path
 */
export interface ChapterRef {
  kind: "chapter";
  path: string;
}

/**
 * Named group of chapters
 */
export interface Part {
  kind: "part";
  title: string;
  chapters: ChapterRef[];
}

export type ManifestEntry = ChapterRef | Part;

export interface HtmlFormatOptions {
  /** Theme names, first one is the light/default theme */
  themes: string[];
  darkTheme?: string;
  /** Extra stylesheets, relative to the project directory */
  css: string[];
  toc: boolean;
}

/**
 * Validated, normalized book manifest
 */
export interface BookManifest {
  title: string;
  subtitle?: string;
  authors: string[];
  /** Raw date; "today" is resolved per build */
  date?: string;
  description?: string;
  repoUrl?: string;
  repoBranch: string;
  repoActions: RepoAction[];
  siteUrl?: string;
  bibliography: string[];
  entries: ManifestEntry[];
  appendices: ChapterRef[];
  /** Declared output formats in manifest order */
  formats: string[];
  html: HtmlFormatOptions;
  freeze: FreezeMode;
  outputDir: string;
}

export const DEFAULT_OUTPUT_DIR = "_book";
export const DEFAULT_THEME = "default";
