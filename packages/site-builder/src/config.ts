import { z } from "@quire/utils";

/**
 * Options accepted by a site build
 */
export const siteBuilderOptionsSchema = z.object({
  outputDir: z
    .string()
    .min(1)
    .optional()
    .describe("Output directory; overrides the manifest's project.output-dir"),
  freezeDir: z
    .string()
    .min(1)
    .default("_freeze")
    .describe("Directory for frozen chapter renders, relative to the project"),
  clean: z
    .boolean()
    .default(false)
    .describe("Remove the output directory before building"),
  now: z
    .date()
    .optional()
    .describe("Clock for the build context; defaults to the current time"),
});

export type SiteBuilderOptions = z.input<typeof siteBuilderOptionsSchema>;
export type ParsedSiteBuilderOptions = z.output<typeof siteBuilderOptionsSchema>;

export const missingChapterPolicySchema = z.enum(["error", "skip"]);
export type MissingChapterPolicy = z.infer<typeof missingChapterPolicySchema>;
