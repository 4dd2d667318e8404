import { z } from "@quire/utils";

export const DEFAULT_MANIFEST = "_quarto.yml";

/**
 * Options of `quire build`, after argument parsing
 */
export const buildCommandSchema = z.object({
  manifest: z
    .string()
    .min(1)
    .default(DEFAULT_MANIFEST)
    .describe("Path of the book manifest"),
  outDir: z
    .string()
    .min(1, "--out needs a directory")
    .optional()
    .describe("Output directory, overriding the manifest"),
  skipMissing: z
    .boolean()
    .default(false)
    .describe("Drop missing chapters instead of failing"),
  clean: z
    .boolean()
    .default(false)
    .describe("Remove the output directory first"),
  verbosity: z
    .enum(["verbose", "quiet"])
    .optional()
    .describe("--verbose or --quiet; overrides QUIRE_LOG_LEVEL"),
});

export type BuildCommand = z.output<typeof buildCommandSchema>;
