import { resolve } from "path";
import { Logger, LogLevel, getErrorMessage, parseLogLevel } from "@quire/utils";
import type { ProgressCallback } from "@quire/utils";
import { SiteBuilderError, buildSite, loadManifest } from "@quire/site-builder";
import { UsageError, parseArgs } from "./args";
import type { CliCommand } from "./args";
import type { BuildCommand } from "./config";

export const VERSION = "0.1.0";

export const EXIT_OK = 0;
export const EXIT_DOCUMENT_FAILURES = 1;
export const EXIT_FATAL = 2;

/**
 * Where the CLI reads its environment and writes its output
 */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Record<string, string | undefined>;
  cwd: string;
  now?: Date;
}

const processIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
  cwd: process.cwd(),
};

const HELP = `quire v${VERSION}

Usage:
  quire build [manifest] [options]

Arguments:
  manifest              Book manifest (default: _quarto.yml)

Options:
  --out, -o <dir>       Output directory (overrides project.output-dir)
  --skip-missing        Skip chapters whose file does not exist
  --clean               Remove the output directory before building
  --verbose             Log every chapter
  --quiet               Log errors only
  --help, -h            Show this help message
  --version, -v         Show version information

Environment:
  QUIRE_LOG_LEVEL       silly, verbose, debug, info, warn, error or none

Exit codes:
  0  every document was built
  1  the site was built but some documents failed
  2  the build could not run (invalid manifest, I/O error, bad usage)`;

/**
 * Run the command line and return the process exit code
 */
export async function runCli(
  argv: string[],
  io: CliIO = processIO,
): Promise<number> {
  let parsed: CliCommand;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`Error: ${error.message}`);
    io.stderr(`Run "quire --help" for usage.`);
    return EXIT_FATAL;
  }

  switch (parsed.command) {
    case "help":
      io.stdout(HELP);
      return EXIT_OK;
    case "version":
      io.stdout(`quire v${VERSION}`);
      return EXIT_OK;
    case "build":
      return runBuild(parsed.options, io);
  }
}

async function runBuild(options: BuildCommand, io: CliIO): Promise<number> {
  const logger = createCliLogger(options, io);

  // Progress goes to the debug log; --verbose shows it
  const progress: ProgressCallback = async ({ message, progress, total }) => {
    if (message) logger.debug(`[${progress}/${total ?? "?"}] ${message}`);
  };

  try {
    const loaded = await loadManifest(resolve(io.cwd, options.manifest), {
      missingChapters: options.skipMissing ? "skip" : "error",
      logger,
    });

    const result = await buildSite(
      loaded,
      {
        clean: options.clean,
        ...(options.outDir !== undefined && {
          outputDir: resolve(io.cwd, options.outDir),
        }),
        ...(io.now !== undefined && { now: io.now }),
      },
      progress,
      logger.child("SiteBuilder"),
    );

    for (const warning of result.warnings) {
      logger.warn(warning);
    }

    if (result.success) {
      io.stdout(result.outputDir);
      return EXIT_OK;
    }

    io.stderr(
      `${result.failures.length} document(s) failed; site written to ${result.outputDir}`,
    );
    for (const failure of result.failures) {
      io.stderr(`  ${failure.path}: ${failure.error.message}`);
    }
    return EXIT_DOCUMENT_FAILURES;
  } catch (error) {
    if (!(error instanceof SiteBuilderError)) throw error;
    io.stderr(`Error: ${getErrorMessage(error)}`);
    return EXIT_FATAL;
  }
}

function createCliLogger(options: BuildCommand, io: CliIO): Logger {
  const level =
    options.verbosity === "verbose"
      ? LogLevel.DEBUG
      : options.verbosity === "quiet"
        ? LogLevel.ERROR
        : (parseLogLevel(io.env["QUIRE_LOG_LEVEL"]) ?? LogLevel.INFO);

  // Logs go to stderr so stdout carries only the result
  return Logger.createFresh({ level, context: "quire", useStderr: true });
}
