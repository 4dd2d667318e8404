import type { ZodIssue } from "@quire/utils";
import { buildCommandSchema } from "./config";
import type { BuildCommand } from "./config";

export type CliCommand =
  | { command: "build"; options: BuildCommand }
  | { command: "help" }
  | { command: "version" };

/**
 * Command line that cannot be understood
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Parse the arguments after the executable name
 *
 * @throws UsageError
 */
export function parseArgs(argv: string[]): CliCommand {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    return { command: "help" };
  }
  if (argv.includes("--version") || argv.includes("-v")) {
    return { command: "version" };
  }

  const [command, ...rest] = argv;
  if (command !== "build") {
    throw new UsageError(`Unknown command: ${command ?? ""}`);
  }

  const raw: Record<string, unknown> = {};
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? "";
    switch (arg) {
      case "--out":
      case "-o": {
        const value = rest[i + 1];
        if (value === undefined || value.startsWith("-")) {
          throw new UsageError(`${arg} needs a directory`);
        }
        raw["outDir"] = value;
        i++;
        break;
      }
      case "--skip-missing":
        raw["skipMissing"] = true;
        break;
      case "--clean":
        raw["clean"] = true;
        break;
      case "--verbose":
      case "--quiet":
        if (raw["verbosity"] !== undefined) {
          throw new UsageError("--verbose and --quiet cannot be combined");
        }
        raw["verbosity"] = arg.slice(2);
        break;
      default:
        if (arg.startsWith("--out=")) {
          raw["outDir"] = arg.slice("--out=".length);
        } else if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length > 1) {
    throw new UsageError(`Expected one manifest, got ${positional.length}`);
  }
  if (positional[0] !== undefined) raw["manifest"] = positional[0];

  const result = buildCommandSchema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(result.error.issues.map(formatIssue).join("; "));
  }
  return { command: "build", options: result.data };
}

function formatIssue(issue: ZodIssue): string {
  return issue.message;
}
