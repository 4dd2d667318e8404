export {
  runCli,
  VERSION,
  EXIT_OK,
  EXIT_DOCUMENT_FAILURES,
  EXIT_FATAL,
} from "./cli";
export type { CliIO } from "./cli";
export { parseArgs, UsageError } from "./args";
export type { CliCommand } from "./args";
export { buildCommandSchema, DEFAULT_MANIFEST } from "./config";
export type { BuildCommand } from "./config";
