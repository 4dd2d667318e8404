import type { BookManifest } from "./manifest";
import type { NavigationTree } from "./navigation";
import type { DocumentError } from "../errors";

/**
 * Per-build values, computed once when a build starts
 */
export interface BuildContext {
  now: Date;
  /** `now` as YYYY-MM-DD (UTC), the value of `date: today` */
  today: string;
  manifest: BookManifest;
  projectDir: string;
  outputDir: string;
}

export interface DocumentFailure {
  path: string;
  error: DocumentError;
}

export interface BuildResult {
  success: boolean;
  outputDir: string;
  /** Written HTML pages relative to the output directory, in navigation order */
  pages: string[];
  navigation: NavigationTree;
  failures: DocumentFailure[];
  warnings: string[];
  rendered: number;
  cached: number;
}
