import { promises as fs } from "fs";
import { resolve } from "path";
import { computeContentHash, getErrorCode } from "@quire/utils";
import { ManifestReferenceError, RenderError, SiteIOError } from "../errors";
import { detectChapterFormat } from "../types/chapter";
import type { ChapterDocument } from "../types/chapter";

/**
 * Read a chapter file listed in the manifest
 *
 * @throws ManifestReferenceError when the file no longer exists
 * @throws SiteIOError for any other read failure
 * @throws RenderError when the file type is not a supported chapter format
 */
export async function readChapter(
  chapterPath: string,
  projectDir: string,
): Promise<ChapterDocument> {
  const absolutePath = resolve(projectDir, chapterPath);

  const format = detectChapterFormat(chapterPath);
  if (!format) {
    throw new RenderError(chapterPath, "unsupported chapter type");
  }

  let raw: string;
  try {
    raw = await fs.readFile(absolutePath, "utf-8");
  } catch (error) {
    const code = getErrorCode(error);
    if (code === "ENOENT" || code === "EISDIR") {
      throw new ManifestReferenceError(chapterPath, absolutePath);
    }
    throw new SiteIOError(absolutePath, "read", { cause: error });
  }

  return {
    path: chapterPath,
    absolutePath,
    format,
    raw,
    contentHash: computeContentHash(raw),
  };
}
