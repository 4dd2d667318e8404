import { promises as fs } from "fs";
import { dirname, join } from "path";
import type { Logger } from "@quire/utils";
import { getErrorCode, getErrorMessage, z } from "@quire/utils";
import { SiteIOError } from "../errors";
import type { ChapterDocument, RenderedChapter } from "../types/chapter";
import type { FreezeMode } from "../types/manifest";

const frozenRenderSchema = z.object({
  hash: z.string(),
  title: z.string(),
  showTitle: z.boolean(),
  date: z.string().optional(),
  html: z.string(),
  searchText: z.string(),
});

type FrozenRender = z.infer<typeof frozenRenderSchema>;

/**
 * Stores rendered chapters between builds.
 *
 * - `false`: never read or write
 * - `"auto"`: reuse a render while the source hash is unchanged
 * - `true`: reuse any stored render, whatever the source now holds
 */
export class FreezeCache {
  constructor(
    private readonly directory: string,
    private readonly mode: FreezeMode,
    private readonly logger: Logger,
  ) {}

  get enabled(): boolean {
    return this.mode !== false;
  }

  async get(document: ChapterDocument): Promise<RenderedChapter | undefined> {
    if (!this.enabled) return undefined;

    const frozen = await this.read(document.path);
    if (!frozen) return undefined;

    if (this.mode === "auto" && frozen.hash !== document.contentHash) {
      this.logger.debug(`Source changed, re-rendering ${document.path}`);
      return undefined;
    }

    return {
      path: document.path,
      title: frozen.title,
      showTitle: frozen.showTitle,
      ...(frozen.date !== undefined && { date: frozen.date }),
      html: frozen.html,
      searchText: frozen.searchText,
      fromCache: true,
    };
  }

  async put(
    document: ChapterDocument,
    rendered: RenderedChapter,
  ): Promise<void> {
    if (!this.enabled) return;

    const frozen: FrozenRender = {
      hash: document.contentHash,
      title: rendered.title,
      showTitle: rendered.showTitle,
      ...(rendered.date !== undefined && { date: rendered.date }),
      html: rendered.html,
      searchText: rendered.searchText,
    };

    const file = this.fileFor(document.path);
    try {
      await fs.mkdir(dirname(file), { recursive: true });
      await fs.writeFile(file, JSON.stringify(frozen, null, 2) + "\n", "utf-8");
    } catch (error) {
      throw new SiteIOError(file, "write", { cause: error });
    }
  }

  private async read(chapterPath: string): Promise<FrozenRender | undefined> {
    const file = this.fileFor(chapterPath);

    let contents: string;
    try {
      contents = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (getErrorCode(error) === "ENOENT") return undefined;
      throw new SiteIOError(file, "read", { cause: error });
    }

    try {
      const parsed = frozenRenderSchema.safeParse(JSON.parse(contents));
      if (parsed.success) return parsed.data;
      this.logger.debug(`Ignoring malformed frozen render ${file}`);
    } catch (error) {
      this.logger.debug(
        `Ignoring unreadable frozen render ${file}: ${getErrorMessage(error)}`,
      );
    }
    return undefined;
  }

  private fileFor(chapterPath: string): string {
    return join(this.directory, `${chapterPath}.json`);
  }
}
