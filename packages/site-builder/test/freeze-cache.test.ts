import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { computeContentHash } from "@quire/utils";
import { createSilentLogger, createTempProject } from "@quire/test-utils";
import type { TempProject } from "@quire/test-utils";
import { FreezeCache } from "../src/lib/freeze-cache";
import type { ChapterDocument, RenderedChapter } from "../src/types/chapter";

function document(raw: string): ChapterDocument {
  return {
    path: "part/intro.qmd",
    absolutePath: "/book/part/intro.qmd",
    format: "markdown",
    raw,
    contentHash: computeContentHash(raw),
  };
}

const rendered: RenderedChapter = {
  path: "part/intro.qmd",
  title: "Intro",
  showTitle: true,
  date: "today",
  html: "<p>Hi</p>\n",
  searchText: "Hi",
  fromCache: false,
};

describe("FreezeCache", () => {
  let project: TempProject;
  const logger = createSilentLogger();

  beforeEach(async () => {
    project = await createTempProject();
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it("should neither read nor write when freeze is off", async () => {
    const cache = new FreezeCache(project.path("_freeze"), false, logger);

    await cache.put(document("Hi"), rendered);

    expect(cache.enabled).toBe(false);
    expect(await project.exists("_freeze")).toBe(false);
    expect(await cache.get(document("Hi"))).toBeUndefined();
  });

  it("should reuse a render while the source is unchanged in auto mode", async () => {
    const cache = new FreezeCache(project.path("_freeze"), "auto", logger);

    expect(await cache.get(document("Hi"))).toBeUndefined();
    await cache.put(document("Hi"), rendered);

    expect(await project.exists("_freeze/part/intro.qmd.json")).toBe(true);
    expect(await cache.get(document("Hi"))).toEqual({
      ...rendered,
      fromCache: true,
    });
    expect(await cache.get(document("Hi, changed"))).toBeUndefined();
  });

  it("should reuse any stored render when frozen", async () => {
    const cache = new FreezeCache(project.path("_freeze"), true, logger);
    await cache.put(document("Hi"), rendered);

    const frozen = await cache.get(document("Hi, changed"));
    expect(frozen?.html).toBe("<p>Hi</p>\n");
    expect(frozen?.fromCache).toBe(true);
  });

  it("should ignore malformed cache files", async () => {
    const cache = new FreezeCache(project.path("_freeze"), true, logger);
    await project.write("_freeze/part/intro.qmd.json", "{ not json");
    expect(await cache.get(document("Hi"))).toBeUndefined();

    await project.write("_freeze/part/intro.qmd.json", '{"hash": 1}');
    expect(await cache.get(document("Hi"))).toBeUndefined();
  });
});
