import { join } from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createTempProject } from "@quire/test-utils";
import type { TempProject } from "@quire/test-utils";
import {
  EXIT_DOCUMENT_FAILURES,
  EXIT_FATAL,
  EXIT_OK,
  VERSION,
  runCli,
} from "../src/cli";
import type { CliIO } from "../src/cli";

const MANIFEST = `book:
  title: CLI Book
  chapters:
    - index.qmd
    - part: Main
      chapters:
        - a.qmd
`;

describe("runCli", () => {
  let project: TempProject;
  let stdout: string[];
  let stderr: string[];
  let io: CliIO;

  beforeEach(async () => {
    project = await createTempProject({
      "_quarto.yml": MANIFEST,
      "index.qmd": "# Home\n",
      "a.qmd": "# A\n\nText.\n",
    });
    stdout = [];
    stderr = [];
    io = {
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      env: { QUIRE_LOG_LEVEL: "none" },
      cwd: project.dir,
      now: new Date("2024-05-06T00:00:00Z"),
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await project.cleanup();
  });

  it("should print help", async () => {
    expect(await runCli(["--help"], io)).toBe(EXIT_OK);
    expect(stdout[0]).toContain("Usage:\n  quire build [manifest] [options]");
  });

  it("should print the version", async () => {
    expect(await runCli(["--version"], io)).toBe(EXIT_OK);
    expect(stdout).toEqual([`quire v${VERSION}`]);
  });

  it("should exit 2 on usage errors", async () => {
    expect(await runCli(["serve"], io)).toBe(EXIT_FATAL);
    expect(stderr).toEqual([
      "Error: Unknown command: serve",
      'Run "quire --help" for usage.',
    ]);
  });

  it("should build the book and print the output directory", async () => {
    expect(await runCli(["build"], io)).toBe(EXIT_OK);

    expect(stdout).toEqual([join(project.dir, "_book")]);
    expect(stderr).toEqual([]);
    expect(await project.exists("_book/a.html")).toBe(true);
  });

  it("should keep verbose logs off stdout", async () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(await runCli(["build", "--verbose"], io)).toBe(EXIT_OK);

    expect(stdout).toEqual([join(project.dir, "_book")]);
    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(error.mock.calls.map((call) => String(call[0]))).toContainEqual(
      expect.stringMatching(
        /\[quire:ManifestLoader\] Loaded manifest "CLI Book" with 2 chapters$/,
      ),
    );
  });

  it("should honour --out", async () => {
    expect(await runCli(["build", "_quarto.yml", "--out", "site"], io)).toBe(
      EXIT_OK,
    );
    expect(stdout).toEqual([join(project.dir, "site")]);
  });

  it("should exit 1 and list failed documents", async () => {
    await project.write("a.qmd", "```python\nx\n");

    expect(await runCli(["build"], io)).toBe(EXIT_DOCUMENT_FAILURES);
    expect(stderr).toEqual([
      `1 document(s) failed; site written to ${join(project.dir, "_book")}`,
      "  a.qmd: Failed to render a.qmd: unterminated code fence opened at line 1",
    ]);
    expect(await project.exists("_book/index.html")).toBe(true);
  });

  it("should exit 2 for a missing chapter", async () => {
    await project.write("_quarto.yml", `${MANIFEST}        - missing.qmd\n`);

    expect(await runCli(["build"], io)).toBe(EXIT_FATAL);
    expect(stderr).toEqual(["Error: Chapter not found: missing.qmd"]);
  });

  it("should count skipped chapters as failures", async () => {
    await project.write("_quarto.yml", `${MANIFEST}        - missing.qmd\n`);

    expect(await runCli(["build", "--skip-missing"], io)).toBe(
      EXIT_DOCUMENT_FAILURES,
    );
    expect(stderr[1]).toBe("  missing.qmd: Chapter not found: missing.qmd");
  });

  it("should exit 2 for an invalid manifest", async () => {
    await project.write("_quarto.yml", "book:\n  chapters: [a.qmd]\n");

    expect(await runCli(["build"], io)).toBe(EXIT_FATAL);
    expect(stderr).toEqual([
      "Error: Invalid manifest structure\n  book.title: Required",
    ]);
  });

  it("should exit 2 when the manifest cannot be read", async () => {
    expect(await runCli(["build", "nowhere.yml"], io)).toBe(EXIT_FATAL);
    expect(stderr[0]).toMatch(/^Error: Failed to read .*nowhere\.yml: /);
  });
});
