import { promises as fs } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";

/**
 * A throwaway project directory on disk
 */
export interface TempProject {
  dir: string;
  /** Absolute path of a project-relative file */
  path(relative: string): string;
  write(relative: string, contents: string): Promise<void>;
  read(relative: string): Promise<string>;
  exists(relative: string): Promise<boolean>;
  cleanup(): Promise<void>;
}

/**
 * Create a temporary project populated with the given files
 *
 * @example
 * ```typescript
 * const project = await createTempProject({
 *   "_quarto.yml": "book:\n  title: Test\n  chapters:\n    - index.qmd\n",
 *   "index.qmd": "# Welcome\n",
 * });
 * afterEach(() => project.cleanup());
 * ```
 */
export async function createTempProject(
  files: Record<string, string> = {},
): Promise<TempProject> {
  const dir = await fs.mkdtemp(join(tmpdir(), "quire-test-"));

  const project: TempProject = {
    dir,
    path: (relative) => join(dir, relative),
    write: async (relative, contents) => {
      const target = join(dir, relative);
      await fs.mkdir(dirname(target), { recursive: true });
      await fs.writeFile(target, contents, "utf-8");
    },
    read: (relative) => fs.readFile(join(dir, relative), "utf-8"),
    exists: async (relative) => {
      try {
        await fs.access(join(dir, relative));
        return true;
      } catch {
        return false;
      }
    },
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };

  for (const [relative, contents] of Object.entries(files)) {
    await project.write(relative, contents);
  }

  return project;
}
