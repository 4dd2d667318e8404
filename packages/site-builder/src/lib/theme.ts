import { promises as fs } from "fs";
import { fileURLToPath } from "url";
import { DEFAULT_THEME } from "../types/manifest";
import { SiteIOError } from "../errors";

const STYLES_DIR = new URL("../../styles/", import.meta.url);

export interface Stylesheet {
  css: string;
  /** Theme names from the manifest that have no palette */
  unknownThemes: string[];
}

/**
 * Theme names defined by a themes stylesheet (`[data-theme="name"]` blocks)
 */
export function listThemes(themesCss: string): string[] {
  const names: string[] = [];
  for (const match of themesCss.matchAll(/\[data-theme="([\w-]+)"\]/g)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) names.push(name);
  }
  return names;
}

/**
 * Base stylesheet plus every theme palette. The page's data-theme attribute
 * selects the palette, so a light/dark pair needs no second file.
 */
export async function buildStylesheet(themes: string[]): Promise<Stylesheet> {
  const base = await readStyle("base.css");
  const palettes = await readStyle("themes.css");
  const known = listThemes(palettes);

  return {
    css: `${base.trimEnd()}\n\n/* Themes */\n${palettes.trimEnd()}\n`,
    unknownThemes: themes.filter((theme) => !known.includes(theme)),
  };
}

/**
 * Theme to put on the page: the requested one when known, else the default
 */
export function effectiveTheme(
  theme: string | undefined,
  unknownThemes: string[],
): string {
  return theme !== undefined && !unknownThemes.includes(theme)
    ? theme
    : DEFAULT_THEME;
}

async function readStyle(name: string): Promise<string> {
  const path = fileURLToPath(new URL(name, STYLES_DIR));
  try {
    return await fs.readFile(path, "utf-8");
  } catch (error) {
    throw new SiteIOError(path, "read", { cause: error });
  }
}
