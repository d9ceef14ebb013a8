/**
 * Theme Loader
 *
 * Resolves a theme by walking its `base` chain from the requested theme up
 * to the root ancestor, merging each declaration into one Theme. The most
 * derived theme is merged first, so "first write wins" rules always favor
 * it, while bundles list its files ahead of its ancestors'.
 *
 * Merge rules per artifact:
 * - metadata:   most derived theme only
 * - parameters: by name, case-insensitive, first write wins
 * - templates:  by file name without extension, case-insensitive, first write wins
 * - bundles:    by target path, case-insensitive, files appended and deduplicated;
 *               the resolved theme lists bundles ordered by target path
 * - assets:     by path relative to the theme root, case-insensitive, first write wins
 */

import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { markdownToHtml, type TextTransform } from "@apisite/markdown-utils";
import { themeFormatFor, type DocConvention } from "@apisite/site-schema";
import { CaseInsensitiveMap, type ReadonlyCaseInsensitiveMap } from "./case-insensitive-map.js";
import { findMatchingFiles } from "./glob-filter.js";
import type { ThemeParameter } from "./parameter.js";
import {
  readThemeConfig,
  THEME_FILE_NAME,
  type BundleDeclaration,
  type ThemeConfig,
  type ThemeMetadata,
} from "./theme-config.js";
import { CircularThemeError, ThemeNotFoundError } from "./errors.js";

/** Directory holding the built-in themes, one subdirectory per format */
export const BUILTIN_THEMES_DIR = fileURLToPath(new URL("../../../themes", import.meta.url));

/**
 * A fully resolved theme. Frozen once loaded.
 */
export interface Theme {
  /** Identifier the theme was requested by */
  readonly id: string;

  /** Theme identifiers in merge order, most derived first */
  readonly chain: readonly string[];

  /** Metadata of the most derived theme */
  readonly metadata?: ThemeMetadata;

  /** Parameter name → definition */
  readonly parameters: ReadonlyCaseInsensitiveMap<ThemeParameter>;

  /** Template name → absolute template path */
  readonly templates: ReadonlyCaseInsensitiveMap<string>;

  /** Bundle target path → absolute source paths in read order, ordered by target path */
  readonly scripts: ReadonlyCaseInsensitiveMap<readonly string[]>;

  /** Bundle target path → absolute source paths in read order, ordered by target path */
  readonly styles: ReadonlyCaseInsensitiveMap<readonly string[]>;

  /** Path relative to the output root → absolute asset path */
  readonly assets: ReadonlyCaseInsensitiveMap<string>;
}

/**
 * Options for {@link loadTheme}.
 */
export interface LoadThemeOptions {
  /** Root directory holding `<format>/<themeId>/theme.json` (defaults to the built-in themes) */
  themesDir?: string;

  /** Documentation convention, selects the format subdirectory (default "dotnet") */
  convention?: DocConvention;

  /** Transform applied to markdown parameter defaults (default {@link markdownToHtml}) */
  transformMarkdown?: TextTransform;

  /** What to do when a theme appears twice in its own base chain (default "error") */
  onCircularBase?: "error" | "ignore";
}

/**
 * Accumulates theme declarations into a resolved theme.
 */
export class ThemeAccumulator {
  readonly parameters = new CaseInsensitiveMap<ThemeParameter>();
  readonly templates = new CaseInsensitiveMap<string>();
  readonly scripts = new CaseInsensitiveMap<readonly string[]>();
  readonly styles = new CaseInsensitiveMap<readonly string[]>();
  readonly assets = new CaseInsensitiveMap<string>();
  metadata?: ThemeMetadata;

  private readonly chain: string[] = [];

  constructor(readonly id: string) {}

  /**
   * Merge one declaration, keeping everything merged before it.
   *
   * @param themeId - Identifier of the declaring theme
   * @param config - The validated declaration
   * @param directory - The theme's root directory; patterns are relative to it
   */
  async merge(themeId: string, config: ThemeConfig, directory: string): Promise<void> {
    if (this.chain.length === 0) {
      this.metadata = config.metadata;
    }
    this.chain.push(themeId);

    await mergeBundle(this.scripts, config.scripts, directory, ".js");
    await mergeBundle(this.styles, config.styles, directory, ".css");

    for (const file of await findMatchingFiles(config.templates, directory, ".hbs")) {
      this.templates.setIfAbsent(templateNameOf(file), file);
    }

    for (const file of await findMatchingFiles(config.assets, directory)) {
      this.assets.setIfAbsent(toPosixPath(path.relative(directory, file)), file);
    }

    for (const [name, parameter] of Object.entries(config.parameters)) {
      this.parameters.setIfAbsent(name, parameter);
    }
  }

  /**
   * Produce the frozen theme. The theme holds its own copies of the maps, so
   * later merges do not reach it; bundles are ordered by target path.
   */
  build(): Theme {
    const parameters = new CaseInsensitiveMap<ThemeParameter>();
    for (const [name, parameter] of this.parameters) {
      parameters.set(name, deepFreeze({ ...parameter }));
    }

    const theme: Theme = {
      id: this.id,
      chain: Object.freeze([...this.chain]),
      parameters: parameters.freeze(),
      templates: new CaseInsensitiveMap(this.templates).freeze(),
      scripts: sortedByTarget(this.scripts).freeze(),
      styles: sortedByTarget(this.styles).freeze(),
      assets: new CaseInsensitiveMap(this.assets).freeze(),
      ...(this.metadata ? { metadata: Object.freeze({ ...this.metadata }) } : {}),
    };
    return Object.freeze(theme);
  }
}

/**
 * Freeze a value and everything reachable from it.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Copy bundles ordered by target path, ignoring case.
 */
function sortedByTarget(
  bundles: CaseInsensitiveMap<readonly string[]>,
): CaseInsensitiveMap<readonly string[]> {
  const entries = [...bundles].sort(([a], [b]) => compareIgnoringCase(a, b));
  return new CaseInsensitiveMap(entries);
}

function compareIgnoringCase(a: string, b: string): number {
  const left = a.toUpperCase();
  const right = b.toUpperCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

async function mergeBundle(
  bundles: CaseInsensitiveMap<readonly string[]>,
  declaration: BundleDeclaration,
  directory: string,
  defaultExtension: string,
): Promise<void> {
  const files = [...(bundles.get(declaration.targetPath) ?? [])];
  const seen = new Set(files.map((file) => file.toLowerCase()));

  for (const file of await findMatchingFiles(declaration.source, directory, defaultExtension)) {
    const key = file.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      files.push(file);
    }
  }

  if (files.length > 0) {
    bundles.set(declaration.targetPath, Object.freeze(files));
  }
}

/**
 * Get the template name of a template file: its file name without extension.
 *
 * @example
 * templateNameOf("/themes/html/classic/partials/header.hbs") // => "header"
 */
export function templateNameOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

/**
 * Get the directory holding the themes of a convention.
 */
export function getThemesDirectory(options: Pick<LoadThemeOptions, "themesDir" | "convention"> = {}): string {
  const root = options.themesDir ?? BUILTIN_THEMES_DIR;
  return path.resolve(root, themeFormatFor(options.convention ?? "dotnet"));
}

async function assertDirectory(directory: string): Promise<void> {
  const stats = await fs.stat(directory).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new ThemeNotFoundError(`Theme directory could not be found: ${directory}`, directory);
  }
}

/**
 * Load a theme and its ancestors.
 *
 * @param name - A theme identifier (its directory name) or a path to a theme directory
 * @param options - Loader options
 * @returns The merged, frozen theme
 * @throws {ThemeNotFoundError} When a theme directory or declaration is missing
 * @throws {ThemeValidationError} When a declaration is malformed
 * @throws {CircularThemeError} When the base chain loops and `onCircularBase` is "error"
 */
export async function loadTheme(name: string, options: LoadThemeOptions = {}): Promise<Theme> {
  if (!name.trim()) {
    throw new TypeError("A theme name is required");
  }

  const themesDirectory = getThemesDirectory(options);
  const transform = options.transformMarkdown ?? markdownToHtml;
  const onCircularBase = options.onCircularBase ?? "error";
  const accumulator = new ThemeAccumulator(name);
  const visited: string[] = [];

  let themeName: string | null | undefined = name;
  while (themeName) {
    if (visited.includes(themeName)) {
      if (onCircularBase === "error") {
        throw new CircularThemeError([...visited, themeName]);
      }
      break;
    }
    visited.push(themeName);

    const directory = path.resolve(themesDirectory, themeName);
    await assertDirectory(directory);

    const config = await readThemeConfig(path.join(directory, THEME_FILE_NAME), transform);
    await accumulator.merge(themeName, config, directory);
    themeName = config.base;
  }

  return accumulator.build();
}
