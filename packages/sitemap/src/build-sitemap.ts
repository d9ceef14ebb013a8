/**
 * Build Sitemap
 *
 * The work behind the build-sitemap command. Every input is resolved first
 * (model, theme, sitemap, navigation script); files are written only once
 * all of them succeeded, so a failure leaves no partial output behind.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { DocConvention } from "@apisite/site-schema";
import { loadTheme, resolveThemeVariables, type Logger } from "@apisite/theme-engine";
import { readDocumentationModel } from "./model-schema.js";
import { countGenerationSteps, createNavigationScript } from "./navigation-script.js";
import { SiteContext } from "./site-context.js";
import type { Sitemap } from "./sitemap.js";

export interface BuildSitemapOptions {
  convention: DocConvention;

  /** Root URL of the site */
  baseUrl?: string;

  /** File receiving the sitemap JSON */
  output?: string;

  /** Theme used to count generation steps */
  theme?: string;

  themesDir?: string;

  /** File receiving the navigation prelude; requires `theme` */
  script?: string;

  /** Receives warnings about theme settings */
  logger?: Logger;
}

export interface BuildSitemapResult {
  sitemap: Sitemap;

  /** Pretty-printed sitemap JSON */
  json: string;

  /** Pages, assets and bundles of a run with the theme */
  generationSteps?: number;

  /** Navigation prelude, when a script file was requested */
  script?: string;

  /** Absolute paths of the files written */
  written: string[];
}

async function writeTextFile(filePath: string, content: string): Promise<string> {
  const resolved = path.resolve(filePath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, content);
  return resolved;
}

/**
 * Build the sitemap of a documentation model file and write the requested files.
 *
 * @throws {ModelValidationError} When the model cannot be read or is malformed
 * @throws {SiteError} When the theme cannot be resolved
 */
export async function buildSitemapFiles(
  modelPath: string,
  options: BuildSitemapOptions,
): Promise<BuildSitemapResult> {
  if (options.script && !options.theme) {
    throw new TypeError("A navigation script requires a theme");
  }

  const model = await readDocumentationModel(path.resolve(modelPath));
  const theme = options.theme
    ? await loadTheme(options.theme, { convention: options.convention, themesDir: options.themesDir })
    : undefined;

  const { sitemap } = new SiteContext(model, {
    convention: options.convention,
    baseUrl: options.baseUrl,
  });
  const result: BuildSitemapResult = {
    sitemap,
    json: JSON.stringify(sitemap, null, 2),
    written: [],
  };

  if (theme) {
    result.generationSteps = countGenerationSteps(sitemap, theme, theme.assets.size);
    if (options.script) {
      const variables = resolveThemeVariables(theme, {}, { logger: options.logger });
      result.script = createNavigationScript(sitemap, variables);
    }
  }

  if (options.output) {
    result.written.push(await writeTextFile(options.output, `${result.json}\n`));
  }
  if (options.script && result.script !== undefined) {
    result.written.push(await writeTextFile(options.script, `${result.script}\n`));
  }

  return result;
}
