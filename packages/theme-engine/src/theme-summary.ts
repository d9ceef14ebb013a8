/**
 * Theme Summary
 *
 * Human-readable and JSON descriptions of a resolved theme, printed by the
 * show-theme command so authors can see which parameters a theme accepts.
 */

import path from "node:path";
import type { Theme } from "./theme.js";

/**
 * JSON-friendly view of a theme.
 */
export interface ThemeSummary {
  id: string;
  chain: string[];
  metadata?: Theme["metadata"];
  parameters: Record<string, { type: string; description?: string; defaultValue?: unknown }>;
  templates: Record<string, string>;
  scripts: Record<string, string[]>;
  styles: Record<string, string[]>;
  assets: Record<string, string>;
}

/**
 * Convert a theme into a plain object. Paths become relative to `relativeTo` when given.
 */
export function summarizeTheme(theme: Theme, relativeTo?: string): ThemeSummary {
  const display = (file: string): string =>
    relativeTo ? path.relative(relativeTo, file).split(path.sep).join("/") : file;

  const summary: ThemeSummary = {
    id: theme.id,
    chain: [...theme.chain],
    parameters: theme.parameters.toJSON(),
    templates: {},
    scripts: {},
    styles: {},
    assets: {},
  };

  if (theme.metadata) summary.metadata = theme.metadata;

  for (const [name, file] of theme.templates) summary.templates[name] = display(file);
  for (const [target, files] of theme.scripts) summary.scripts[target] = files.map(display);
  for (const [target, files] of theme.styles) summary.styles[target] = files.map(display);
  for (const [relative, file] of theme.assets) summary.assets[relative] = display(file);

  return summary;
}

/**
 * Describe the parameters of a theme, one block per parameter.
 *
 * @example
 * // siteTitle (string) = "API Documentation"
 * //     Title shown in the page header.
 */
export function formatThemeParameters(theme: Theme): string[] {
  const lines: string[] = [];

  for (const [name, parameter] of theme.parameters) {
    const defaultText =
      parameter.defaultValue === undefined ? "" : ` = ${JSON.stringify(parameter.defaultValue)}`;
    lines.push(`${name} (${parameter.type})${defaultText}`);
    if (parameter.description) {
      lines.push(`    ${parameter.description}`);
    }
  }

  return lines;
}
