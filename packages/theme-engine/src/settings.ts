/**
 * Theme Settings
 *
 * Combines a theme's parameter defaults with the settings a user supplies
 * for one build. A setting of the wrong shape is reported and dropped; it
 * never fails the build.
 */

import { markdownToHtml, type TextTransform } from "@apisite/markdown-utils";
import { validateParameter } from "./parameter.js";
import type { Theme } from "./theme.js";

/**
 * The logging surface used by library code.
 */
export type Logger = Pick<Console, "log" | "warn">;

export interface ThemeSettingsOptions {
  /** Transform applied to markdown settings (default {@link markdownToHtml}) */
  transformMarkdown?: TextTransform;

  /** Receives warnings for rejected settings (default `console`) */
  logger?: Logger;
}

/**
 * Resolve the variables a theme's templates and scripts see.
 *
 * Contains the theme metadata under `theme`, the bundle target paths under
 * `scripts` and `styles`, every parameter default, and finally the user
 * settings. Settings for names the theme does not declare pass through as is.
 *
 * @param theme - The resolved theme
 * @param settings - User settings for this build
 * @param options - Transform and logger
 */
export function resolveThemeVariables(
  theme: Theme,
  settings: Readonly<Record<string, unknown>> = {},
  options: ThemeSettingsOptions = {},
): Record<string, unknown> {
  const transform = options.transformMarkdown ?? markdownToHtml;
  const logger = options.logger ?? console;
  const variables: Record<string, unknown> = {};

  if (theme.metadata) {
    variables.theme = theme.metadata;
  }

  for (const [name, parameter] of theme.parameters) {
    if (parameter.defaultValue !== undefined) {
      // defaults are frozen and shared by every build
      variables[name] = structuredClone(parameter.defaultValue);
    }
  }

  variables.scripts = [...theme.scripts.keys()];
  variables.styles = [...theme.styles.keys()];

  for (const [name, value] of Object.entries(settings)) {
    if (value === null || value === undefined) continue;

    const parameter = theme.parameters.get(name);
    if (!parameter) {
      variables[name] = value;
      continue;
    }
    const key = theme.parameters.keyOf(name) ?? name;

    const result = validateParameter(value, parameter.type, transform);
    if (!result.ok) {
      logger.warn(`⚠️ Invalid value for theme parameter '${name}'. ${result.error.message}`);
      continue;
    }
    variables[key] = result.value;
  }

  return variables;
}
