/**
 * Theme Declaration
 *
 * Reads and validates a single `theme.json`. Schema violations and invalid
 * parameter defaults are collected into one error, so an author sees every
 * problem of a declaration at once.
 */

import fs from "node:fs/promises";
import { z } from "zod";
import type { TextTransform } from "@apisite/markdown-utils";
import { THEME_PARAMETER_TYPE, defineThemeParameter, type ThemeParameter } from "./parameter.js";
import { ThemeNotFoundError, ThemeValidationError } from "./errors.js";

/** File name of a theme declaration inside its directory */
export const THEME_FILE_NAME = "theme.json";

/** Default bundle targets */
export const DEFAULT_SCRIPT_TARGET = "script.js";
export const DEFAULT_STYLE_TARGET = "styles.css";

/**
 * Informational theme metadata. Not used by any resolution logic.
 */
export const themeMetadataSchema = z.object({
  /** Content format the theme renders (e.g. "html", "md") */
  format: z.string().optional(),
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
  author: z.string().optional(),
  license: z.string().optional(),
  homepage: z.string().url().optional(),
});

export type ThemeMetadata = z.infer<typeof themeMetadataSchema>;

function bundleSchema(defaultTarget: string) {
  return z
    .object({
      source: z.array(z.string()).default([]),
      targetPath: z.string().min(1).default(defaultTarget),
    })
    .default({});
}

const parameterTypeSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(THEME_PARAMETER_TYPE));

/**
 * Create the declaration schema. Markdown parameter defaults are passed
 * through `transform` while they are validated.
 */
export function createThemeConfigSchema(transform?: TextTransform) {
  const parameterSchema = z
    .object({
      type: parameterTypeSchema,
      description: z.string().optional(),
      defaultValue: z.unknown().optional(),
    })
    .transform((definition, ctx): ThemeParameter => {
      const result = defineThemeParameter(definition, transform);
      if (!result.ok) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["defaultValue"],
          message: result.error.message,
        });
        return z.NEVER;
      }
      return result.parameter;
    });

  return z.object({
    base: z.string().nullable().optional(),
    metadata: themeMetadataSchema.optional(),
    templates: z.array(z.string()).default([]),
    scripts: bundleSchema(DEFAULT_SCRIPT_TARGET),
    styles: bundleSchema(DEFAULT_STYLE_TARGET),
    assets: z.array(z.string()).default([]),
    parameters: z
      .record(z.string(), parameterSchema)
      .default({})
      .superRefine((parameters, ctx) => {
        const seen = new Set<string>();
        for (const name of Object.keys(parameters)) {
          const key = name.toLowerCase();
          if (seen.has(key)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [name],
              message: "Parameter names must be unique regardless of case",
            });
          }
          seen.add(key);
        }
      }),
  });
}

/**
 * A validated theme declaration.
 */
export type ThemeConfig = z.output<ReturnType<typeof createThemeConfigSchema>>;

/**
 * A script or style bundle declaration.
 */
export type BundleDeclaration = ThemeConfig["scripts"];

/**
 * Format a zod issue as "path: message".
 */
export function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${location}: ${issue.message}`;
}

/**
 * Validate parsed declaration data.
 *
 * @param data - Parsed JSON content
 * @param source - File path used in error messages
 * @param transform - Transform applied to markdown defaults
 * @throws {ThemeValidationError} Listing every violation found
 */
export function parseThemeConfig(
  data: unknown,
  source: string,
  transform?: TextTransform,
): ThemeConfig {
  const result = createThemeConfigSchema(transform).safeParse(data);
  if (!result.success) {
    throw new ThemeValidationError(
      `Theme file contains errors: ${source}`,
      result.error.issues.map(formatIssue),
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Read and validate a theme declaration file.
 *
 * @throws {ThemeNotFoundError} When the file does not exist
 * @throws {ThemeValidationError} When the file is not valid JSON or violates the schema
 */
export async function readThemeConfig(
  filePath: string,
  transform?: TextTransform,
): Promise<ThemeConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new ThemeNotFoundError(`Theme file could not be found: ${filePath}`, filePath);
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ThemeValidationError(`Theme file could not be parsed: ${filePath}`, [reason], {
      cause: error,
    });
  }

  return parseThemeConfig(data, filePath, transform);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
