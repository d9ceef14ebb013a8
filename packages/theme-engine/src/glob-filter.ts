/**
 * Glob Filter
 *
 * Resolves the glob patterns of a theme declaration against the theme's
 * directory. Patterns starting with "!" exclude files; patterns that name no
 * extension receive the category's default extension.
 */

import path from "node:path";
import { glob } from "tinyglobby";

function ensureLeadingDot(extension: string): string {
  return extension.startsWith(".") ? extension : `.${extension}`;
}

/**
 * Append a default extension to a pattern that names none.
 *
 * @example
 * addExtensionIfMissing("templates/", ".hbs") // => "templates/*.hbs"
 * addExtensionIfMissing("scripts/**", "js") // => "scripts/**\/*.js"
 * addExtensionIfMissing("layout", ".hbs") // => "layout.hbs"
 * addExtensionIfMissing("images/*.png", ".hbs") // => "images/*.png"
 */
export function addExtensionIfMissing(pattern: string, extension?: string): string {
  if (!extension) return pattern;

  const dotted = ensureLeadingDot(extension);

  if (pattern.endsWith("/")) return `${pattern}*${dotted}`;
  if (pattern.endsWith("**")) return `${pattern}/*${dotted}`;

  const lastSegment = pattern.slice(pattern.lastIndexOf("/") + 1);
  if (!lastSegment.includes(".")) return `${pattern}${dotted}`;

  return pattern;
}

/**
 * Split patterns into include and exclude lists, applying the default extension.
 */
export function splitPatterns(
  patterns: readonly string[],
  defaultExtension?: string,
): { include: string[]; exclude: string[] } {
  const include: string[] = [];
  const exclude: string[] = [];

  for (const pattern of patterns) {
    if (!pattern) continue;

    if (pattern.startsWith("!")) {
      exclude.push(addExtensionIfMissing(pattern.slice(1), defaultExtension));
    } else {
      include.push(addExtensionIfMissing(pattern, defaultExtension));
    }
  }

  return { include, exclude };
}

/**
 * Find the files under `directory` matched by `patterns`.
 *
 * Files follow the order of the include patterns that matched them first;
 * files matched by one pattern are sorted by path.
 *
 * @returns Absolute paths without duplicates
 */
export async function findMatchingFiles(
  patterns: readonly string[],
  directory: string,
  defaultExtension?: string,
): Promise<string[]> {
  const { include, exclude } = splitPatterns(patterns, defaultExtension);
  const files: string[] = [];
  const seen = new Set<string>();

  for (const pattern of include) {
    const matches = await glob([pattern], {
      cwd: directory,
      ignore: exclude,
      absolute: true,
      onlyFiles: true,
    });

    for (const match of matches.map((file) => path.resolve(file)).sort()) {
      if (!seen.has(match)) {
        seen.add(match);
        files.push(match);
      }
    }
  }

  return files;
}
