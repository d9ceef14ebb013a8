/**
 * Convention Utilities
 *
 * A documentation convention decides the output format (and therefore the
 * themes directory) and which elements get a page of their own.
 *
 * - dotnet: HTML, separate pages for namespaces, types and members
 * - docfx:  HTML, members share their type's page
 * - devops: Markdown wiki, members share their type's page
 */

export const DOC_CONVENTION = ["dotnet", "docfx", "devops"] as const;
export type DocConvention = (typeof DOC_CONVENTION)[number];

export const THEME_FORMAT = ["html", "md"] as const;
export type ThemeFormat = (typeof THEME_FORMAT)[number];

/**
 * Which elements receive dedicated pages.
 */
export interface PageGranularity {
  namespacePages: boolean;
  typePages: boolean;
  memberPages: boolean;
}

/**
 * Check if a string is a valid DocConvention.
 */
export function isDocConvention(value: string): value is DocConvention {
  return DOC_CONVENTION.some((convention) => convention === value);
}

/**
 * Get the theme format used by a convention.
 *
 * @example
 * themeFormatFor("docfx") // => "html"
 * themeFormatFor("devops") // => "md"
 */
export function themeFormatFor(convention: DocConvention): ThemeFormat {
  return convention === "devops" ? "md" : "html";
}

/**
 * Get the page granularity of a convention.
 */
export function granularityFor(convention: DocConvention): PageGranularity {
  return {
    namespacePages: true,
    typePages: true,
    memberPages: convention === "dotnet",
  };
}
