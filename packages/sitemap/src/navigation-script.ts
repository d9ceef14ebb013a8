/**
 * Navigation Script
 *
 * Theme scripts render the navigation on the client. The first script bundle
 * of a site starts with a prelude that publishes the sitemap and the site
 * configuration on `window`.
 */

import type { Sitemap } from "./sitemap.js";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * The bundle counts a generation run needs from a theme.
 */
export interface BundleCounts {
  scripts: { readonly size: number };
  styles: { readonly size: number };
}

/**
 * Create the prelude of the first script bundle.
 *
 * @example
 * createNavigationScript(sitemap, { siteTitle: "Docs" })
 * // => 'window.apisite = {"sitemap":[...],"config":{"siteTitle":"Docs"}};'
 */
export function createNavigationScript(
  sitemap: Sitemap,
  config: Readonly<Record<string, unknown>> = {},
  globalName = "apisite",
): string {
  if (!IDENTIFIER.test(globalName)) {
    throw new TypeError(`Not a valid global name: ${globalName}`);
  }
  return `window.${globalName} = ${JSON.stringify({ sitemap, config })};`;
}

/**
 * Count the steps of a generation run: one per page, asset and bundle.
 */
export function countGenerationSteps(sitemap: Sitemap, theme: BundleCounts, assetCount = 0): number {
  return sitemap.pageCount + assetCount + theme.scripts.size + theme.styles.size;
}
