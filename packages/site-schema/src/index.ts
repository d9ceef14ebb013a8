/**
 * @apisite/site-schema
 *
 * Shared data structures for documentation sites. The metadata model is
 * produced by the extraction layer; the sitemap types are consumed by the
 * client-side navigation scripts of every theme.
 */

export * from "./model.js";
export * from "./sitemap.js";
export * from "./convention.js";
