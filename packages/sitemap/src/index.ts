/**
 * Library exports for @apisite/sitemap
 */

export { SitemapNode } from "./sitemap-node.js";
export { Sitemap, buildSitemap, type SitemapOptions } from "./sitemap.js";
export { groupMembers, memberGroupOf, MEMBER_GROUP_ORDER, type MemberGroup } from "./member-groups.js";
export { toNavigationUrl, stripFragment, isAbsoluteUrl } from "./urls.js";
export { SiteContext, type SiteContextOptions } from "./site-context.js";
export { createNavigationScript, countGenerationSteps, type BundleCounts } from "./navigation-script.js";
export {
  documentationModelSchema,
  parseDocumentationModel,
  readDocumentationModel,
} from "./model-schema.js";
export { ModelValidationError } from "./errors.js";
export {
  buildSitemapFiles,
  type BuildSitemapOptions,
  type BuildSitemapResult,
} from "./build-sitemap.js";
