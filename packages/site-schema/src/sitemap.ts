/**
 * Sitemap Schema
 *
 * The serialized navigation tree. Theme scripts read this shape directly,
 * so it must stay stable.
 */

/**
 * A serialized sitemap node.
 *
 * `url` is omitted on pure group nodes and `items` is omitted on leaf pages.
 */
export interface SitemapNodeJson {
  /** Display title */
  title: string;

  /** Site-root-relative page address, without fragment */
  url?: string;

  /** Child nodes */
  items?: SitemapNodeJson[];
}

/**
 * Titles of the fixed navigation groups.
 */
export const GROUP_TITLES = {
  api: "API",
  topics: "Topics",
  constructors: "Constructors",
  fields: "Fields",
  properties: "Properties",
  methods: "Methods",
  events: "Events",
  operators: "Operators",
  explicitInterfaceImplementations: "Explicit Interface Implementations",
} as const;

/** Title of a member navigation group */
export type MemberGroupTitle = Exclude<
  (typeof GROUP_TITLES)[keyof typeof GROUP_TITLES],
  typeof GROUP_TITLES.api | typeof GROUP_TITLES.topics
>;
