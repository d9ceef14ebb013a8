/**
 * Sitemap Builder
 *
 * Builds the navigation tree of a documentation site from its model: an
 * "API" node for the reference pages and a "Topics" node for the conceptual
 * pages. Namespaces, types and topics keep the order of the model.
 */

import {
  GROUP_TITLES,
  collectNamespaces,
  collectTypes,
  type DocumentationModel,
  type MemberModel,
  type NamespaceModel,
  type PageGranularity,
  type SitemapNodeJson,
  type TopicModel,
  type TypeModel,
} from "@apisite/site-schema";
import { groupMembers } from "./member-groups.js";
import { SitemapNode } from "./sitemap-node.js";
import { toNavigationUrl } from "./urls.js";

export interface SitemapOptions {
  /** Which elements have pages of their own */
  granularity: PageGranularity;

  /** Root URL of the site; page addresses under an absolute root become relative to it */
  baseUrl?: string;
}

/**
 * The navigation tree of a site.
 */
export class Sitemap implements Iterable<SitemapNode> {
  readonly baseUrl: string;
  readonly topNodes: readonly SitemapNode[];
  private cachedPageCount?: number;

  constructor(topNodes: readonly SitemapNode[], baseUrl = "") {
    this.topNodes = Object.freeze([...topNodes]);
    this.baseUrl = baseUrl;
  }

  /** Number of pages in the tree; seeds the progress total of a generation run. */
  get pageCount(): number {
    this.cachedPageCount ??= this.topNodes.reduce((sum, node) => sum + node.pageCount, 0);
    return this.cachedPageCount;
  }

  [Symbol.iterator](): Iterator<SitemapNode> {
    return this.topNodes[Symbol.iterator]();
  }

  toJSON(): SitemapNodeJson[] {
    return this.topNodes.map((node) => node.toJSON());
  }
}

class SitemapBuilder {
  constructor(
    private readonly granularity: PageGranularity,
    private readonly baseUrl: string,
  ) {}

  build(model: DocumentationModel): Sitemap {
    const nodes: SitemapNode[] = [];
    if (model.assemblies.length > 0) nodes.push(this.apiNode(model));
    if (model.topics.length > 0) nodes.push(this.topicsNode(model.topics));
    return new Sitemap(nodes, this.baseUrl);
  }

  private url(url: string): string {
    return toNavigationUrl(url, this.baseUrl);
  }

  private apiNode(model: DocumentationModel): SitemapNode {
    const children = this.granularity.namespacePages
      ? collectNamespaces(model.assemblies).map((ns) => this.namespaceNode(ns))
      : collectTypes(model.assemblies).map((type) => this.typeNode(type));
    return SitemapNode.group(GROUP_TITLES.api, children);
  }

  private namespaceNode(ns: NamespaceModel): SitemapNode {
    const types = this.granularity.typePages ? ns.types.map((type) => this.typeNode(type)) : [];
    return SitemapNode.page(ns.name, this.url(ns.url), types);
  }

  private typeNode(type: TypeModel): SitemapNode {
    const groups =
      this.granularity.memberPages && type.kind !== "enum" ? this.memberGroupNodes(type.members) : [];
    return SitemapNode.page(type.name, this.url(type.url), groups);
  }

  private memberGroupNodes(members: readonly MemberModel[]): SitemapNode[] {
    return groupMembers(members).map(({ title, members: entries }) => {
      const [representative] = entries;
      if (title === GROUP_TITLES.constructors && representative) {
        // constructors share one page, the group itself links to it
        return SitemapNode.page(title, this.url(representative.url));
      }
      return SitemapNode.group(
        title,
        entries.map((member) => SitemapNode.page(member.name, this.url(member.url))),
      );
    });
  }

  private topicsNode(topics: readonly TopicModel[]): SitemapNode {
    return SitemapNode.group(GROUP_TITLES.topics, this.topicNodes(topics));
  }

  private topicNodes(topics: readonly TopicModel[]): SitemapNode[] {
    return topics.map((topic) =>
      SitemapNode.page(topic.name, this.url(topic.url), this.topicNodes(topic.subtopics)),
    );
  }
}

/**
 * Build the sitemap of a documentation model.
 *
 * @example
 * const sitemap = buildSitemap(model, { granularity: granularityFor("docfx") });
 * console.log(sitemap.pageCount);
 */
export function buildSitemap(model: DocumentationModel, options: SitemapOptions): Sitemap {
  return new SitemapBuilder(options.granularity, options.baseUrl ?? "").build(model);
}
