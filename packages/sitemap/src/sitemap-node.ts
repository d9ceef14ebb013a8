/**
 * Sitemap Node
 *
 * One entry of the navigation tree. A node is a page (it has a url), a
 * group (it has items), or both; a node that is neither cannot be built.
 */

import type { SitemapNodeJson } from "@apisite/site-schema";

export class SitemapNode {
  readonly title: string;

  /** Site-root-relative page address; "" addresses the site root */
  readonly url?: string;

  readonly items?: readonly SitemapNode[];

  private constructor(title: string, url: string | undefined, items: readonly SitemapNode[] | undefined) {
    if (!title.trim()) {
      throw new TypeError("A sitemap node requires a title");
    }
    if (url === undefined && items === undefined) {
      throw new TypeError(`Sitemap node '${title}' has neither a url nor items`);
    }
    this.title = title;
    this.url = url;
    this.items = items ? Object.freeze([...items]) : undefined;
  }

  /**
   * Create a page node. Children are dropped from the output when empty.
   */
  static page(title: string, url: string, children: readonly SitemapNode[] = []): SitemapNode {
    return new SitemapNode(title, url, children.length > 0 ? children : undefined);
  }

  /**
   * Create a group node that has no page of its own.
   */
  static group(title: string, children: readonly SitemapNode[]): SitemapNode {
    return new SitemapNode(title, undefined, children);
  }

  /** Number of nodes with a page in this subtree, this node included. */
  get pageCount(): number {
    let count = this.url !== undefined ? 1 : 0;
    for (const item of this.items ?? []) {
      count += item.pageCount;
    }
    return count;
  }

  toJSON(): SitemapNodeJson {
    const json: SitemapNodeJson = { title: this.title };
    if (this.url !== undefined) json.url = this.url;
    if (this.items !== undefined) json.items = this.items.map((item) => item.toJSON());
    return json;
  }

  toString(): string {
    return this.title;
  }
}
