import { describe, it, expect } from "vitest";
import { SitemapNode } from "../sitemap-node.js";

describe("SitemapNode", () => {
  it("should require a title", () => {
    expect(() => SitemapNode.page(" ", "index.html")).toThrow("A sitemap node requires a title");
    expect(() => SitemapNode.group("", [])).toThrow(TypeError);
  });

  it("should omit items of a page without children", () => {
    const node = SitemapNode.page("Widget", "api/Widget.html", []);

    expect(node.items).toBeUndefined();
    expect(node.toJSON()).toEqual({ title: "Widget", url: "api/Widget.html" });
  });

  it("should keep the items of an empty group", () => {
    const node = SitemapNode.group("API", []);

    expect(node.toJSON()).toEqual({ title: "API", items: [] });
    expect(node.pageCount).toBe(0);
  });

  it("should count pages at every depth", () => {
    const node = SitemapNode.group("Topics", [
      SitemapNode.page("Home", ""),
      SitemapNode.page("Guide", "guide.html", [
        SitemapNode.group("Extras", [SitemapNode.page("FAQ", "faq.html")]),
      ]),
    ]);

    expect(node.pageCount).toBe(3);
  });

  it("should serialize nested nodes", () => {
    const node = SitemapNode.page("Guide", "guide.html", [SitemapNode.page("Install", "install.html")]);

    expect(JSON.stringify(node)).toBe(
      '{"title":"Guide","url":"guide.html","items":[{"title":"Install","url":"install.html"}]}',
    );
    expect(String(node)).toBe("Guide");
  });
});
