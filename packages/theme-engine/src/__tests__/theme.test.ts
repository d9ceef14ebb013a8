/**
 * Theme loader tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import {
  BUILTIN_THEMES_DIR,
  ThemeAccumulator,
  getThemesDirectory,
  loadTheme,
  templateNameOf,
} from "../theme.js";
import { CaseInsensitiveMap } from "../case-insensitive-map.js";
import { CircularThemeError, ThemeNotFoundError, ThemeValidationError } from "../errors.js";

describe("loadTheme", () => {
  let tempDir: string;

  /** Write a theme declaration and its files under `<tempDir>/<format>/<id>/` */
  async function writeTheme(
    id: string,
    declaration: Record<string, unknown>,
    files: string[] = [],
    format = "html",
  ): Promise<string> {
    const directory = path.join(tempDir, format, id);
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(path.join(directory, "theme.json"), JSON.stringify(declaration));
    for (const file of files) {
      await fs.mkdir(path.dirname(path.join(directory, file)), { recursive: true });
      await fs.writeFile(path.join(directory, file), `/* ${id}/${file} */`);
    }
    return directory;
  }

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "theme-loader-test-")));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should load a theme without a base as declared", async () => {
    const dir = await writeTheme(
      "solo",
      {
        metadata: { name: "Solo", version: "2.0.0" },
        templates: ["templates/"],
        scripts: { source: ["js/app"], targetPath: "app.js" },
        assets: ["images/*"],
        parameters: { title: { type: "string", defaultValue: "Solo" } },
      },
      ["templates/page.hbs", "templates/notes.txt", "js/app.js", "images/a.png"],
    );

    const theme = await loadTheme("solo", { themesDir: tempDir });

    expect(theme.id).toBe("solo");
    expect(theme.chain).toEqual(["solo"]);
    expect(theme.metadata).toEqual({ name: "Solo", version: "2.0.0" });
    expect(theme.templates.toJSON()).toEqual({ page: path.join(dir, "templates/page.hbs") });
    expect(theme.scripts.toJSON()).toEqual({ "app.js": [path.join(dir, "js/app.js")] });
    expect(theme.styles.size).toBe(0);
    expect(theme.assets.toJSON()).toEqual({ "images/a.png": path.join(dir, "images/a.png") });
    expect(theme.parameters.toJSON()).toEqual({ title: { type: "string", defaultValue: "Solo" } });
    expect(Object.isFrozen(theme)).toBe(true);
  });

  it("should prefer the derived theme's templates", async () => {
    const child = await writeTheme("child", { base: "parent", templates: ["templates/"] }, [
      "templates/page.hbs",
      "templates/Layout.hbs",
    ]);
    const parent = await writeTheme("parent", { templates: ["templates/"] }, [
      "templates/page.hbs",
      "templates/layout.hbs",
      "templates/footer.hbs",
    ]);

    const theme = await loadTheme("child", { themesDir: tempDir });

    expect(theme.templates.get("page")).toBe(path.join(child, "templates/page.hbs"));
    expect(theme.templates.get("layout")).toBe(path.join(child, "templates/Layout.hbs"));
    expect(theme.templates.get("footer")).toBe(path.join(parent, "templates/footer.hbs"));
    expect(theme.templates.size).toBe(3);
  });

  it("should place the derived theme's files first in a shared bundle", async () => {
    const child = await writeTheme(
      "child",
      { base: "parent", scripts: { source: ["js/"], targetPath: "app.js" } },
      ["js/child.js"],
    );
    const parent = await writeTheme(
      "parent",
      { scripts: { source: ["js/shared", "js/"], targetPath: "APP.js" } },
      ["js/parent.js", "js/shared.js"],
    );

    const theme = await loadTheme("child", { themesDir: tempDir });

    expect([...theme.scripts.keys()]).toEqual(["app.js"]);
    expect(theme.scripts.get("app.js")).toEqual([
      path.join(child, "js/child.js"),
      path.join(parent, "js/shared.js"),
      path.join(parent, "js/parent.js"),
    ]);
  });

  it("should keep bundles with different targets apart", async () => {
    const child = await writeTheme(
      "child",
      { base: "parent", styles: { source: ["css/"], targetPath: "child.css" } },
      ["css/child.css"],
    );
    const parent = await writeTheme(
      "parent",
      { styles: { source: ["css/"], targetPath: "parent.css" } },
      ["css/parent.css"],
    );

    const theme = await loadTheme("child", { themesDir: tempDir });

    expect(theme.styles.toJSON()).toEqual({
      "child.css": [path.join(child, "css/child.css")],
      "parent.css": [path.join(parent, "css/parent.css")],
    });
  });

  it("should order bundles by target path regardless of which theme declared them", async () => {
    const child = await writeTheme(
      "child",
      { base: "parent", scripts: { source: ["z.js"], targetPath: "z.js" } },
      ["z.js"],
    );
    const parent = await writeTheme(
      "parent",
      { scripts: { source: ["app.js"], targetPath: "App.js" } },
      ["app.js"],
    );

    const theme = await loadTheme("child", { themesDir: tempDir });

    expect([...theme.scripts.keys()]).toEqual(["App.js", "z.js"]);
    expect(theme.scripts.toJSON()).toEqual({
      "App.js": [path.join(parent, "app.js")],
      "z.js": [path.join(child, "z.js")],
    });
  });

  it("should accumulate a bundle along a three-theme chain", async () => {
    const a = await writeTheme("A", { scripts: { source: ["a.js"], targetPath: "app.js" } }, ["a.js"]);
    const b = await writeTheme("B", { base: "A", scripts: { source: ["b.js"], targetPath: "app.js" } }, [
      "b.js",
    ]);
    const c = await writeTheme("C", { base: "B", scripts: { source: ["c.js"], targetPath: "app.js" } }, [
      "c.js",
    ]);

    const theme = await loadTheme("C", { themesDir: tempDir });

    expect(theme.chain).toEqual(["C", "B", "A"]);
    expect(theme.scripts.size).toBe(1);
    expect(theme.scripts.get("app.js")).toEqual([
      path.join(c, "c.js"),
      path.join(b, "b.js"),
      path.join(a, "a.js"),
    ]);
  });

  it("should keep only the derived theme's metadata", async () => {
    await writeTheme("child", { base: "parent" });
    await writeTheme("parent", { metadata: { name: "Parent" } });

    const theme = await loadTheme("child", { themesDir: tempDir });

    expect(theme.metadata).toBeUndefined();
  });

  it("should prefer the derived theme's parameters regardless of case", async () => {
    await writeTheme("child", {
      base: "parent",
      parameters: { Title: { type: "string", defaultValue: "Child" } },
    });
    await writeTheme("parent", {
      parameters: {
        title: { type: "string", defaultValue: "Parent" },
        color: { type: "string", defaultValue: "red" },
      },
    });

    const theme = await loadTheme("child", { themesDir: tempDir });

    expect([...theme.parameters.keys()]).toEqual(["Title", "color"]);
    expect(theme.parameters.get("title")?.defaultValue).toBe("Child");
  });

  it("should prefer the derived theme's assets", async () => {
    const child = await writeTheme("child", { base: "parent", assets: ["img/*"] }, ["img/logo.svg"]);
    const parent = await writeTheme("parent", { assets: ["img/*"] }, ["img/logo.svg", "img/bg.png"]);

    const theme = await loadTheme("child", { themesDir: tempDir });

    expect(theme.assets.toJSON()).toEqual({
      "img/logo.svg": path.join(child, "img/logo.svg"),
      "img/bg.png": path.join(parent, "img/bg.png"),
    });
  });

  it("should transform markdown parameter defaults", async () => {
    await writeTheme("docs", {
      parameters: { footer: { type: "markdown", defaultValue: "Built with **care**" } },
    });

    const html = await loadTheme("docs", { themesDir: tempDir });
    const custom = await loadTheme("docs", {
      themesDir: tempDir,
      transformMarkdown: (text) => text.toUpperCase(),
    });

    expect(html.parameters.get("footer")?.defaultValue).toBe(
      "<p>Built with <strong>care</strong></p>",
    );
    expect(custom.parameters.get("footer")?.defaultValue).toBe("BUILT WITH **CARE**");
  });

  it("should read themes of the convention's format", async () => {
    await writeTheme("wiki", { metadata: { format: "md" } }, [], "md");

    const theme = await loadTheme("wiki", { themesDir: tempDir, convention: "devops" });

    expect(theme.metadata).toEqual({ format: "md" });
    await expect(loadTheme("wiki", { themesDir: tempDir, convention: "docfx" })).rejects.toThrow(
      ThemeNotFoundError,
    );
  });

  it("should accept a path to a theme directory", async () => {
    const dir = await writeTheme("elsewhere", { metadata: { name: "Elsewhere" } });

    const theme = await loadTheme(dir);

    expect(theme.metadata?.name).toBe("Elsewhere");
  });

  it("should not let callers change a loaded theme", async () => {
    await writeTheme("locked", {
      parameters: {
        title: { type: "string", defaultValue: "Docs" },
        links: { type: "array", defaultValue: ["home"] },
        analytics: { type: "object", defaultValue: { site: "docs" } },
      },
    });

    const theme = await loadTheme("locked", { themesDir: tempDir });
    const title = theme.parameters.get("title");
    const links = theme.parameters.get("links")?.defaultValue;
    const analytics = theme.parameters.get("analytics")?.defaultValue;
    if (!title || !Array.isArray(links) || !analytics) throw new Error("expected the defaults");

    expect(() => {
      title.defaultValue = "overwritten";
    }).toThrow(TypeError);
    expect(() => links.push("injected")).toThrow(TypeError);
    expect(Object.isFrozen(analytics)).toBe(true);
    expect(theme.parameters.get("title")?.defaultValue).toBe("Docs");
    expect(theme.parameters.get("links")?.defaultValue).toEqual(["home"]);
  });

  describe("circular bases", () => {
    it("should reject a cycle by default", async () => {
      await writeTheme("X", { base: "Y" });
      await writeTheme("Y", { base: "X" });

      await expect(loadTheme("X", { themesDir: tempDir })).rejects.toThrow(CircularThemeError);
      await expect(loadTheme("X", { themesDir: tempDir })).rejects.toThrow(
        "Theme inheritance is circular: X -> Y -> X",
      );
    });

    it("should reject a theme naming itself as base", async () => {
      await writeTheme("X", { base: "X" });

      await expect(loadTheme("X", { themesDir: tempDir })).rejects.toThrow(
        "Theme inheritance is circular: X -> X",
      );
    });

    it("should stop at the repeated theme when ignoring cycles", async () => {
      await writeTheme("X", { base: "Y", parameters: { a: { type: "number", defaultValue: 1 } } });
      await writeTheme("Y", { base: "X", parameters: { a: { type: "number", defaultValue: 2 } } });

      const theme = await loadTheme("X", { themesDir: tempDir, onCircularBase: "ignore" });

      expect(theme.chain).toEqual(["X", "Y"]);
      expect(theme.parameters.get("a")?.defaultValue).toBe(1);
    });
  });

  describe("failures", () => {
    it("should reject a blank name", async () => {
      await expect(loadTheme("  ")).rejects.toThrow("A theme name is required");
    });

    it("should report a missing theme directory", async () => {
      const expected = path.join(tempDir, "html", "nope");

      await expect(loadTheme("nope", { themesDir: tempDir })).rejects.toThrow(
        `Theme directory could not be found: ${expected}`,
      );
    });

    it("should report a missing base theme", async () => {
      await writeTheme("orphan", { base: "gone" });

      await expect(loadTheme("orphan", { themesDir: tempDir })).rejects.toThrow(ThemeNotFoundError);
    });

    it("should report a directory without a declaration", async () => {
      await fs.mkdir(path.join(tempDir, "html", "empty"), { recursive: true });
      const expected = path.join(tempDir, "html", "empty", "theme.json");

      await expect(loadTheme("empty", { themesDir: tempDir })).rejects.toThrow(
        `Theme file could not be found: ${expected}`,
      );
    });

    it("should report an invalid ancestor declaration", async () => {
      await writeTheme("child", { base: "parent" });
      await writeTheme("parent", { parameters: { depth: { type: "number", defaultValue: "deep" } } });

      await expect(loadTheme("child", { themesDir: tempDir })).rejects.toThrow(ThemeValidationError);
    });
  });
});

describe("built-in themes", () => {
  it("should resolve modern on top of classic", async () => {
    const theme = await loadTheme("modern");
    const html = path.join(BUILTIN_THEMES_DIR, "html");
    const modern = path.join(html, "modern");
    const classic = path.join(html, "classic");

    expect(theme.chain).toEqual(["modern", "classic"]);
    expect(theme.metadata?.name).toBe("Modern");
    expect(theme.templates.toJSON()).toEqual({
      header: path.join(modern, "templates/header.hbs"),
      page: path.join(classic, "templates/page.hbs"),
    });
    expect(theme.scripts.toJSON()).toEqual({
      "js/site.js": [
        path.join(classic, "scripts/utils.js"),
        path.join(classic, "scripts/site-navigation.js"),
        path.join(classic, "scripts/main.js"),
      ],
    });
    expect(theme.styles.toJSON()).toEqual({
      "css/site.css": [
        path.join(modern, "styles/palette.css"),
        path.join(classic, "styles/layout.css"),
        path.join(classic, "styles/typography.css"),
      ],
    });
    expect([...theme.assets.keys()]).toEqual(["assets/images/logo.svg"]);
    expect([...theme.parameters.keys()]).toEqual([
      "siteTitle",
      "accentColor",
      "footer",
      "navigationDepth",
      "darkMode",
      "logo",
      "headerLinks",
      "analytics",
    ]);
    expect(theme.parameters.get("siteTitle")?.defaultValue).toBe("Reference");
    expect(theme.parameters.get("footer")?.defaultValue).toBe("<p>Generated by {{generator}}</p>");
  });

  it("should resolve the markdown classic theme for devops", async () => {
    const theme = await loadTheme("classic", { convention: "devops" });

    expect(theme.metadata?.format).toBe("md");
    expect([...theme.templates.keys()]).toEqual(["page"]);
    expect(theme.scripts.size).toBe(0);
    expect(theme.parameters.get("footer")).toEqual({
      type: "markdown",
      description: "Text appended to every page.",
    });
  });
});

describe("ThemeAccumulator", () => {
  it("should keep built themes apart from later merges", () => {
    const accumulator = new ThemeAccumulator("partial");
    const theme = accumulator.build();

    accumulator.parameters.set("late", { type: "string" });
    accumulator.scripts.set("late.js", ["/themes/late.js"]);

    expect(theme.parameters.has("late")).toBe(false);
    expect(theme.scripts.size).toBe(0);
  });

  it("should hand out frozen maps", () => {
    const { templates } = new ThemeAccumulator("partial").build();

    expect(templates).toBeInstanceOf(CaseInsensitiveMap);
    if (!(templates instanceof CaseInsensitiveMap)) return;
    expect(() => templates.set("page", "/themes/page.hbs")).toThrow(
      "Cannot set 'page' on a frozen map",
    );
  });
});

describe("helpers", () => {
  it("should name templates by file name without extension", () => {
    expect(templateNameOf("/themes/html/classic/partials/header.hbs")).toBe("header");
  });

  it("should resolve the themes directory of a convention", () => {
    expect(getThemesDirectory({ themesDir: "/srv/themes", convention: "devops" })).toBe(
      path.resolve("/srv/themes", "md"),
    );
    expect(getThemesDirectory({ themesDir: "/srv/themes" })).toBe(path.resolve("/srv/themes", "html"));
  });
});
