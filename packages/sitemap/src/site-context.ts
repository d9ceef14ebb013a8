/**
 * Site Context
 *
 * Run-scoped state shared by everything that renders one documentation site.
 * It is passed explicitly to page and topic renderers.
 */

import {
  granularityFor,
  type DocConvention,
  type DocumentationModel,
  type PageGranularity,
} from "@apisite/site-schema";
import { buildSitemap, type Sitemap } from "./sitemap.js";

export interface SiteContextOptions {
  /** Convention used to derive the page granularity (default "dotnet") */
  convention?: DocConvention;

  /** Explicit page granularity, overrides the convention's */
  granularity?: PageGranularity;

  /** Root URL of the site */
  baseUrl?: string;
}

export class SiteContext {
  readonly model: DocumentationModel;
  readonly convention: DocConvention;
  readonly granularity: PageGranularity;
  readonly baseUrl: string;
  private cachedSitemap?: Sitemap;

  constructor(model: DocumentationModel, options: SiteContextOptions = {}) {
    this.model = model;
    this.convention = options.convention ?? "dotnet";
    this.granularity = options.granularity ?? granularityFor(this.convention);
    this.baseUrl = options.baseUrl ?? "";
  }

  /**
   * The site's navigation tree, built on first access and reused afterwards.
   */
  get sitemap(): Sitemap {
    this.cachedSitemap ??= buildSitemap(this.model, {
      granularity: this.granularity,
      baseUrl: this.baseUrl,
    });
    return this.cachedSitemap;
  }
}
