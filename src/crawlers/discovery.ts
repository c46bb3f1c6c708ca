import { AppConfig, DiscoveryStrategy } from "../config";
import { HttpClient } from "../lib/http";
import { createQuietLogger, Logger } from "../lib/logger";
import { categoryPageUrl, CategoryLink, extractCategoryLinks, extractProductLinks } from "../lib/pagination";
import { mapLimit } from "../lib/pool";
import { parseSitemapXml, selectProductSitemaps, unionLeafUrls } from "../lib/sitemap";
import { joinUrl } from "../lib/url";
import { CrawlTask, ExtractionPolicy } from "../types";

const XML_ACCEPT = "application/xml,text/xml,*/*;q=0.8";

export interface DiscoveryResult {
  strategy: DiscoveryStrategy;
  /** False when the entry point (sitemap index or site root) could not be fetched. */
  rootReachable: boolean;
  tasks: CrawlTask[];
  metrics: Record<string, number>;
}

export interface UrlDiscoverer {
  readonly strategy: DiscoveryStrategy;
  discover(): Promise<DiscoveryResult>;
}

export interface SitemapDiscovererOptions {
  http: HttpClient;
  sitemapIndexUrl: string;
  productSitemapPattern: string;
  logger?: Logger;
}

export class SitemapDiscoverer implements UrlDiscoverer {
  readonly strategy = "sitemap" as const;
  private readonly logger: Logger;

  constructor(private readonly options: SitemapDiscovererOptions) {
    this.logger = options.logger ?? createQuietLogger("discovery.sitemap");
  }

  async discover(): Promise<DiscoveryResult> {
    const { http, sitemapIndexUrl, productSitemapPattern } = this.options;
    const index = await http.fetchText(sitemapIndexUrl, { accept: XML_ACCEPT });
    if (!index.ok) {
      this.logger.warn("sitemap_index_unreachable", {
        url: sitemapIndexUrl,
        kind: index.kind,
        status: index.status,
        attempts: index.attempts
      });
      return { strategy: this.strategy, rootReachable: false, tasks: [], metrics: {} };
    }

    const nested = selectProductSitemaps(parseSitemapXml(index.body).sitemaps, productSitemapPattern);
    this.logger.info("sitemap_index_loaded", { url: sitemapIndexUrl, product_sitemaps: nested.length });

    const outcomes = await Promise.all(nested.map((url) => http.fetchText(url, { accept: XML_ACCEPT })));
    const documents: string[] = [];
    let failedSitemaps = 0;
    for (const outcome of outcomes) {
      if (outcome.ok) {
        documents.push(outcome.body);
        continue;
      }
      failedSitemaps += 1;
      this.logger.warn("sitemap_fetch_failed", {
        url: outcome.url,
        kind: outcome.kind,
        status: outcome.status,
        attempts: outcome.attempts
      });
    }

    const tasks = unionLeafUrls(documents).map((url): CrawlTask => ({ url }));
    return {
      strategy: this.strategy,
      rootReachable: true,
      tasks,
      metrics: {
        product_sitemaps: nested.length,
        failed_sitemaps: failedSitemaps,
        leaf_urls: tasks.length
      }
    };
  }
}

export interface PaginationDiscovererOptions {
  http: HttpClient;
  baseUrl: string;
  categoryPathPrefix: string;
  productLinkSelector: string;
  maxPagesPerCategory: number;
  /** Categories walked at once; pages inside one category are always sequential. */
  categoryConcurrency: number;
  logger?: Logger;
}

type CategoryStop = "empty_page" | "not_found" | "fetch_failed" | "page_cap";

interface CategoryWalk {
  productUrls: string[];
  pagesFetched: number;
  stop: CategoryStop;
}

export class PaginationDiscoverer implements UrlDiscoverer {
  readonly strategy = "pagination" as const;
  private readonly logger: Logger;

  constructor(private readonly options: PaginationDiscovererOptions) {
    this.logger = options.logger ?? createQuietLogger("discovery.pagination");
  }

  async discover(): Promise<DiscoveryResult> {
    const { http, baseUrl, categoryPathPrefix, categoryConcurrency } = this.options;
    const root = await http.fetchText(baseUrl);
    if (!root.ok) {
      this.logger.warn("site_root_unreachable", {
        url: baseUrl,
        kind: root.kind,
        status: root.status,
        attempts: root.attempts
      });
      return { strategy: this.strategy, rootReachable: false, tasks: [], metrics: {} };
    }

    const categories = extractCategoryLinks(root.body, baseUrl, joinUrl(baseUrl, categoryPathPrefix));
    this.logger.info("categories_found", { url: baseUrl, categories: categories.length });

    const walks: CategoryWalk[] = new Array<CategoryWalk>(categories.length);
    await mapLimit(categories, categoryConcurrency, async (category, index) => {
      walks[index] = await this.walkCategory(category);
    });

    // merge in category order so the first category listing a product labels it
    const labels = new Map<string, string>();
    let pagesFetched = 0;
    let failedCategories = 0;
    categories.forEach((category, index) => {
      const walk = walks[index];
      pagesFetched += walk.pagesFetched;
      if (walk.stop === "fetch_failed") {
        failedCategories += 1;
      }
      for (const url of walk.productUrls) {
        if (!labels.has(url)) {
          labels.set(url, category.name);
        }
      }
    });

    const tasks = [...labels.entries()].map(([url, contextLabel]): CrawlTask => ({ url, contextLabel }));
    return {
      strategy: this.strategy,
      rootReachable: true,
      tasks,
      metrics: {
        categories: categories.length,
        category_pages: pagesFetched,
        failed_categories: failedCategories,
        product_urls: tasks.length
      }
    };
  }

  private async walkCategory(category: CategoryLink): Promise<CategoryWalk> {
    const { http, productLinkSelector, maxPagesPerCategory } = this.options;
    const productUrls: string[] = [];
    let pagesFetched = 0;

    for (let page = 1; page <= maxPagesPerCategory; page += 1) {
      const url = categoryPageUrl(category.url, page);
      const outcome = await http.fetchText(url, { terminalStatuses: [404] });
      if (!outcome.ok) {
        if (outcome.terminal) {
          this.logger.debug("category_exhausted", { category: category.name, page, reason: "not_found" });
          return { productUrls, pagesFetched, stop: "not_found" };
        }
        this.logger.warn("category_page_failed", {
          category: category.name,
          url,
          kind: outcome.kind,
          status: outcome.status,
          attempts: outcome.attempts
        });
        return { productUrls, pagesFetched, stop: "fetch_failed" };
      }

      pagesFetched += 1;
      const links = extractProductLinks(outcome.body, url, productLinkSelector);
      if (links.length === 0) {
        this.logger.debug("category_exhausted", { category: category.name, page, reason: "empty_page" });
        return { productUrls, pagesFetched, stop: "empty_page" };
      }
      productUrls.push(...links);
    }

    this.logger.warn("category_page_cap_reached", { category: category.name, max_pages: maxPagesPerCategory });
    return { productUrls, pagesFetched, stop: "page_cap" };
  }
}

export function createDiscoverer(
  config: AppConfig,
  policy: ExtractionPolicy,
  http: HttpClient,
  logger: Logger
): UrlDiscoverer {
  if (config.DISCOVERY_STRATEGY === "pagination") {
    return new PaginationDiscoverer({
      http,
      baseUrl: config.BASE_URL,
      categoryPathPrefix: config.CATEGORY_PATH_PREFIX,
      productLinkSelector: policy.productLinkSelector,
      maxPagesPerCategory: config.MAX_PAGES_PER_CATEGORY,
      categoryConcurrency: config.WORKER_POOL_SIZE,
      logger: logger.child("pagination")
    });
  }
  return new SitemapDiscoverer({
    http,
    sitemapIndexUrl: config.SITEMAP_INDEX_URL,
    productSitemapPattern: policy.productSitemapPattern,
    logger: logger.child("sitemap")
  });
}
