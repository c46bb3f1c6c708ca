import assert from "node:assert/strict";
import test from "node:test";
import { FetchLike, HttpClient } from "../lib/http";
import { createFakeFetch, listingPage, noSleep, sitemapIndex, urlSet } from "../testing/fixtures";
import { PaginationDiscoverer, SitemapDiscoverer } from "./discovery";

const BASE = "https://shop.example.lk";
const CATEGORY = `${BASE}/index.php/product-category`;
const product = (slug: string): string => `${BASE}/product/${slug}/`;

function httpClient(fetchImpl: FetchLike, maxRetries = 2): HttpClient {
  return new HttpClient({
    maxConcurrentFetches: 3,
    maxRetries,
    timeoutMs: 1000,
    retryBaseDelayMs: 10,
    userAgent: "test-agent/1.0",
    fetchImpl,
    sleep: noSleep
  });
}

function paginationDiscoverer(fetchImpl: FetchLike, maxPagesPerCategory = 200): PaginationDiscoverer {
  return new PaginationDiscoverer({
    http: httpClient(fetchImpl),
    baseUrl: BASE,
    categoryPathPrefix: "/index.php/product-category/",
    productLinkSelector: "a.woocommerce-LoopProduct-link",
    maxPagesPerCategory,
    categoryConcurrency: 2
  });
}

const rootPage = `<html><body><nav>
  <a href="/index.php/product-category/laptops/">Laptops</a>
  <a href="/index.php/product-category/">All categories</a>
  <a href="/index.php/product-category/monitors/"> Monitors </a>
  <a href="/index.php/product-category/laptops/">Laptops (again)</a>
  <a href="/about-us/">About</a>
</nav></body></html>`;

test("pagination walks each category until an empty page or a 404", async () => {
  const { fetchImpl, requested } = createFakeFetch({
    [BASE]: rootPage,
    [`${CATEGORY}/laptops/`]: listingPage([product("a"), product("b")]),
    [`${CATEGORY}/laptops/page/2/`]: listingPage([product("c")]),
    [`${CATEGORY}/laptops/page/3/`]: listingPage([product("d")]),
    [`${CATEGORY}/laptops/page/4/`]: listingPage([]),
    [`${CATEGORY}/monitors/`]: listingPage([product("b"), product("e")])
  });

  const result = await paginationDiscoverer(fetchImpl).discover();

  assert.equal(result.strategy, "pagination");
  assert.equal(result.rootReachable, true);
  assert.deepEqual(result.tasks, [
    { url: product("a"), contextLabel: "Laptops" },
    { url: product("b"), contextLabel: "Laptops" },
    { url: product("c"), contextLabel: "Laptops" },
    { url: product("d"), contextLabel: "Laptops" },
    { url: product("e"), contextLabel: "Monitors" }
  ]);
  assert.deepEqual(result.metrics, { categories: 2, category_pages: 5, failed_categories: 0, product_urls: 5 });

  assert.equal(requested.includes(`${CATEGORY}/laptops/page/4/`), true);
  assert.equal(requested.includes(`${CATEGORY}/laptops/page/5/`), false);
  assert.equal(requested.filter((url) => url === `${CATEGORY}/monitors/page/2/`).length, 1);
  assert.equal(requested.includes(`${CATEGORY}/`), false);
});

test("pagination stops at the per-category page cap", async () => {
  const { fetchImpl, requested } = createFakeFetch({
    [BASE]: `<a href="/index.php/product-category/desktops/">Desktops</a>`,
    [`${CATEGORY}/desktops/`]: listingPage([product("x")]),
    [`${CATEGORY}/desktops/page/2/`]: listingPage([product("y")]),
    [`${CATEGORY}/desktops/page/3/`]: listingPage([product("z")])
  });

  const result = await paginationDiscoverer(fetchImpl, 2).discover();

  assert.deepEqual(
    result.tasks.map((task) => task.url),
    [product("x"), product("y")]
  );
  assert.equal(requested.includes(`${CATEGORY}/desktops/page/3/`), false);
});

test("a category page that keeps failing ends that category and is counted", async () => {
  const { fetchImpl, requested } = createFakeFetch({
    [BASE]: `<a href="/index.php/product-category/tablets/">Tablets</a>`,
    [`${CATEGORY}/tablets/`]: listingPage([product("t1")]),
    [`${CATEGORY}/tablets/page/2/`]: { status: 500 },
    [`${CATEGORY}/tablets/page/3/`]: listingPage([product("t3")])
  });

  const result = await paginationDiscoverer(fetchImpl).discover();

  assert.deepEqual(result.tasks, [{ url: product("t1"), contextLabel: "Tablets" }]);
  assert.deepEqual(result.metrics, { categories: 1, category_pages: 1, failed_categories: 1, product_urls: 1 });
  assert.equal(requested.filter((url) => url === `${CATEGORY}/tablets/page/2/`).length, 3);
  assert.equal(requested.includes(`${CATEGORY}/tablets/page/3/`), false);
});

test("an unreachable site root yields an empty pagination result", async () => {
  const { fetchImpl } = createFakeFetch({ [BASE]: { status: 500 } });

  const result = await paginationDiscoverer(fetchImpl).discover();

  assert.deepEqual(result, { strategy: "pagination", rootReachable: false, tasks: [], metrics: {} });
});

test("sitemap discovery unions the product sitemaps by exact URL", async () => {
  const { fetchImpl, requested } = createFakeFetch({
    [`${BASE}/sitemap_index.xml`]: sitemapIndex([
      `${BASE}/product-sitemap.xml`,
      `${BASE}/product-sitemap2.xml`,
      `${BASE}/page-sitemap.xml`
    ]),
    [`${BASE}/product-sitemap.xml`]: urlSet([product("a"), product("b")]),
    [`${BASE}/product-sitemap2.xml`]: urlSet([product("b"), product("c")])
  });

  const result = await new SitemapDiscoverer({
    http: httpClient(fetchImpl),
    sitemapIndexUrl: `${BASE}/sitemap_index.xml`,
    productSitemapPattern: "product-sitemap"
  }).discover();

  assert.equal(result.rootReachable, true);
  assert.deepEqual(result.tasks, [{ url: product("a") }, { url: product("b") }, { url: product("c") }]);
  assert.deepEqual(result.metrics, { product_sitemaps: 2, failed_sitemaps: 0, leaf_urls: 3 });
  assert.equal(requested.includes(`${BASE}/page-sitemap.xml`), false);
});

test("a nested sitemap that cannot be fetched is skipped and counted", async () => {
  const { fetchImpl } = createFakeFetch({
    [`${BASE}/sitemap_index.xml`]: sitemapIndex([`${BASE}/product-sitemap.xml`, `${BASE}/product-sitemap2.xml`]),
    [`${BASE}/product-sitemap2.xml`]: urlSet([product("c")])
  });

  const result = await new SitemapDiscoverer({
    http: httpClient(fetchImpl, 0),
    sitemapIndexUrl: `${BASE}/sitemap_index.xml`,
    productSitemapPattern: "product-sitemap"
  }).discover();

  assert.deepEqual(result.tasks, [{ url: product("c") }]);
  assert.deepEqual(result.metrics, { product_sitemaps: 2, failed_sitemaps: 1, leaf_urls: 1 });
});

test("an unreachable sitemap index yields an empty result", async () => {
  const { fetchImpl } = createFakeFetch({
    [`${BASE}/sitemap_index.xml`]: { error: new TypeError("fetch failed") }
  });

  const result = await new SitemapDiscoverer({
    http: httpClient(fetchImpl, 1),
    sitemapIndexUrl: `${BASE}/sitemap_index.xml`,
    productSitemapPattern: "product-sitemap"
  }).discover();

  assert.deepEqual(result, { strategy: "sitemap", rootReachable: false, tasks: [], metrics: {} });
});
