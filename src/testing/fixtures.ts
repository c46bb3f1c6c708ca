import { FetchLike } from "../lib/http";

export interface ProductPageOptions {
  id?: number | string;
  title?: string;
  /** Inner HTML of `p.price`. */
  priceHtml?: string;
  categories?: string[];
  outOfStock?: boolean;
  warrantyAlt?: string;
  extraText?: string;
  specRows?: Array<[string, string]>;
  specBlock?: string;
  images?: string[];
}

export function productPage(options: ProductPageOptions = {}): string {
  const id = options.id ?? 101;
  const categories = (options.categories ?? ["Laptops", "Lenovo"])
    .map((label) => `<a href="/index.php/product-category/${label.toLowerCase()}/" rel="tag">${label}</a>`)
    .join(", ");
  const rows = (options.specRows ?? [])
    .map(([key, value]) => `<tr><th>${key}</th><td><p>${value}</p></td></tr>`)
    .join("");
  const images = (options.images ?? ["/wp-content/uploads/a.jpg"])
    .map((src) => `<div class="woocommerce-product-gallery__image"><a href="${src}"><img src="${src}-thumb" alt=""></a></div>`)
    .join("");

  return `<!doctype html>
<html>
<head><title>${options.title ?? "Product"}</title></head>
<body>
<div id="product-${id}" class="product type-product">
  <div class="woocommerce-product-gallery">${images}</div>
  <div class="summary entry-summary">
    ${options.title === undefined ? "" : `<h1 class="product_title entry-title">${options.title}</h1>`}
    ${options.priceHtml === undefined ? "" : `<p class="price">${options.priceHtml}</p>`}
    ${options.outOfStock ? `<p class="stock out-of-stock">Out of stock</p>` : `<p class="stock in-stock">In stock</p>`}
    ${options.warrantyAlt ? `<img src="/badges/w.png" alt="${options.warrantyAlt}">` : ""}
    <div class="product_meta"><span class="posted_in">Categories: ${categories}</span></div>
  </div>
  <div class="woocommerce-tabs">
    <div id="tab-description"><p>Thin and light.</p></div>
    ${rows ? `<table class="woocommerce-product-attributes shop_attributes">${rows}</table>` : ""}
    ${options.specBlock === undefined ? "" : `<div id="tab-specification">${options.specBlock}</div>`}
  </div>
</div>
${options.extraText ?? ""}
</body>
</html>`;
}

export function listingPage(productUrls: string[]): string {
  const items = productUrls
    .map((url) => `<li class="product"><a href="${url}" class="woocommerce-LoopProduct-link woocommerce-loop-product__link">Item</a></li>`)
    .join("");
  return `<html><body><ul class="products">${items}</ul></body></html>`;
}

export function sitemapIndex(locs: string[]): string {
  const entries = locs.map((loc) => `<sitemap><loc>${loc}</loc><lastmod>2024-05-01T10:00:00+00:00</lastmod></sitemap>`).join("");
  return `<?xml version="1.0" encoding="UTF-8"?><sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries}</sitemapindex>`;
}

export function urlSet(locs: string[]): string {
  const entries = locs.map((loc) => `<url><loc>${loc}</loc></url>`).join("");
  return `<?xml version="1.0" encoding="UTF-8"?><urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries}</urlset>`;
}

export interface FakeRoute {
  status?: number;
  body?: string;
  /** Throw instead of answering, to simulate a transport failure. */
  error?: Error;
}

/**
 * In-process stand-in for `fetch`: answers from a route table and records every
 * requested URL. Unknown URLs get a 404.
 */
export function createFakeFetch(routes: Record<string, string | FakeRoute>): { fetchImpl: FetchLike; requested: string[] } {
  const requested: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    requested.push(url);
    const route = routes[url];
    if (route === undefined) {
      return new Response("not found", { status: 404 });
    }
    if (typeof route === "string") {
      return new Response(route, { status: 200, headers: { "content-type": "text/html" } });
    }
    if (route.error) {
      throw route.error;
    }
    return new Response(route.body ?? "", { status: route.status ?? 200 });
  };
  return { fetchImpl, requested };
}

export const noSleep = async (): Promise<void> => undefined;
