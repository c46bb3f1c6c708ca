import { load } from "cheerio";
import { collapseWhitespace } from "./normalize";
import { isStrictlyUnder, resolveUrl } from "./url";

export interface CategoryLink {
  name: string;
  url: string;
}

/**
 * Category links on the site root: anchors pointing below `prefixUrl` with visible
 * text. Duplicate URLs keep the first label seen.
 */
export function extractCategoryLinks(html: string, pageUrl: string, prefixUrl: string): CategoryLink[] {
  const $ = load(html);
  const categories = new Map<string, CategoryLink>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (typeof href !== "string") {
      return;
    }
    const url = resolveUrl(href, pageUrl);
    if (!url || !isStrictlyUnder(url, prefixUrl) || categories.has(url)) {
      return;
    }
    const name = collapseWhitespace($(element).text());
    if (name) {
      categories.set(url, { name, url });
    }
  });

  return [...categories.values()];
}

/** Page 1 is the category URL itself; page N is `<category>/page/N/`. */
export function categoryPageUrl(categoryUrl: string, page: number): string {
  if (page <= 1) {
    return categoryUrl;
  }
  return `${categoryUrl.replace(/\/+$/, "")}/page/${page}/`;
}

export function extractProductLinks(html: string, pageUrl: string, selector: string): string[] {
  const $ = load(html);
  const links: string[] = [];
  $(selector).each((_, element) => {
    const href = $(element).attr("href");
    const url = typeof href === "string" ? resolveUrl(href, pageUrl) : null;
    if (url) {
      links.push(url);
    }
  });
  return links;
}
