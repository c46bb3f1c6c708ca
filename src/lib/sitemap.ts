import { XMLParser } from "fast-xml-parser";

export interface ParsedSitemap {
  sitemaps: string[];
  urls: string[];
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true
});

function asArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function asTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectLocs(container: unknown, childName: string): string[] {
  if (!isRecord(container)) {
    return [];
  }
  const locs: string[] = [];
  for (const node of asArray<unknown>(container[childName])) {
    if (isRecord(node)) {
      const loc = asTrimmedString(node.loc);
      if (loc) {
        locs.push(loc);
      }
    }
  }
  return locs;
}

/**
 * Reads `<sitemapindex><sitemap><loc>` and `<urlset><url><loc>` entries.
 * Unparseable documents yield empty lists.
 */
export function parseSitemapXml(xml: string): ParsedSitemap {
  try {
    const parsed: unknown = parser.parse(xml);
    if (!isRecord(parsed)) {
      return { sitemaps: [], urls: [] };
    }
    return {
      sitemaps: collectLocs(parsed.sitemapindex, "sitemap"),
      urls: collectLocs(parsed.urlset, "url")
    };
  } catch {
    return { sitemaps: [], urls: [] };
  }
}

export function selectProductSitemaps(sitemapUrls: readonly string[], pattern: string): string[] {
  return [...new Set(sitemapUrls.filter((url) => url.includes(pattern)))];
}

/** Union of leaf locations by exact string, in first-seen order. */
export function unionLeafUrls(documents: readonly string[]): string[] {
  const leaves = new Set<string>();
  for (const xml of documents) {
    for (const url of parseSitemapXml(xml).urls) {
      leaves.add(url);
    }
  }
  return [...leaves];
}
