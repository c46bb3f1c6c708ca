import { normalizeUrl } from "./url";

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function asNonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Reduces a displayed price to digits with at most one decimal point.
 * "Rs. 125,000.00" -> "125000.00"; text without digits -> "".
 * Applying it twice gives the same result as applying it once.
 */
export function normalizePrice(raw: string): string {
  // a dot right after a letter closes an abbreviation ("Rs."), not a number
  const stripped = raw.replace(/(?<=[\p{L}\p{M}])\./gu, "").replace(/[^\d.]/g, "");
  const lastDot = stripped.lastIndexOf(".");
  const singlePoint =
    lastDot === -1 ? stripped : `${stripped.slice(0, lastDot).replace(/\./g, "")}.${stripped.slice(lastDot + 1)}`;
  const trimmed = singlePoint.replace(/\.$/, "").replace(/^\./, "0.");
  return /\d/.test(trimmed) ? trimmed : "";
}

export interface BrandSplit {
  brand?: string;
  categoryPath: string[];
}

/** First label in the brand vocabulary becomes the brand; every label equal to it (any case) is dropped from the path. */
export function splitBrandAndCategories(labels: readonly string[], knownBrands: readonly string[]): BrandSplit {
  const vocabulary = new Set(knownBrands.map((brand) => brand.toLowerCase()));
  const cleaned = labels.map((label) => collapseWhitespace(label)).filter((label) => label.length > 0);
  const brand = cleaned.find((label) => vocabulary.has(label.toLowerCase()));

  if (!brand) {
    return { categoryPath: cleaned };
  }

  const brandKey = brand.toLowerCase();
  return {
    brand,
    categoryPath: cleaned.filter((label) => label.toLowerCase() !== brandKey)
  };
}

/** "2-Year-warranty" -> "2 Year Warranty" */
export function formatWarrantyLabel(raw: string): string | undefined {
  const words = raw
    .split(/[-_\s]+/)
    .map((word) => word.trim())
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1));
  return words.length > 0 ? words.join(" ") : undefined;
}

export function findLineContaining(text: string, keyword: string): string | undefined {
  const needle = keyword.toLowerCase();
  for (const line of text.split(/\r?\n/)) {
    const trimmed = collapseWhitespace(line);
    if (trimmed && trimmed.toLowerCase().includes(needle)) {
      return trimmed;
    }
  }
  return undefined;
}

/** Parses `key: value` lines; the first colon splits, later ones stay in the value. Later keys overwrite earlier ones. */
export function parseSpecificationLines(text: string): Record<string, string> {
  const entries = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const separator = line.indexOf(":");
    if (separator === -1) {
      continue;
    }
    const key = collapseWhitespace(line.slice(0, separator));
    const value = collapseWhitespace(line.slice(separator + 1));
    if (key) {
      entries.set(key, value);
    }
  }
  return Object.fromEntries(entries);
}

export function extractNativeId(elementId: string | undefined, pattern: string | undefined): string | undefined {
  const id = asNonEmpty(elementId);
  if (!id) {
    return undefined;
  }
  if (!pattern) {
    return asNonEmpty(id.split("-").at(-1));
  }
  const match = id.match(new RegExp(pattern));
  return asNonEmpty(match?.[1]);
}

export function deriveIdentifier(nativeId: string | undefined, pageUrl: string): string {
  return nativeId ?? normalizeUrl(pageUrl) ?? pageUrl;
}
