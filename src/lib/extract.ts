import { type Cheerio, type CheerioAPI, load } from "cheerio";
import type { AnyNode } from "domhandler";
import {
  ExtractionPolicy,
  ExtractionRule,
  ProductRecord,
  ProductRecordSchema,
  RunMetadata,
  ScalarField
} from "../types";
import {
  asNonEmpty,
  collapseWhitespace,
  deriveIdentifier,
  extractNativeId,
  findLineContaining,
  formatWarrantyLabel,
  normalizePrice,
  parseSpecificationLines,
  splitBrandAndCategories
} from "./normalize";
import { resolveUrl } from "./url";
import { formatZodIssues } from "./validation";

export type ExtractionFailureReason = "no_container" | "malformed" | "invalid_record";

export interface ExtractionSuccess {
  ok: true;
  record: ProductRecord;
  /** Optional fields whose whole fallback chain came up empty. */
  missingFields: string[];
}

export interface ExtractionFailure {
  ok: false;
  reason: ExtractionFailureReason;
  message?: string;
}

export type ExtractionOutcome = ExtractionSuccess | ExtractionFailure;

export interface ExtractContext {
  /** Category label the URL was discovered under, when the discoverer knows one. */
  contextLabel?: string;
}

export interface ProductExtractorOptions {
  policy: ExtractionPolicy;
  currency: string;
  runMetadata: RunMetadata;
}

interface PageScope {
  $: CheerioAPI;
  container: Cheerio<AnyNode>;
}

function select(scope: PageScope, rule: ExtractionRule): Cheerio<AnyNode> {
  return rule.scope === "document" ? scope.$(rule.selector) : scope.container.find(rule.selector);
}

function readRule(scope: PageScope, rule: ExtractionRule): string | undefined {
  const node = select(scope, rule).first();
  if (node.length === 0) {
    return undefined;
  }

  if (rule.attribute) {
    return asNonEmpty(node.attr(rule.attribute));
  }
  if (rule.mode === "html") {
    // an empty wrapper does not count as a description
    if (!collapseWhitespace(node.text())) {
      return undefined;
    }
    return asNonEmpty(scope.$.html(node));
  }
  return asNonEmpty(collapseWhitespace(node.text()));
}

/** Tries each rule in order and returns the first non-empty value. */
function firstMatch(scope: PageScope, rules: readonly ExtractionRule[]): string | undefined {
  for (const rule of rules) {
    const value = readRule(scope, rule);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function readAll(scope: PageScope, rule: ExtractionRule): string[] {
  const values: string[] = [];
  select(scope, rule).each((_, element) => {
    const node = scope.$(element);
    const value = rule.attribute ? node.attr(rule.attribute) : collapseWhitespace(node.text());
    const text = asNonEmpty(value);
    if (text) {
      values.push(text);
    }
  });
  return values;
}

function extractImages(scope: PageScope, rules: readonly ExtractionRule[], pageUrl: string): string[] {
  for (const rule of rules) {
    const seen = new Set<string>();
    const images: string[] = [];
    for (const candidate of readAll(scope, rule)) {
      const absolute = resolveUrl(candidate, pageUrl);
      if (absolute && !seen.has(absolute)) {
        seen.add(absolute);
        images.push(absolute);
      }
    }
    if (images.length > 0) {
      return images;
    }
  }
  return [];
}

function extractWarranty(scope: PageScope, policy: ExtractionPolicy): string | undefined {
  const keyword = policy.warranty.keyword.toLowerCase();
  let fromImage: string | undefined;

  scope.container.find(policy.warranty.imageSelector).each((_, element) => {
    const alt = scope.$(element).attr("alt") ?? "";
    if (alt.toLowerCase().includes(keyword)) {
      fromImage = formatWarrantyLabel(alt);
      return false;
    }
    return undefined;
  });
  if (fromImage) {
    return fromImage;
  }

  // page text without script, style and template contents
  const copy = load(scope.$.html());
  copy("script, style, noscript, template").remove();
  const body = copy("body");
  const pageText = body.length > 0 ? body.text() : copy.root().text();
  return findLineContaining(pageText, keyword);
}

function extractSpecifications(scope: PageScope, policy: ExtractionPolicy): Record<string, string> {
  const { tableSelector, rowSelector, headerSelector, valueSelector, blockSelector } = policy.specifications;
  const entries = new Map<string, string>();

  const table = scope.container.find(tableSelector).first();
  table.find(rowSelector).each((_, row) => {
    const header = scope.$(row).find(headerSelector).first();
    const value = scope.$(row).find(valueSelector).first();
    if (header.length === 0 || value.length === 0) {
      return;
    }
    const key = collapseWhitespace(header.text());
    if (key) {
      entries.set(key, collapseWhitespace(value.text()));
    }
  });
  if (entries.size > 0) {
    return Object.fromEntries(entries);
  }

  const block = scope.$(blockSelector).first();
  if (block.length === 0) {
    return {};
  }
  // give block-level children their own lines before reading the text
  block.find("br").replaceWith("\n");
  block.find("p, li, tr, div, h1, h2, h3, h4, h5, h6").after("\n");
  return parseSpecificationLines(block.text());
}

/**
 * Turns one product page into a record. The product container is the only hard
 * requirement; every other field degrades to absent when its rules find nothing.
 */
export class ProductExtractor {
  private readonly policy: ExtractionPolicy;

  constructor(private readonly options: ProductExtractorOptions) {
    this.policy = options.policy;
  }

  extract(html: string, pageUrl: string, context: ExtractContext = {}): ExtractionOutcome {
    try {
      return this.extractUnsafe(html, pageUrl, context);
    } catch (error) {
      return {
        ok: false,
        reason: "malformed",
        message: error instanceof Error ? error.message : String(error)
      };
    }
  }

  private extractUnsafe(html: string, pageUrl: string, context: ExtractContext): ExtractionOutcome {
    const $ = load(html);
    const container = $(this.policy.containerSelector).first();
    if (container.length === 0) {
      return { ok: false, reason: "no_container" };
    }

    const scope: PageScope = { $, container };
    const missingFields: string[] = [];
    const field = (name: ScalarField): string | undefined => {
      const value = firstMatch(scope, this.policy.fields[name]);
      if (value === undefined) {
        missingFields.push(name);
      }
      return value;
    };

    const title = field("title");
    const currentPriceText = field("priceCurrent");
    const originalPriceText = field("priceOriginal");
    const description = field("description");
    const rating = field("rating");

    const labels = container
      .find(this.policy.categoryLabelSelector)
      .toArray()
      .map((element) => $(element).text());
    const { brand, categoryPath } = splitBrandAndCategories(labels, this.policy.knownBrands);
    if (!brand) {
      missingFields.push("brand");
    }

    const warranty = extractWarranty(scope, this.policy);
    if (!warranty) {
      missingFields.push("warranty");
    }

    const specifications = extractSpecifications(scope, this.policy);
    const specificationsFound = Object.keys(specifications).length > 0;
    if (!specificationsFound) {
      missingFields.push("specifications");
    }

    const images = extractImages(scope, this.policy.images, pageUrl);
    const nativeId = extractNativeId(container.attr("id"), this.policy.nativeIdPattern);

    const record: ProductRecord = {
      identifier: deriveIdentifier(nativeId, pageUrl),
      sourceUrl: pageUrl,
      title,
      brand,
      categoryPath,
      // a page without a readable current price still gets a numeric field
      priceCurrent: normalizePrice(currentPriceText ?? "") || "0",
      priceOriginal: asNonEmpty(normalizePrice(originalPriceText ?? "")),
      currency: this.options.currency,
      availability: container.find(this.policy.outOfStockSelector).length > 0 ? "OutOfStock" : "InStock",
      warranty,
      description,
      specifications,
      specificationsFound,
      images,
      rating,
      discoveryContext: asNonEmpty(context.contextLabel),
      runMetadata: this.options.runMetadata
    };

    const validated = ProductRecordSchema.safeParse(record);
    if (!validated.success) {
      return {
        ok: false,
        reason: "invalid_record",
        message: formatZodIssues(validated.error)
      };
    }

    // return the built record, not the parsed copy, so runMetadata stays shared
    return { ok: true, record, missingFields };
  }
}
