import { z } from "zod";

export const AvailabilitySchema = z.enum(["InStock", "OutOfStock"]);

export const RunMetadataSchema = z.object({
  sourceSite: z.string().min(1),
  scrapeTimestamp: z.string().datetime({ offset: true }),
  contactPhone: z.string().min(1).optional(),
  contactWhatsapp: z.string().min(1).optional()
});

export const PRICE_PATTERN = /^\d+(\.\d+)?$/;

export const ProductRecordSchema = z.object({
  identifier: z.string().min(1),
  sourceUrl: z.string().url(),
  title: z.string().min(1).optional(),
  brand: z.string().min(1).optional(),
  categoryPath: z.array(z.string().min(1)),
  priceCurrent: z.string().regex(PRICE_PATTERN),
  priceOriginal: z.string().regex(PRICE_PATTERN).optional(),
  currency: z.string().min(1),
  availability: AvailabilitySchema,
  warranty: z.string().min(1).optional(),
  description: z.string().min(1).optional(),
  specifications: z.record(z.string()),
  specificationsFound: z.boolean(),
  images: z.array(z.string().url()),
  rating: z.string().min(1).optional(),
  discoveryContext: z.string().min(1).optional(),
  runMetadata: RunMetadataSchema
});

const SelectorSchema = z.string().trim().min(1);

export const ExtractionRuleSchema = z.object({
  selector: SelectorSchema,
  attribute: z.string().min(1).optional(),
  mode: z.enum(["text", "html"]).default("text"),
  scope: z.enum(["container", "document"]).default("container")
});

const RuleChainSchema = z.array(ExtractionRuleSchema).min(1);

export const ExtractionPolicySchema = z.object({
  name: z.string().min(1),
  containerSelector: SelectorSchema,
  nativeIdPattern: z.string().min(1).optional(),
  fields: z.object({
    title: RuleChainSchema,
    priceCurrent: RuleChainSchema,
    priceOriginal: RuleChainSchema,
    description: RuleChainSchema,
    rating: RuleChainSchema
  }),
  categoryLabelSelector: SelectorSchema,
  images: RuleChainSchema,
  outOfStockSelector: SelectorSchema,
  warranty: z.object({
    imageSelector: SelectorSchema,
    keyword: z.string().min(1)
  }),
  specifications: z.object({
    tableSelector: SelectorSchema,
    rowSelector: SelectorSchema.default("tr"),
    headerSelector: SelectorSchema.default("th"),
    valueSelector: SelectorSchema.default("td"),
    blockSelector: SelectorSchema
  }),
  knownBrands: z.array(z.string().trim().min(1)),
  productSitemapPattern: z.string().min(1),
  productLinkSelector: SelectorSchema
});

export type Availability = z.infer<typeof AvailabilitySchema>;
export type RunMetadata = z.infer<typeof RunMetadataSchema>;
export type ProductRecord = z.infer<typeof ProductRecordSchema>;
export type ExtractionRule = z.infer<typeof ExtractionRuleSchema>;
export type ExtractionPolicy = z.infer<typeof ExtractionPolicySchema>;
export type ScalarField = keyof ExtractionPolicy["fields"];

export interface CrawlTask {
  readonly url: string;
  readonly contextLabel?: string;
}

export interface RunSummary {
  totalProductsExtracted: number;
  extractionTimestamp: string;
  discoveryStrategy: string;
  rootReachable: boolean;
  discoveredUrls: number;
  skippedTasks: number;
  fetchFailures: number;
  extractionMisses: number;
  duplicatesDiscarded: number;
  stoppedEarly: boolean;
  durationMs: number;
}

export interface CrawlRun {
  records: ProductRecord[];
  summary: RunSummary;
}
