import dotenv from "dotenv";
import { z } from "zod";
import { formatZodIssues } from "./lib/validation";

dotenv.config();

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().min(1).optional()
);

const optionalUrl = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().url().optional()
);

const optionalPositiveInt = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.coerce.number().int().positive().optional()
);

export const DiscoveryStrategySchema = z.enum(["sitemap", "pagination"]);

const EnvSchema = z.object({
  DISCOVERY_STRATEGY: DiscoveryStrategySchema.default("sitemap"),
  BASE_URL: z.string().url().default("https://www.laptop.lk"),
  SITEMAP_INDEX_URL: optionalUrl,
  CATEGORY_PATH_PREFIX: z.string().min(1).default("/index.php/product-category/"),
  MAX_CONCURRENT_FETCHES: z.coerce.number().int().positive().max(256).default(10),
  WORKER_POOL_SIZE: optionalPositiveInt,
  MAX_RETRIES: z.coerce.number().int().nonnegative().max(10).default(2),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(15),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  MAX_PAGES_PER_CATEGORY: z.coerce.number().int().positive().default(200),
  CRAWL_MAX_URLS: optionalPositiveInt,
  USER_AGENT: z
    .string()
    .min(1)
    .default("Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) CatalogCrawler/0.1"),
  SOURCE_SITE: z.string().min(1).default("laptop.lk"),
  CURRENCY: z.string().min(1).default("LKR"),
  CONTACT_PHONE: optionalNonEmptyString,
  CONTACT_WHATSAPP: optionalNonEmptyString,
  EXTRACTION_POLICY_PATH: optionalNonEmptyString,
  OUTPUT_FILE: z.string().min(1).default("output/catalog_products.json"),
  LOG_LEVEL: z.string().min(1).default("info")
});

export type DiscoveryStrategy = z.infer<typeof DiscoveryStrategySchema>;
export type AppEnv = z.infer<typeof EnvSchema>;

export interface AppConfig extends AppEnv {
  SITEMAP_INDEX_URL: string;
  WORKER_POOL_SIZE: number;
}

/**
 * Validates environment variables and fills in the values derived from others
 * (sitemap index location, worker pool size).
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`invalid configuration: ${formatZodIssues(result.error)}`);
  }
  const parsed = result.data;
  const baseUrl = parsed.BASE_URL.replace(/\/+$/, "");

  return {
    ...parsed,
    BASE_URL: baseUrl,
    SITEMAP_INDEX_URL: parsed.SITEMAP_INDEX_URL ?? `${baseUrl}/sitemap_index.xml`,
    WORKER_POOL_SIZE: parsed.WORKER_POOL_SIZE ?? parsed.MAX_CONCURRENT_FETCHES
  };
}
