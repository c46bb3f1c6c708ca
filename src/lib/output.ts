import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { CrawlRun, ProductRecord, RunMetadata } from "../types";

export interface OutputRunMetadata {
  source_site: string;
  scrape_timestamp: string;
  contact_phone?: string;
  contact_whatsapp?: string;
}

export interface OutputProduct {
  identifier: string;
  source_url: string;
  title?: string;
  brand?: string;
  category_path: string[];
  price_current: string;
  price_original?: string;
  currency: string;
  availability: ProductRecord["availability"];
  warranty?: string;
  description?: string;
  specifications: Record<string, string>;
  specifications_found: boolean;
  images: string[];
  rating?: string;
  discovery_context?: string;
  metadata: OutputRunMetadata;
}

export interface OutputDocument {
  extraction_info: {
    total_products_extracted: number;
    extraction_timestamp: string;
    discovered_urls: number;
    skipped_tasks: number;
    discovery_strategy: string;
  };
  products: OutputProduct[];
}

function toOutputMetadata(metadata: RunMetadata): OutputRunMetadata {
  return {
    source_site: metadata.sourceSite,
    scrape_timestamp: metadata.scrapeTimestamp,
    ...(metadata.contactPhone !== undefined ? { contact_phone: metadata.contactPhone } : {}),
    ...(metadata.contactWhatsapp !== undefined ? { contact_whatsapp: metadata.contactWhatsapp } : {})
  };
}

/** Absent optional fields are left out rather than written as null. */
export function toOutputProduct(record: ProductRecord): OutputProduct {
  return {
    identifier: record.identifier,
    source_url: record.sourceUrl,
    ...(record.title !== undefined ? { title: record.title } : {}),
    ...(record.brand !== undefined ? { brand: record.brand } : {}),
    category_path: record.categoryPath,
    price_current: record.priceCurrent,
    ...(record.priceOriginal !== undefined ? { price_original: record.priceOriginal } : {}),
    currency: record.currency,
    availability: record.availability,
    ...(record.warranty !== undefined ? { warranty: record.warranty } : {}),
    ...(record.description !== undefined ? { description: record.description } : {}),
    specifications: record.specifications,
    specifications_found: record.specificationsFound,
    images: record.images,
    ...(record.rating !== undefined ? { rating: record.rating } : {}),
    ...(record.discoveryContext !== undefined ? { discovery_context: record.discoveryContext } : {}),
    metadata: toOutputMetadata(record.runMetadata)
  };
}

export function buildOutputDocument(run: CrawlRun): OutputDocument {
  return {
    extraction_info: {
      total_products_extracted: run.records.length,
      extraction_timestamp: run.summary.extractionTimestamp,
      discovered_urls: run.summary.discoveredUrls,
      skipped_tasks: run.summary.skippedTasks,
      discovery_strategy: run.summary.discoveryStrategy
    },
    products: run.records.map(toOutputProduct)
  };
}

export async function writeOutputDocument(path: string, document: OutputDocument): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, "utf8");
}
