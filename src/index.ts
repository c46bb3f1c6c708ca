#!/usr/bin/env node
import { AppConfig, parseConfig } from "./config";
import { CatalogCrawler } from "./crawlers/catalog-crawler";
import { createDiscoverer } from "./crawlers/discovery";
import { ProductExtractor } from "./lib/extract";
import { HttpClient } from "./lib/http";
import { Logger } from "./lib/logger";
import { buildOutputDocument, writeOutputDocument } from "./lib/output";
import { loadExtractionPolicy } from "./lib/policy";
import { ExtractionPolicy, RunMetadata } from "./types";

const EXIT_OK = 0;
const EXIT_FAILURE = 1;

function buildRunMetadata(config: AppConfig): RunMetadata {
  return Object.freeze({
    sourceSite: config.SOURCE_SITE,
    scrapeTimestamp: new Date().toISOString(),
    ...(config.CONTACT_PHONE ? { contactPhone: config.CONTACT_PHONE } : {}),
    ...(config.CONTACT_WHATSAPP ? { contactWhatsapp: config.CONTACT_WHATSAPP } : {})
  });
}

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = parseConfig(process.env);
  } catch (error) {
    new Logger("crawler", process.env.LOG_LEVEL).error("config_invalid", { error });
    return EXIT_FAILURE;
  }

  const logger = new Logger("crawler", config.LOG_LEVEL);
  let policy: ExtractionPolicy;
  try {
    policy = loadExtractionPolicy(config.EXTRACTION_POLICY_PATH);
  } catch (error) {
    logger.error("policy_invalid", { path: config.EXTRACTION_POLICY_PATH, error });
    return EXIT_FAILURE;
  }

  const http = new HttpClient({
    maxConcurrentFetches: config.MAX_CONCURRENT_FETCHES,
    maxRetries: config.MAX_RETRIES,
    timeoutMs: Math.round(config.REQUEST_TIMEOUT_SECONDS * 1000),
    retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
    userAgent: config.USER_AGENT,
    logger: logger.child("http")
  });
  const runMetadata = buildRunMetadata(config);
  const crawler = new CatalogCrawler({
    discoverer: createDiscoverer(config, policy, http, logger.child("discovery")),
    http,
    extractor: new ProductExtractor({ policy, currency: config.CURRENCY, runMetadata }),
    workerPoolSize: config.WORKER_POOL_SIZE,
    maxTasks: config.CRAWL_MAX_URLS,
    extractionTimestamp: runMetadata.scrapeTimestamp,
    logger: logger.child("pipeline")
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("signal_received", { signal });
    crawler.stop();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info("crawler_started", {
    strategy: config.DISCOVERY_STRATEGY,
    base_url: config.BASE_URL,
    policy: policy.name,
    max_concurrent_fetches: config.MAX_CONCURRENT_FETCHES,
    worker_pool_size: config.WORKER_POOL_SIZE,
    max_retries: config.MAX_RETRIES,
    crawl_max_urls: config.CRAWL_MAX_URLS,
    output_file: config.OUTPUT_FILE
  });

  try {
    const run = await crawler.run();
    try {
      await writeOutputDocument(config.OUTPUT_FILE, buildOutputDocument(run));
    } catch (error) {
      logger.error("output_write_failed", { path: config.OUTPUT_FILE, error });
      return EXIT_FAILURE;
    }
    logger.info("output_written", {
      path: config.OUTPUT_FILE,
      products: run.records.length,
      stopped_early: run.summary.stoppedEarly
    });
    return EXIT_OK;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    new Logger("crawler", process.env.LOG_LEVEL).error("unhandled_error", { error });
    process.exitCode = EXIT_FAILURE;
  });
