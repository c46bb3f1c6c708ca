import { ProductAggregator } from "../lib/aggregate";
import { ProductExtractor } from "../lib/extract";
import { HttpClient } from "../lib/http";
import { createQuietLogger, Logger } from "../lib/logger";
import { mapLimit } from "../lib/pool";
import { RunTracker } from "../lib/status";
import { CrawlRun, CrawlTask } from "../types";
import { UrlDiscoverer } from "./discovery";

const PROGRESS_EVERY = 25;

export interface CatalogCrawlerOptions {
  discoverer: UrlDiscoverer;
  http: HttpClient;
  extractor: ProductExtractor;
  workerPoolSize: number;
  /** Keep only the first N discovered tasks. */
  maxTasks?: number;
  logger?: Logger;
  tracker?: RunTracker;
  /** Run timestamp shared with every record's run metadata; defaults to the start of `run()`. */
  extractionTimestamp?: string;
}

/**
 * Discovery, then a fixed pool of workers that fetch, extract and hand records to a
 * single aggregator. A failed task is counted and dropped; it never ends the run.
 */
export class CatalogCrawler {
  private readonly logger: Logger;
  private readonly tracker: RunTracker;

  constructor(private readonly options: CatalogCrawlerOptions) {
    this.logger = options.logger ?? createQuietLogger("crawler");
    this.tracker = options.tracker ?? new RunTracker();
  }

  /** Workers finish the task they hold and take no further ones. */
  stop(): void {
    if (!this.tracker.shouldStop) {
      this.logger.info("stop_requested", { ...this.tracker.current.metrics });
    }
    this.tracker.requestStop();
  }

  async run(): Promise<CrawlRun> {
    const { discoverer, workerPoolSize, maxTasks } = this.options;
    const extractionTimestamp = this.options.extractionTimestamp ?? new Date().toISOString();
    this.tracker.markDiscovering();
    this.logger.info("run_started", { strategy: discoverer.strategy, worker_pool_size: workerPoolSize });

    const discovery = await discoverer.discover();
    const tasks = maxTasks === undefined ? discovery.tasks : discovery.tasks.slice(0, maxTasks);
    this.logger.info("url_discovery_completed", {
      strategy: discovery.strategy,
      root_reachable: discovery.rootReachable,
      discovered_urls: discovery.tasks.length,
      queued_tasks: tasks.length,
      ...discovery.metrics
    });
    if (discovery.rootReachable && tasks.length === 0) {
      this.logger.warn("url_discovery_empty", { strategy: discovery.strategy });
    }

    this.tracker.markCrawling(tasks.length);
    const aggregator = new ProductAggregator();
    let processed = 0;

    await mapLimit(
      tasks,
      workerPoolSize,
      async (task) => {
        await this.processTask(task, aggregator);
        processed += 1;
        if (processed % PROGRESS_EVERY === 0) {
          this.logger.info("crawl_progress", { processed, queued_tasks: tasks.length, extracted: aggregator.size });
        }
      },
      { shouldStop: () => this.tracker.shouldStop }
    );

    const summary = this.tracker.finish({
      extractionTimestamp,
      discoveryStrategy: discovery.strategy,
      rootReachable: discovery.rootReachable
    });
    this.logger.info("run_completed", {
      total_products_extracted: summary.totalProductsExtracted,
      discovered_urls: summary.discoveredUrls,
      skipped_tasks: summary.skippedTasks,
      fetch_failures: summary.fetchFailures,
      extraction_misses: summary.extractionMisses,
      duplicates_discarded: summary.duplicatesDiscarded,
      stopped_early: summary.stoppedEarly,
      peak_in_flight: this.options.http.peakInFlight,
      duration_ms: summary.durationMs
    });

    return { records: aggregator.toArray(), summary };
  }

  private async processTask(task: CrawlTask, aggregator: ProductAggregator): Promise<void> {
    const fetched = await this.options.http.fetchText(task.url);
    if (!fetched.ok) {
      this.tracker.increment("fetch_failures");
      this.logger.warn("task_fetch_failed", {
        url: task.url,
        kind: fetched.kind,
        status: fetched.status,
        attempts: fetched.attempts,
        message: fetched.message
      });
      return;
    }
    this.tracker.increment("fetched_pages");

    const extracted = this.options.extractor.extract(fetched.body, task.url, { contextLabel: task.contextLabel });
    if (!extracted.ok) {
      this.tracker.increment("extraction_misses");
      const metadata = { url: task.url, reason: extracted.reason, message: extracted.message };
      // listing and landing pages in a sitemap routinely have no product container
      if (extracted.reason === "no_container") {
        this.logger.debug("task_extraction_failed", metadata);
      } else {
        this.logger.warn("task_extraction_failed", metadata);
      }
      return;
    }
    if (extracted.missingFields.length > 0) {
      this.logger.debug("fields_missing", { url: task.url, fields: extracted.missingFields });
    }

    if (aggregator.offer(extracted.record) === "duplicate") {
      this.tracker.increment("duplicates");
      this.logger.debug("duplicate_discarded", { url: task.url, identifier: extracted.record.identifier });
      return;
    }
    this.tracker.increment("extracted");
  }
}
