import { RunSummary } from "../types";

export type RunState = "idle" | "discovering" | "crawling" | "completed" | "stopped";

export interface RunMetrics {
  discovered_urls: number;
  fetched_pages: number;
  fetch_failures: number;
  extraction_misses: number;
  extracted: number;
  duplicates: number;
}

const zeroMetrics = (): RunMetrics => ({
  discovered_urls: 0,
  fetched_pages: 0,
  fetch_failures: 0,
  extraction_misses: 0,
  extracted: 0,
  duplicates: 0
});

export type MetricName = keyof RunMetrics;

export class RunTracker {
  private state: RunState = "idle";
  private metrics: RunMetrics = zeroMetrics();
  private startedAt = 0;
  private stopRequested = false;

  constructor(private readonly now: () => number = Date.now) {}

  markDiscovering(): void {
    this.state = "discovering";
    this.metrics = zeroMetrics();
    this.startedAt = this.now();
    this.stopRequested = false;
  }

  markCrawling(discoveredUrls: number): void {
    this.state = "crawling";
    this.metrics = { ...this.metrics, discovered_urls: discoveredUrls };
  }

  increment(metric: MetricName, by = 1): void {
    this.metrics = { ...this.metrics, [metric]: this.metrics[metric] + by };
  }

  requestStop(): void {
    this.stopRequested = true;
  }

  get shouldStop(): boolean {
    return this.stopRequested;
  }

  get current(): { state: RunState; metrics: RunMetrics } {
    return { state: this.state, metrics: { ...this.metrics } };
  }

  finish(args: { extractionTimestamp: string; discoveryStrategy: string; rootReachable: boolean }): RunSummary {
    this.state = this.stopRequested ? "stopped" : "completed";
    const { discovered_urls, extracted } = this.metrics;

    return {
      totalProductsExtracted: extracted,
      extractionTimestamp: args.extractionTimestamp,
      discoveryStrategy: args.discoveryStrategy,
      rootReachable: args.rootReachable,
      discoveredUrls: discovered_urls,
      skippedTasks: Math.max(0, discovered_urls - extracted),
      fetchFailures: this.metrics.fetch_failures,
      extractionMisses: this.metrics.extraction_misses,
      duplicatesDiscarded: this.metrics.duplicates,
      stoppedEarly: this.stopRequested,
      durationMs: Math.max(0, this.now() - this.startedAt)
    };
  }
}
