import { AdmissionGate } from "./gate";
import { createQuietLogger, Logger } from "./logger";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchRuntimeConfig {
  timeoutMs: number;
  userAgent: string;
}

export interface HttpClientOptions extends FetchRuntimeConfig {
  maxConcurrentFetches: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface FetchOptions {
  accept?: string;
  /** Statuses that end the retry loop at once, e.g. 404 while walking pagination. */
  terminalStatuses?: readonly number[];
}

export type FetchFailureKind = "timeout" | "transport" | "http_status";

export interface FetchSuccess {
  ok: true;
  url: string;
  finalUrl: string;
  status: number;
  body: string;
  attempts: number;
}

export interface FetchFailure {
  ok: false;
  url: string;
  kind: FetchFailureKind;
  status?: number;
  message: string;
  attempts: number;
  terminal: boolean;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

type AttemptResult =
  | { ok: true; status: number; body: string; finalUrl: string }
  | { ok: false; kind: FetchFailureKind; status?: number; message: string };

const DEFAULT_ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before attempt `attempt` (0-based): none for the first, then base, 2x base, 4x base... */
export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  if (attempt <= 0) {
    return 0;
  }
  return 2 ** (attempt - 1) * baseDelayMs;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  runtime: FetchRuntimeConfig,
  fetchImpl: FetchLike = (target, options) => fetch(target, options)
): Promise<AttemptResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), runtime.timeoutMs);
  const headers = new Headers(init.headers);
  if (!headers.has("user-agent")) {
    headers.set("user-agent", runtime.userAgent);
  }

  try {
    const response = await fetchImpl(url, {
      ...init,
      method: "GET",
      redirect: "follow",
      headers,
      signal: controller.signal
    });

    if (!response.ok) {
      // drain so the connection can be reused
      await response.arrayBuffer().catch(() => undefined);
      return {
        ok: false,
        kind: "http_status",
        status: response.status,
        message: `HTTP ${response.status}`
      };
    }

    const body = await response.text();
    return { ok: true, status: response.status, body, finalUrl: response.url || url };
  } catch (error) {
    if (controller.signal.aborted) {
      return { ok: false, kind: "timeout", message: `timed out after ${runtime.timeoutMs}ms` };
    }
    return { ok: false, kind: "transport", message: describeError(error) };
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Shared GET client. Every call holds one admission slot for its whole retry loop,
 * so `maxConcurrentFetches` bounds in-flight requests across all callers.
 */
export class HttpClient {
  private readonly gate: AdmissionGate;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly pause: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly runtime: FetchRuntimeConfig;

  constructor(private readonly options: HttpClientOptions) {
    this.gate = new AdmissionGate(options.maxConcurrentFetches);
    this.fetchImpl = options.fetchImpl;
    this.pause = options.sleep ?? sleep;
    this.logger = options.logger ?? createQuietLogger("http");
    this.runtime = { timeoutMs: options.timeoutMs, userAgent: options.userAgent };
  }

  get maxAttempts(): number {
    return this.options.maxRetries + 1;
  }

  get inFlight(): number {
    return this.gate.inUse;
  }

  get peakInFlight(): number {
    return this.gate.peakInUse;
  }

  async fetchText(url: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    return this.gate.run(() => this.fetchWithRetries(url, options));
  }

  private async fetchWithRetries(url: string, options: FetchOptions): Promise<FetchOutcome> {
    const terminalStatuses = options.terminalStatuses ?? [];
    let lastFailure: FetchFailure | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
      const delay = backoffDelayMs(attempt, this.options.retryBaseDelayMs);
      if (delay > 0) {
        await this.pause(delay);
      }

      const result = await fetchWithTimeout(
        url,
        { headers: { accept: options.accept ?? DEFAULT_ACCEPT } },
        this.runtime,
        this.fetchImpl
      );
      const attempts = attempt + 1;

      if (result.ok) {
        return { ok: true, url, finalUrl: result.finalUrl, status: result.status, body: result.body, attempts };
      }

      const terminal = result.status !== undefined && terminalStatuses.includes(result.status);
      lastFailure = {
        ok: false,
        url,
        kind: result.kind,
        status: result.status,
        message: result.message,
        attempts,
        terminal
      };
      if (terminal) {
        return lastFailure;
      }

      this.logger.debug("fetch_attempt_failed", {
        url,
        attempt: attempts,
        max_attempts: this.maxAttempts,
        kind: result.kind,
        status: result.status,
        message: result.message
      });
    }

    return (
      lastFailure ?? {
        ok: false,
        url,
        kind: "transport",
        message: "no attempts made",
        attempts: 0,
        terminal: false
      }
    );
  }
}
