import { config } from "../config";
import type { EngineSettings } from "../engine-config";
import { RobotsCache, RobotsPolicy, type RobotsFetch } from "../safety/robots";
import { isSafe, type GateOptions, type Resolver } from "../safety/url-gate";
import type { RawDocument } from "../types";
import { hostnameOf, htmlToDocument } from "./html";
import { delay, fetchPage, type FetchPageOptions } from "./utils";

export interface DocumentFetcher {
  /** Null when the URL yields no usable document (e.g. a PDF). Throws on failure. */
  fetchDocument(url: string, signal?: AbortSignal): Promise<RawDocument | null>;
}

/** At most `maxPerDomain` tasks run at once against any one host. */
export class DomainLimiter {
  private active = new Map<string, number>();
  private waiting = new Map<string, (() => void)[]>();

  constructor(private readonly maxPerDomain: number = config.maxConcurrentPerDomain) {}

  async run<T>(domain: string, task: () => Promise<T>): Promise<T> {
    await this.acquire(domain);
    try {
      return await task();
    } finally {
      this.release(domain);
    }
  }

  activeCount(domain: string): number {
    return this.active.get(domain) ?? 0;
  }

  private acquire(domain: string): Promise<void> {
    const running = this.active.get(domain) ?? 0;
    if (running < Math.max(1, this.maxPerDomain)) {
      this.active.set(domain, running + 1);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const queue = this.waiting.get(domain) ?? [];
      queue.push(resolve);
      this.waiting.set(domain, queue);
    });
  }

  private release(domain: string): void {
    const queue = this.waiting.get(domain);
    const next = queue?.shift();
    if (queue && queue.length === 0) this.waiting.delete(domain);
    if (next) {
      // The slot passes straight to the next waiter.
      next();
      return;
    }
    const running = (this.active.get(domain) ?? 1) - 1;
    if (running <= 0) this.active.delete(domain);
    else this.active.set(domain, running);
  }
}

const MAX_CRAWL_DELAY_S = 10;

function isPdf(contentType: string, url: string): boolean {
  return contentType.toLowerCase().includes("application/pdf") || /\.pdf(?:$|[?#])/i.test(url);
}

export type FetchSettings = Pick<FetchPageOptions, "retries" | "retryDelayMs" | "timeoutMs" | "maxRedirects">;

export interface HttpDocumentFetcherOptions {
  gate?: GateOptions;
  limiter?: DomainLimiter;
  fetch?: FetchSettings;
}

export class HttpDocumentFetcher implements DocumentFetcher {
  private readonly gate: GateOptions;
  private readonly limiter: DomainLimiter;
  private readonly fetchSettings: FetchSettings;

  constructor(options: HttpDocumentFetcherOptions = {}) {
    this.gate = options.gate ?? {};
    this.limiter = options.limiter ?? new DomainLimiter();
    this.fetchSettings = options.fetch ?? {};
  }

  async fetchDocument(url: string, signal?: AbortSignal): Promise<RawDocument | null> {
    return this.limiter.run(hostnameOf(url), async () => {
      const robots = this.gate.robots;
      if (robots && this.gate.respectRobots !== false) {
        const crawlDelay = await robots.getCrawlDelay(url);
        if (crawlDelay) await delay(Math.min(crawlDelay, MAX_CRAWL_DELAY_S) * 1000, signal);
      }

      const page = await fetchPage(url, {
        ...this.fetchSettings,
        signal,
        gate: (u) => isSafe(u, this.gate),
      });

      if (isPdf(page.contentType, page.url)) {
        console.warn(`[fetcher] Skipping PDF ${page.url}: PDF text extraction is not supported`);
        return null;
      }
      return htmlToDocument(page.url, page.body);
    });
  }
}

/**
 * robots.txt fetch used by RobotsPolicy. It goes through the address checks
 * of the gate (never the robots check itself) and hands every status back.
 */
export function createHttpRobotsFetch(resolver?: Resolver, settings: FetchSettings = {}): RobotsFetch {
  return async (url) => {
    const page = await fetchPage(url, {
      retries: 1,
      timeoutMs: 5000,
      ...settings,
      gate: (u) => isSafe(u, { resolver }),
      acceptStatus: () => true,
      accept: "text/plain,*/*;q=0.5",
    });
    return { status: page.status, body: page.body };
  };
}

export interface CreateFetcherOptions {
  engine: EngineSettings;
  respectRobots?: boolean;
  resolver?: Resolver;
}

/** The fetcher the CLI uses: gate, robots policy and per-domain limits wired from config. */
export function createHttpFetcher(options: CreateFetcherOptions): HttpDocumentFetcher {
  const { engine, resolver } = options;
  const respectRobots = options.respectRobots ?? config.respectRobots;
  const settings: FetchSettings = {
    retries: engine.fetch.retries,
    retryDelayMs: engine.fetch.retryDelayMs,
    timeoutMs: engine.fetch.timeoutMs,
    maxRedirects: engine.fetch.maxRedirects,
  };
  const robots = respectRobots
    ? new RobotsPolicy({
        fetch: createHttpRobotsFetch(resolver, { timeoutMs: Math.min(5000, engine.fetch.timeoutMs) }),
        cache: new RobotsCache(Date.now, engine.fetch.robotsTtlMs),
        userAgent: config.robotsAgentToken,
      })
    : undefined;

  return new HttpDocumentFetcher({
    gate: { resolver, robots, respectRobots },
    limiter: new DomainLimiter(config.maxConcurrentPerDomain),
    fetch: settings,
  });
}
