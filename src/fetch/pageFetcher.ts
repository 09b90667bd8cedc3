import { AppConfig } from "../config";
import { ConcurrencyLimiter } from "../core/concurrency";
import { FetchError, toErrorMessage } from "../core/errors";
import { defaultHttpClient, HttpClient, parseHttpUrl } from "../core/fetch";
import { withRetry } from "../core/retry";
import { Logger, MetricsRegistry } from "../observability";
import { BrowserFetcher, BrowserLauncher } from "./browserFetcher";
import { fetchStaticPage } from "./staticFetcher";
import { FetchedPage, FetchOptions, PageFetcher } from "./types";

export interface FetchPools {
  static: ConcurrencyLimiter;
  dynamic: ConcurrencyLimiter;
}

interface StrategyPageFetcherDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  httpClient?: HttpClient;
  launcher?: BrowserLauncher;
}

export function createFetchPools(config: AppConfig): FetchPools {
  return {
    static: new ConcurrencyLimiter(config.staticConcurrency),
    dynamic: new ConcurrencyLimiter(config.dynamicConcurrency),
  };
}

/**
 * Routes each request to the plain HTTP or the headless-browser strategy by
 * mode, each behind its own concurrency pool, and retries retryable failures.
 */
export class StrategyPageFetcher implements PageFetcher {
  readonly pools: FetchPools;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly httpClient: HttpClient;
  private readonly browser: BrowserFetcher;

  constructor(deps: StrategyPageFetcherDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.httpClient = deps.httpClient ?? defaultHttpClient;
    this.browser = new BrowserFetcher({ config: deps.config, logger: deps.logger, launcher: deps.launcher });
    this.pools = createFetchPools(deps.config);
  }

  async fetch(url: string, options: FetchOptions): Promise<FetchedPage> {
    if (!parseHttpUrl(url)) {
      throw new FetchError(`Malformed or unsupported URL: ${url}`, { url, category: "unknown", retryable: false });
    }

    return withRetry(
      async (attempt): Promise<FetchedPage> => {
        this.logger.debug("page_fetch_start", { url, mode: options.mode, attempt });
        const stopTimer = this.metrics.startTimer("page_fetch_ms");
        const page =
          options.mode === "dynamic"
            ? await this.pools.dynamic.run(async () => {
                const html = await this.browser.render(url, options.waitFor, options.softWait ?? false);
                return { url, html, contentType: "text/html", isHtml: true };
              })
            : await this.pools.static.run(() => fetchStaticPage(url, this.config, this.httpClient));
        const durationMs = stopTimer();
        this.metrics.incrementCounter("pages_fetched", 1);
        this.logger.debug("page_fetch_complete", { url, mode: options.mode, attempt, durationMs, isHtml: page.isHtml });
        return page;
      },
      { maxRetries: this.config.maxFetchRetries, baseDelayMs: this.config.retryBaseDelayMs },
      {
        isRetryable: (error) => error instanceof FetchError && error.retryable,
        onRetry: (error, attempt, delayMs) => {
          this.metrics.incrementCounter("fetch_retries", 1);
          this.logger.warn("page_fetch_retry", { url, mode: options.mode, attempt, delayMs, error: toErrorMessage(error) });
        },
      },
    );
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
