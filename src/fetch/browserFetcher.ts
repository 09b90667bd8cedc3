import { AppConfig } from "../config";
import { classifyNetworkError, FetchError, toErrorMessage } from "../core/errors";
import { Logger } from "../observability";

// Structural slices of the Playwright API, so tests can supply a fake browser.
export interface BrowserPage {
  goto(url: string, options: { waitUntil: "domcontentloaded"; timeout: number }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface BrowserHandle {
  newContext(options: { userAgent: string; ignoreHTTPSErrors: boolean }): Promise<BrowserSession>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: { headless: boolean }) => Promise<BrowserHandle>;

export const launchChromium: BrowserLauncher = async ({ headless }) => {
  const { chromium } = await import("playwright");
  return chromium.launch({
    headless,
    args: ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage", "--disable-gpu"],
  });
};

interface BrowserFetcherOptions {
  config: AppConfig;
  logger: Logger;
  launcher?: BrowserLauncher;
}

/**
 * One lazily launched browser per run. Every render gets its own context, which
 * is closed before the render returns or throws.
 */
export class BrowserFetcher {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly launcher: BrowserLauncher;
  private browser?: Promise<BrowserHandle>;

  constructor(options: BrowserFetcherOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.launcher = options.launcher ?? launchChromium;
  }

  async render(url: string, waitFor?: string, softWait = false): Promise<string> {
    const browser = await this.getBrowser();
    const session = await browser.newContext({
      userAgent: this.config.userAgent,
      ignoreHTTPSErrors: this.config.ignoreHttpsErrors,
    });

    try {
      const page = await session.newPage();
      try {
        await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.config.renderTimeoutMs });
      } catch (error) {
        throw new FetchError(`Render failed for ${url}: ${toErrorMessage(error)}`, {
          url,
          cause: error,
          ...classifyNetworkError(error),
        });
      }

      if (waitFor) {
        try {
          await page.waitForSelector(waitFor, { timeout: this.config.renderTimeoutMs });
        } catch (error) {
          if (softWait) {
            this.logger.info("render_wait_missed", { url, selector: waitFor, error: toErrorMessage(error) });
            return await page.content();
          }
          throw new FetchError(`Timed out waiting for "${waitFor}" on ${url}`, {
            url,
            cause: error,
            category: "network",
            retryable: true,
          });
        }
      }

      if (this.config.renderSettleMs > 0) {
        await page.waitForTimeout(this.config.renderSettleMs);
      }
      return await page.content();
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = undefined;
    if (!pending) {
      return;
    }
    const browser = await pending;
    await browser.close();
    this.logger.debug("browser_closed");
  }

  private getBrowser(): Promise<BrowserHandle> {
    if (!this.browser) {
      this.logger.info("browser_launch", { headless: this.config.headless });
      this.browser = this.launcher({ headless: this.config.headless }).catch((error: unknown) => {
        this.browser = undefined;
        throw new FetchError(`Browser launch failed: ${toErrorMessage(error)}`, {
          url: "",
          cause: error,
          category: "unknown",
          retryable: false,
        });
      });
    }
    return this.browser;
  }
}
