import { type Browser, type BrowserContextOptions, type Page, chromium } from "playwright";
import { type Logger, logger as defaultLogger } from "../../utils/logger";

export interface BrowserSessionOptions {
  /** Extra Chromium command-line arguments */
  launchArgs?: string[];
  logger?: Logger;
}

export type PageOptions = Pick<BrowserContextOptions, "viewport" | "userAgent">;

/**
 * Owns the single headless Chromium instance shared by all renders.
 * The browser is launched on first use and lives until {@link close}.
 */
export class BrowserSession {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private readonly launchArgs: string[];
  private readonly logger: Logger;

  constructor(options: BrowserSessionOptions = {}) {
    this.launchArgs = options.launchArgs ?? [];
    this.logger = options.logger ?? defaultLogger;
  }

  get isOpen(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  /**
   * Returns the running browser, launching it if needed. Concurrent callers
   * share one launch.
   */
  async ensureBrowser(): Promise<Browser> {
    if (this.browser?.isConnected()) {
      return this.browser;
    }
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<Browser> {
    this.logger.debug(
      `Launching new Playwright browser instance (Chromium) with args: ${this.launchArgs.join(" ") || "none"}...`,
    );
    const browser = await chromium.launch({ channel: "chromium", args: this.launchArgs });
    browser.on("disconnected", () => {
      this.logger.debug("Playwright browser instance disconnected.");
      if (this.browser === browser) {
        this.browser = null;
      }
    });
    this.browser = browser;
    return browser;
  }

  async acquirePage(options: PageOptions = {}): Promise<Page> {
    const browser = await this.ensureBrowser();
    return browser.newPage(options);
  }

  /**
   * Closes a page. A failure to close is logged and does not replace the
   * outcome of the work done on the page.
   */
  async releasePage(page: Page): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      this.logger.warn(`⚠️ Failed to close browser page: ${error}`);
    }
  }

  /**
   * Runs `task` on a fresh page and closes the page on every exit path.
   */
  async withPage<T>(options: PageOptions, task: (page: Page) => Promise<T>): Promise<T> {
    const page = await this.acquirePage(options);
    try {
      return await task(page);
    } finally {
      await this.releasePage(page);
    }
  }

  /**
   * Closes the browser instance if it exists.
   * Should be called during application shutdown.
   */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser?.isConnected()) {
      this.logger.debug("Closing Playwright browser instance...");
      await browser.close();
    }
  }
}
