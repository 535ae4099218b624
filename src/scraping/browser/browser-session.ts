/**
 * Browser Session
 *
 * Owns the active page for one navigate-and-resolve job and hands out
 * replacements when it crashes. Implements the SessionManager the
 * challenge resolver asks for a new page.
 *
 * Usage:
 *   const session = new BrowserSession(browserPool);
 *   try {
 *     const queryable = await session.goto(url, "domcontentloaded", 30000);
 *     // ... resolve ...
 *   } finally {
 *     await session.close();
 *   }
 */
import { Browser, Page } from "puppeteer-core";
import { BrowserPool } from "./browser-pool";
import { PuppeteerFrame, translateBrowserError } from "./puppeteer-queryable";
import config from "../../config";
import { errorMessage } from "../../shared/errors/challenge.errors";
import {
  NavigationSession,
  NavigationWaitUntil,
  Queryable,
} from "../../shared/types/dom.types";
import { logger } from "../../monitoring/logger";

export class BrowserSession implements NavigationSession {
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor(private readonly browserPool: BrowserPool) {}

  /**
   * Acquire a browser from the pool (once) and open a new page on it.
   * Sets default timeouts.
   */
  async open(): Promise<Page> {
    if (!this.browser) {
      this.browser = await this.browserPool.acquire();
    }

    const page = await this.browser.newPage();
    page.setDefaultTimeout(config.pageTimeoutMs);
    page.setDefaultNavigationTimeout(config.navigationTimeoutMs);

    page.on("requestfailed", (request) => {
      logger.debug(
        { url: request.url(), type: request.resourceType(), error: request.failure()?.errorText },
        "Request failed"
      );
    });

    this.page = page;
    return page;
  }

  /**
   * Drop the current page and open a fresh one, optionally navigated
   * back to where the old one was.
   */
  async newPage(resumeUrl?: string): Promise<Queryable> {
    await this.closePage();
    const page = await this.open();

    if (resumeUrl) {
      try {
        await page.goto(resumeUrl, {
          waitUntil: "domcontentloaded",
          timeout: config.navigationTimeoutMs,
        });
      } catch (error) {
        logger.warn(
          { resumeUrl, error: errorMessage(error) },
          "Replacement page could not reopen the previous URL"
        );
      }
    }

    return PuppeteerFrame.fromPage(page);
  }

  /**
   * Navigate the active page, opening one first if needed.
   * Driver errors are translated (a closed page surfaces as TargetCrashedError).
   */
  async goto(
    url: string,
    waitUntil: NavigationWaitUntil,
    timeoutMs: number
  ): Promise<Queryable> {
    const page = this.page ?? (await this.open());

    try {
      await page.goto(url, { waitUntil, timeout: timeoutMs });
    } catch (error) {
      throw translateBrowserError(error);
    }

    return PuppeteerFrame.fromPage(page);
  }

  /**
   * Close the page and release the browser back to the pool.
   * Safe to call multiple times.
   */
  async close(): Promise<void> {
    await this.closePage();

    if (this.browser) {
      this.browserPool.release(this.browser);
      this.browser = null;
    }
  }

  private async closePage(): Promise<void> {
    if (!this.page) return;

    try {
      await this.page.close();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Failed to close page");
    }
    this.page = null;
  }
}
