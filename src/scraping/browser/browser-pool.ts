/**
 * Browser Pool
 *
 * Hands out launched browsers to sessions, one session per browser.
 *
 * - At most `maxSize` browsers are launched; acquire() waits for a
 *   release once they are all leased
 * - A browser is relaunched once it has served `maxLeases` sessions,
 *   since long-lived Chrome processes accumulate challenge cookies and memory
 * - drain() closes everything and rejects pending acquires
 */
import { Browser } from "puppeteer-core";
import config from "../../config";
import { errorMessage } from "../../shared/errors/challenge.errors";
import { logger as defaultLogger, Logger } from "../../monitoring/logger";
import { launchChrome } from "./chrome-launcher";

export interface Closable {
  close(): Promise<void>;
}

export interface BrowserPoolOptions<TBrowser extends Closable> {
  launch: () => Promise<TBrowser>;
  maxSize?: number;
  maxLeases?: number;
  logger?: Logger;
}

interface PoolEntry<TBrowser> {
  browser: TBrowser;
  leases: number;
  leased: boolean;
}

interface Waiter<TBrowser> {
  resolve: (browser: TBrowser) => void;
  reject: (error: Error) => void;
}

export class BrowserPool<TBrowser extends Closable = Browser> {
  private entries: PoolEntry<TBrowser>[] = [];
  private waiters: Waiter<TBrowser>[] = [];
  private readonly launch: () => Promise<TBrowser>;
  private readonly maxSize: number;
  private readonly maxLeases: number;
  private readonly logger: Logger;

  constructor(options: BrowserPoolOptions<TBrowser>) {
    this.launch = options.launch;
    this.maxSize = Math.max(1, options.maxSize ?? config.browserPoolSize);
    this.maxLeases = Math.max(1, options.maxLeases ?? config.maxSessionsPerBrowser);
    this.logger = options.logger ?? defaultLogger;
  }

  async acquire(): Promise<TBrowser> {
    const idle = this.entries.find((entry) => !entry.leased);
    if (idle) return this.lease(idle);

    if (this.entries.length < this.maxSize) {
      const entry: PoolEntry<TBrowser> = {
        browser: await this.launch(),
        leases: 0,
        leased: false,
      };
      this.entries.push(entry);
      return this.lease(entry);
    }

    return new Promise<TBrowser>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Return a browser; the next waiting acquire gets it directly */
  release(browser: TBrowser): void {
    const entry = this.entries.find((candidate) => candidate.browser === browser);
    if (!entry) return;

    entry.leased = false;
    const waiter = this.waiters.shift();
    if (!waiter) return;

    this.lease(entry).then(waiter.resolve, (error: unknown) =>
      waiter.reject(error instanceof Error ? error : new Error(errorMessage(error)))
    );
  }

  async drain(): Promise<void> {
    this.logger.info({ poolSize: this.entries.length }, "Draining browser pool");

    for (const waiter of this.waiters) {
      waiter.reject(new Error("Browser pool drained"));
    }
    this.waiters = [];

    for (const entry of this.entries) {
      await this.closeQuietly(entry.browser);
    }
    this.entries = [];
  }

  size(): number {
    return this.entries.length;
  }

  private async lease(entry: PoolEntry<TBrowser>): Promise<TBrowser> {
    entry.leased = true;

    if (entry.leases >= this.maxLeases) {
      this.logger.info({ leases: entry.leases }, "Browser reached max sessions, relaunching");
      await this.closeQuietly(entry.browser);
      try {
        entry.browser = await this.launch();
      } catch (error) {
        this.entries = this.entries.filter((candidate) => candidate !== entry);
        throw error;
      }
      entry.leases = 0;
    }

    entry.leases++;
    return entry.browser;
  }

  private async closeQuietly(browser: TBrowser): Promise<void> {
    try {
      await browser.close();
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, "Browser close failed");
    }
  }
}

/** Pool of Chrome instances launched from configuration */
export function createChromePool(): BrowserPool<Browser> {
  return new BrowserPool<Browser>({ launch: launchChrome });
}
