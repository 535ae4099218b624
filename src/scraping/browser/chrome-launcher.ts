/**
 * Chrome Launcher
 *
 * Launches an installed Chrome through puppeteer-extra over puppeteer-core.
 * puppeteer-core never downloads a browser: the executable comes from
 * CHROME_EXECUTABLE_PATH, or the stable release channel when that is empty.
 *
 * No stealth plugin is registered. The challenge widget fingerprints the
 * navigator properties it patches.
 */
import puppeteerCore, { Browser, Page } from "puppeteer-core";
import { addExtra } from "puppeteer-extra";
import config from "../../config";
import { errorMessage } from "../../shared/errors/challenge.errors";
import { logger } from "../../monitoring/logger";

const puppeteer = addExtra(puppeteerCore);

/**
 * --disable-blink-features=AutomationControlled removes the
 * navigator.webdriver flag the challenge checks.
 */
export const LAUNCH_ARGS: string[] = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-blink-features=AutomationControlled",
  "--disable-gpu",
];

/** Replace the HeadlessChrome product token with the regular one */
export function desktopUserAgent(browserVersion: string): string {
  const chromeVersion = browserVersion.replace("HeadlessChrome", "Chrome");
  return `Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) ${chromeVersion} Safari/537.36`;
}

export async function launchChrome(): Promise<Browser> {
  const browser: Browser = await puppeteer.launch({
    headless: config.headless,
    args: LAUNCH_ARGS,
    defaultViewport: { width: 1280, height: 720 },
    timeout: config.navigationTimeoutMs,
    ...(config.chromeExecutablePath
      ? { executablePath: config.chromeExecutablePath }
      : { channel: "chrome" as const }),
  });

  // Headless Chrome announces itself in the UA, which the challenge flags
  const userAgent = desktopUserAgent(await browser.version());
  browser.on("targetcreated", (target) => {
    target
      .page()
      .then((page: Page | null) => page?.setUserAgent(userAgent))
      .catch((error: unknown) => {
        logger.debug({ error: errorMessage(error) }, "Failed to set user agent on new target");
      });
  });

  logger.info({ userAgent, headless: config.headless }, "Chrome launched");
  return browser;
}
