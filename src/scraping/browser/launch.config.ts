/**
 * Browser Launch Configuration
 *
 * Chromium flags and launch options for the portal session.
 * Uses puppeteer-core against a locally installed Chrome: CHROME_PATH when
 * set, otherwise the stable Chrome channel.
 */
import { PuppeteerLaunchOptions } from "puppeteer-core";
import config from "../../config";

/**
 * Chrome launch arguments.
 * --disable-blink-features=AutomationControlled removes the
 * "navigator.webdriver" flag.
 */
export const LAUNCH_ARGS: string[] = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-blink-features=AutomationControlled",
  "--disable-gpu",
  "--disable-extensions",
  "--start-maximized",
];

/** Options passed to puppeteer.launch() */
export function buildLaunchOptions(): PuppeteerLaunchOptions {
  return {
    ...(config.chromePath
      ? { executablePath: config.chromePath }
      : { channel: "chrome" as const }),
    headless: config.headless,
    args: LAUNCH_ARGS,
    defaultViewport: { width: 1366, height: 900 },
    timeout: config.navigationTimeoutMs,
    slowMo: 5,
  };
}
