/**
 * Puppeteer Session
 *
 * Production BrowserSession: one Chromium process with one page for the
 * whole run. Downloads are routed into the configured directory through
 * the DevTools protocol.
 *
 * Usage:
 *   const session = await openPuppeteerSession({ downloadDir });
 *   try {
 *     // ... drive the portal ...
 *   } finally {
 *     await session.close();
 *   }
 */
import * as fs from "fs";
import puppeteer, { Browser, Page, TimeoutError } from "puppeteer-core";
import { BrowserSession, SessionOptions } from "./browser-session";
import { buildLaunchOptions } from "./launch.config";
import { NavigationError } from "../../shared/errors/portal.errors";
import config from "../../config";
import { logger } from "../../monitoring/logger";

export class PuppeteerSession implements BrowserSession {
  private browser: Browser;
  private page: Page;
  private dialogMessages: string[] = [];
  private closed = false;

  private constructor(browser: Browser, page: Page) {
    this.browser = browser;
    this.page = page;
  }

  /**
   * Launch Chromium, open a page and route downloads.
   * Sets default timeouts and the dialog handler.
   */
  static async open(options: SessionOptions): Promise<PuppeteerSession> {
    fs.mkdirSync(options.downloadDir, { recursive: true });

    const browser = await puppeteer.launch(buildLaunchOptions());
    try {
      const page = await browser.newPage();
      page.setDefaultTimeout(config.pageTimeoutMs);
      page.setDefaultNavigationTimeout(config.navigationTimeoutMs);

      const client = await page.createCDPSession();
      await client.send("Page.setDownloadBehavior", {
        behavior: "allow",
        downloadPath: options.downloadDir,
      });

      const session = new PuppeteerSession(browser, page);
      session.attachListeners();

      logger.info(
        { version: await browser.version(), downloadDir: options.downloadDir },
        "Browser session opened"
      );
      return session;
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  private attachListeners(): void {
    this.page.on("dialog", async (dialog) => {
      const message = dialog.message();
      logger.info({ type: dialog.type(), message }, "JS dialog detected");
      this.dialogMessages.push(message);
      await dialog.dismiss().catch((error: Error) => {
        logger.warn({ error: error.message }, "Failed to dismiss dialog");
      });
    });

    this.page.on("requestfailed", (request) => {
      logger.debug(
        {
          url: request.url(),
          type: request.resourceType(),
          error: request.failure()?.errorText,
        },
        "Request failed"
      );
    });
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "networkidle2" });
  }

  async reload(): Promise<void> {
    await this.page.reload({ waitUntil: "networkidle2" });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async exists(selector: string): Promise<boolean> {
    return (await this.page.$(selector)) !== null;
  }

  async waitFor(
    selector: string,
    timeoutMs: number = config.pageTimeoutMs
  ): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof TimeoutError) return false;
      throw error;
    }
  }

  async waitForNavigation(timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForNavigation({
        waitUntil: "networkidle2",
        timeout: timeoutMs,
      });
      return true;
    } catch (error) {
      if (error instanceof TimeoutError) return false;
      throw error;
    }
  }

  async click(selector: string): Promise<void> {
    await this.requireElement(selector);
    // Click from inside the page; overlays intercept native clicks
    await this.page.$eval(selector, (el) => {
      el.scrollIntoView({ block: "center" });
      if (el instanceof HTMLElement) el.click();
    });
  }

  async clickByText(selector: string, text: string): Promise<boolean> {
    return this.page.$$eval(
      selector,
      (elements, wanted) => {
        for (const el of elements) {
          if (el instanceof HTMLElement && (el.textContent || "").trim() === wanted) {
            el.click();
            return true;
          }
        }
        return false;
      },
      text
    );
  }

  async type(selector: string, text: string): Promise<void> {
    await this.requireElement(selector);
    await this.page.locator(selector).fill(text);
  }

  async select(selector: string, value: string): Promise<void> {
    await this.requireElement(selector);
    await this.page.select(selector, value);
  }

  async pressKey(key: "Escape" | "Enter"): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async isChecked(selector: string): Promise<boolean> {
    await this.requireElement(selector);
    return this.page.$eval(
      selector,
      (el) => el instanceof HTMLInputElement && el.checked
    );
  }

  async isDisabled(selector: string): Promise<boolean> {
    await this.requireElement(selector);
    return this.page.$eval(
      selector,
      (el) =>
        el.hasAttribute("disabled") || el.getAttribute("aria-disabled") === "true"
    );
  }

  async textOf(selector: string): Promise<string | null> {
    const handle = await this.page.$(selector);
    if (!handle) return null;
    try {
      const text = await handle.evaluate((el) => el.textContent || "");
      return text.trim();
    } finally {
      await handle.dispose();
    }
  }

  async textsOf(selector: string): Promise<string[]> {
    return this.page.$$eval(selector, (elements) =>
      elements
        .filter((el) => {
          const style = window.getComputedStyle(el);
          return style.display !== "none" && style.visibility !== "hidden";
        })
        .map((el) => (el.textContent || "").trim())
        .filter((text) => text.length > 0)
    );
  }

  async attributeOf(selector: string, name: string): Promise<string | null> {
    const handle = await this.page.$(selector);
    if (!handle) return null;
    try {
      return await handle.evaluate((el, attr) => el.getAttribute(attr), name);
    } finally {
      await handle.dispose();
    }
  }

  takeDialogMessages(): string[] {
    const messages = this.dialogMessages;
    this.dialogMessages = [];
    return messages;
  }

  /**
   * Fetch via the page context so the portal's session cookies are sent.
   * The bytes cross the DevTools bridge as base64.
   */
  async fetchBytes(url: string): Promise<Buffer> {
    const base64 = await this.page.evaluate(async (src) => {
      const response = await fetch(src, { credentials: "include" });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} fetching ${src}`);
      }
      const bytes = new Uint8Array(await response.arrayBuffer());
      let binary = "";
      for (let i = 0; i < bytes.length; i++) {
        binary += String.fromCharCode(bytes[i]);
      }
      return btoa(binary);
    }, url);

    return Buffer.from(base64, "base64");
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.browser.close();
    logger.info("Browser session closed");
  }

  private async requireElement(selector: string): Promise<void> {
    const found = await this.waitFor(selector);
    if (!found) {
      throw new NavigationError(`Element not found: ${selector}`);
    }
  }
}

/** SessionFactory for production runs */
export function openPuppeteerSession(options: SessionOptions): Promise<BrowserSession> {
  return PuppeteerSession.open(options);
}
