/**
 * Browser Session
 *
 * The capability boundary between portal logic and the browser driver.
 * Navigator, solver and fetcher only ever talk to this interface, so they
 * run against an in-process fake in tests and against Puppeteer in
 * production (see puppeteer-session.ts).
 *
 * Selectors are CSS selectors. Clicks are dispatched from inside the page
 * because the portal's overlays intercept pointer events.
 */
export interface BrowserSession {
  /** Navigate and wait for the network to settle */
  goto(url: string): Promise<void>;
  /** Reload the current page */
  reload(): Promise<void>;
  /** URL of the current page */
  currentUrl(): string;

  /** Whether an element matching the selector is currently in the DOM */
  exists(selector: string): Promise<boolean>;
  /**
   * Wait for an element to appear.
   * @returns false if it did not appear within the timeout
   */
  waitFor(selector: string, timeoutMs?: number): Promise<boolean>;
  /**
   * Wait for a navigation triggered by a previous action.
   * @returns false if no navigation finished within the timeout
   */
  waitForNavigation(timeoutMs: number): Promise<boolean>;

  click(selector: string): Promise<void>;
  /** Click the first element matching the selector whose text equals `text` */
  clickByText(selector: string, text: string): Promise<boolean>;
  /** Replace the value of an input */
  type(selector: string, text: string): Promise<void>;
  /** Choose an option of a <select> by value */
  select(selector: string, value: string): Promise<void>;
  pressKey(key: "Escape" | "Enter"): Promise<void>;

  isChecked(selector: string): Promise<boolean>;
  isDisabled(selector: string): Promise<boolean>;
  /** Trimmed text of the first match, null when absent */
  textOf(selector: string): Promise<string | null>;
  /** Trimmed, non-empty texts of every visible match */
  textsOf(selector: string): Promise<string[]>;
  attributeOf(selector: string, name: string): Promise<string | null>;

  /**
   * Messages of JS dialogs (alert/confirm) shown since the last call.
   * Dialogs are dismissed automatically; the portal reports some
   * validation errors this way.
   */
  takeDialogMessages(): string[];

  /** Fetch a resource with the page's cookies and return its bytes */
  fetchBytes(url: string): Promise<Buffer>;

  /** Release the browser. Safe to call more than once. */
  close(): Promise<void>;
}

export interface SessionOptions {
  /** Directory the browser saves downloads into */
  downloadDir: string;
}

/** Opens a fresh session; owned and closed by the run orchestrator */
export type SessionFactory = (options: SessionOptions) => Promise<BrowserSession>;
