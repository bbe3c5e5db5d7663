/**
 * Report Fetcher
 *
 * Exports the allowance report for one calendar month from the
 * B2B query/download screen:
 * 1. Pick the month in the date picker (moving the year first if needed)
 * 2. Select the invoice-type and business-type radios, run the query
 * 3. Raise the page size so most months fit on one page
 * 4. For every result page: select all rows, download the Excel export
 *
 * A download that never lands is retried once on a reloaded form. The
 * retry resumes at the page that timed out, so pages already saved are
 * not exported twice. A second timeout is reported as a "timeout" result
 * (with the pages saved so far) instead of thrown.
 */
import * as path from "path";
import { PORTAL, RETRY_CONFIG, monthCellSelector } from "../../config/constants";
import { BrowserSession } from "../browser/browser-session";
import { DownloadResult, ReportRequest } from "../../shared/types/portal.types";
import { DownloadTimeoutError, NavigationError } from "../../shared/errors/portal.errors";
import { retryWithBackoff, sleep } from "../../shared/utils/retry";
import { parsePickerYear } from "../../shared/utils/date";
import { logger } from "../../monitoring/logger";
import { DownloadWatcher } from "./download-watcher";

export interface FetcherOptions {
  /** Total tries per month, the first included */
  maxAttempts: number;
  retryDelayMs: number;
  /** Pause after picker and pagination clicks */
  settleMs: number;
  /** Pause after the query button while the grid loads */
  resultsSettleMs: number;
  waitTimeoutMs: number;
  /** Stop paging after this many pages */
  maxPages: number;
}

export interface FetchOptions {
  /** Reload the screen before filling the form (every month after the first) */
  reload?: boolean;
}

/** Pages saved for one month, carried across attempts */
interface ExportProgress {
  files: string[];
  /** Directory entries that are not a new page: the pre-export contents plus saved pages */
  seen: Set<string>;
}

export class ReportFetcher {
  private watcher: DownloadWatcher;
  private options: FetcherOptions;

  constructor(watcher: DownloadWatcher, options: Partial<FetcherOptions> = {}) {
    this.watcher = watcher;
    this.options = {
      maxAttempts: options.maxAttempts ?? RETRY_CONFIG.DOWNLOAD_ATTEMPTS,
      retryDelayMs: options.retryDelayMs ?? RETRY_CONFIG.DOWNLOAD_DELAY_MS,
      settleMs: options.settleMs ?? PORTAL.UI_SETTLE_MS,
      resultsSettleMs: options.resultsSettleMs ?? 2500,
      waitTimeoutMs: options.waitTimeoutMs ?? PORTAL.WAIT_TIMEOUT_MS,
      maxPages: options.maxPages ?? 50,
    };
  }

  /**
   * Export every result page for one month.
   *
   * @throws NavigationError if the form or result grid is missing
   */
  async fetch(
    session: BrowserSession,
    request: ReportRequest,
    fetchOptions: FetchOptions = {}
  ): Promise<DownloadResult> {
    const progress: ExportProgress = { files: [], seen: await this.watcher.snapshot() };

    try {
      return await retryWithBackoff(
        async (attempt) => {
          if (fetchOptions.reload || attempt > 1) {
            await this.reloadScreen(session);
          }
          await this.fillForm(session, request);
          await this.skipSavedPages(session, progress.files.length);
          await this.exportPages(session, request, progress);
          logger.info(
            { period: request.label, files: progress.files.length },
            "Report period downloaded"
          );
          return {
            status: "downloaded",
            request,
            files: [...progress.files],
            pages: progress.files.length,
          };
        },
        {
          maxAttempts: this.options.maxAttempts,
          initialDelayMs: this.options.retryDelayMs,
          label: `download ${request.label}`,
          shouldRetry: (error) => error instanceof DownloadTimeoutError,
        }
      );
    } catch (error) {
      if (error instanceof DownloadTimeoutError) {
        logger.error(
          { period: request.label, savedPages: progress.files.length },
          "Report download timed out"
        );
        return { status: "timeout", request, files: [...progress.files], error: error.message };
      }
      throw error;
    }
  }

  private async reloadScreen(session: BrowserSession): Promise<void> {
    logger.info("Reloading report screen");
    await session.reload();
    await this.require(session, PORTAL.SELECTORS.MONTH_INPUT, "Report form did not reappear after reload");
  }

  private async fillForm(session: BrowserSession, request: ReportRequest): Promise<void> {
    const S = PORTAL.SELECTORS;

    await this.require(session, S.MONTH_INPUT, "Month input not found");
    await session.click(S.MONTH_INPUT);
    await this.require(session, S.PICKER_OVERLAY, "Month picker did not open");

    await this.selectYear(session, request.year);

    const cell = monthCellSelector(request.month);
    await this.require(session, cell, `Month ${request.month} not offered by the picker`);
    await session.click(cell);
    await sleep(this.options.settleMs);

    logger.info(
      { period: request.label, shown: await session.attributeOf(S.MONTH_INPUT, "value") },
      "Month selected"
    );

    await this.require(session, S.INVOICE_TYPE_RADIO, "Invoice type option not found");
    await session.click(S.INVOICE_TYPE_RADIO);
    await this.require(session, S.BUSINESS_TYPE_RADIO, "Business type option not found");
    await session.click(S.BUSINESS_TYPE_RADIO);

    await this.require(session, S.SEARCH_BUTTON, "Search button not found");
    await session.click(S.SEARCH_BUTTON);
    await sleep(this.options.resultsSettleMs);

    if (await session.waitFor(S.PAGE_SIZE_SELECT, PORTAL.PROBE_TIMEOUT_MS)) {
      await session.select(S.PAGE_SIZE_SELECT, PORTAL.PAGE_SIZE);
      await sleep(this.options.settleMs);
    } else {
      logger.warn("Page size selector not found, keeping the portal default");
    }
  }

  /** Step the picker's year arrows until the requested year is shown */
  private async selectYear(session: BrowserSession, year: number): Promise<void> {
    const S = PORTAL.SELECTORS;
    const shown = parsePickerYear(await session.textOf(S.PICKER_YEAR));
    if (shown === null) {
      throw new NavigationError("Could not read the year shown by the month picker");
    }
    if (shown === year) return;

    await session.click(S.PICKER_YEAR);
    await sleep(this.options.settleMs);

    const arrow = year < shown ? S.PICKER_PREV_YEAR : S.PICKER_NEXT_YEAR;
    for (let i = 0; i < Math.abs(year - shown); i++) {
      await session.click(arrow);
      await sleep(this.options.settleMs);
    }
    logger.debug({ from: shown, to: year }, "Picker year changed");
  }

  /** Page forward past the pages an earlier attempt already saved */
  private async skipSavedPages(session: BrowserSession, saved: number): Promise<void> {
    const S = PORTAL.SELECTORS;
    for (let page = 1; page <= saved; page++) {
      if (!(await this.hasNextPage(session))) {
        throw new NavigationError(`Result page ${page + 1} is no longer available`);
      }
      await session.click(S.NEXT_PAGE_BUTTON);
      await sleep(this.options.settleMs);
    }
    if (saved > 0) logger.info({ page: saved + 1 }, "Resuming export");
  }

  private async exportPages(
    session: BrowserSession,
    request: ReportRequest,
    progress: ExportProgress
  ): Promise<void> {
    const S = PORTAL.SELECTORS;

    for (let page = progress.files.length + 1; page <= this.options.maxPages; page++) {
      await this.require(session, S.SELECT_ALL, "Result grid not found");
      if (!(await session.isChecked(S.SELECT_ALL))) {
        await session.click(S.SELECT_ALL);
      }

      await this.require(session, S.DOWNLOAD_BUTTON, "Download button not found");

      // A click that timed out on the previous attempt may have landed since
      let file = await this.watcher.findNewFile(progress.seen);
      if (file) {
        logger.warn({ period: request.label, page, file }, "Late download taken for this page");
      } else {
        await session.click(S.DOWNLOAD_BUTTON);
        file = await this.watcher.waitForNewFile(progress.seen);
      }
      progress.seen.add(path.basename(file));
      progress.files.push(file);
      logger.info({ period: request.label, page, file }, "Result page exported");

      if (!(await this.hasNextPage(session))) return;

      await session.click(S.NEXT_PAGE_BUTTON);
      await sleep(this.options.settleMs);
    }

    logger.warn(
      { period: request.label, maxPages: this.options.maxPages },
      "Page limit reached, remaining pages skipped"
    );
  }

  private async hasNextPage(session: BrowserSession): Promise<boolean> {
    const S = PORTAL.SELECTORS;
    return (
      (await session.exists(S.NEXT_PAGE_BUTTON)) &&
      !(await session.isDisabled(S.NEXT_PAGE_BUTTON))
    );
  }

  private async require(session: BrowserSession, selector: string, message: string): Promise<void> {
    if (!(await session.waitFor(selector, this.options.waitTimeoutMs))) {
      throw new NavigationError(message);
    }
  }
}
