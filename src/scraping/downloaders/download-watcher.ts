/**
 * Download Watcher
 *
 * Detects files the browser saves into the download directory. Chrome
 * writes to a ".crdownload" file and renames it when done, so a new
 * entry without a partial-download suffix is a finished download.
 * File names are chosen by the portal and are not interpreted.
 */
import * as fs from "fs";
import * as path from "path";
import config from "../../config";
import { DownloadTimeoutError } from "../../shared/errors/portal.errors";
import { sleep } from "../../shared/utils/retry";
import { logger } from "../../monitoring/logger";

const PARTIAL_SUFFIXES = [".crdownload", ".tmp", ".part"];

export function isCompletedDownload(name: string): boolean {
  if (name.startsWith(".")) return false;
  const lower = name.toLowerCase();
  return !PARTIAL_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

/** Matches on `code` alone: fs errors can come from another realm than this `Error` */
function isMissingEntry(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export interface DownloadWatcherOptions {
  timeoutMs: number;
  pollIntervalMs: number;
}

export class DownloadWatcher {
  readonly directory: string;
  private options: DownloadWatcherOptions;

  constructor(directory: string, options: Partial<DownloadWatcherOptions> = {}) {
    this.directory = directory;
    this.options = {
      timeoutMs: options.timeoutMs ?? config.downloadTimeoutMs,
      pollIntervalMs: options.pollIntervalMs ?? config.downloadPollMs,
    };
  }

  /** Names of the completed files currently in the directory */
  async snapshot(): Promise<Set<string>> {
    try {
      const entries = await fs.promises.readdir(this.directory);
      return new Set(entries.filter(isCompletedDownload));
    } catch (error) {
      if (isMissingEntry(error)) {
        return new Set();
      }
      throw error;
    }
  }

  /** Path of the first completed file not in `known`, by name, or null */
  async findNewFile(known: Set<string>): Promise<string | null> {
    const current = await this.snapshot();
    const added = [...current].filter((name) => !known.has(name)).sort();
    return added.length > 0 ? path.join(this.directory, added[0]) : null;
  }

  /**
   * Wait for a completed file that was not in `known`.
   *
   * @returns absolute path of the new file
   * @throws DownloadTimeoutError if none appears within the timeout
   */
  async waitForNewFile(known: Set<string>): Promise<string> {
    const { timeoutMs, pollIntervalMs } = this.options;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const file = await this.findNewFile(known);
      if (file) {
        logger.info({ file }, "Download completed");
        return file;
      }
      if (Date.now() >= deadline) break;
      await sleep(pollIntervalMs);
    }

    logger.warn(
      { directory: this.directory, timeoutMs },
      "No new file in download directory"
    );
    throw new DownloadTimeoutError(timeoutMs);
  }
}
