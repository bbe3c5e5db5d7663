#!/usr/bin/env node
/**
 * Entry Point: einvoice-download
 *
 * Builds the production collaborators from config and runs one download:
 * 1. Load and validate credentials, resolve the download directory
 * 2. Wire speech engine → CAPTCHA solver → navigator, and the report fetcher
 * 3. Run the orchestrator, print the itemized report
 * 4. Exit 0 (all periods), 2 (some periods) or 1 (aborted)
 */
import config from "./config";
import { loadCredentials, resolveDownloadDir } from "./config/credentials";
import { openPuppeteerSession } from "./scraping/browser/puppeteer-session";
import { WhisperClient } from "./scraping/captcha/whisper.client";
import { TranscriptionAdapter } from "./scraping/captcha/transcription-adapter";
import { AudioChallengeSource } from "./scraping/captcha/audio-challenge";
import { CaptchaSolver } from "./scraping/captcha/captcha-solver";
import { RetryController } from "./scraping/captcha/retry-controller";
import { SessionNavigator } from "./scraping/navigators/session-navigator";
import { DownloadWatcher } from "./scraping/downloaders/download-watcher";
import { ReportFetcher } from "./scraping/downloaders/report-fetcher";
import { RunOrchestrator } from "./workers/run.orchestrator";
import { EXIT_CODES, describeError, formatRunReport } from "./workers/run.report";
import { toPortalError } from "./shared/errors/portal.errors";
import { logger } from "./monitoring/logger";

let orchestrator: RunOrchestrator | null = null;

async function main(): Promise<number> {
  logger.info({ env: config.env, portal: config.portalBaseUrl }, "Starting e-invoice allowance download");

  const credentials = loadCredentials();
  const downloadDir = resolveDownloadDir(credentials);

  const audio = new AudioChallengeSource();
  const solver = new CaptchaSolver(
    new TranscriptionAdapter(new WhisperClient()),
    audio
  );
  const navigator = new SessionNavigator(new RetryController(solver, audio));
  const fetcher = new ReportFetcher(new DownloadWatcher(downloadDir));

  orchestrator = new RunOrchestrator({
    openSession: openPuppeteerSession,
    navigator,
    fetcher,
  });

  const report = await orchestrator.run({ credentials, downloadDir });
  for (const line of formatRunReport(report)) {
    logger.info(line);
  }
  return report.exitCode;
}

// --- Shutdown ---
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutdown signal received");

  try {
    if (orchestrator) await orchestrator.closeActiveSession();
    process.exit(EXIT_CODES.ABORTED);
  } catch (error) {
    logger.error({ error: describeError(error) }, "Error during shutdown");
    process.exit(EXIT_CODES.ABORTED);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  process.exit(EXIT_CODES.ABORTED);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(EXIT_CODES.ABORTED);
});

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    const portalError = toPortalError(error);
    logger.fatal({ code: portalError.code, error: describeError(error) }, "Run failed to start");
    process.exit(EXIT_CODES.ABORTED);
  });
