/**
 * Portal Types
 *
 * Data structures exchanged between the CAPTCHA pipeline, the navigator
 * and the report fetcher.
 */

/**
 * Login record for one business account. Frozen once loaded.
 */
export interface Credentials {
  /** Unified business number (統一編號), 8 digits */
  readonly businessId: string;
  readonly userId: string;
  readonly password: string;
  /** OS account name, used to resolve the default download directory */
  readonly localUsername: string;
}

/**
 * The login CAPTCHA being worked on. Only one is active per session;
 * fetching a new clip replaces audioReference and invalidates the old one.
 */
export interface CaptchaChallenge {
  /** Source URL of the current audio clip, null before the first fetch */
  audioReference: string | null;
  /** Epoch ms when the current clip was fetched */
  issuedAt: number;
  /** Failed attempts so far */
  attemptCount: number;
  readonly maxAttempts: number;
}

export interface TranscriptionResult {
  /** Text as returned by the speech engine */
  rawText: string;
  /** Digits only, after numeral mapping */
  digits: string;
  confidence?: number;
}

export type RejectReason =
  | "transcription-failed"
  | "empty-transcription"
  | "length-mismatch"
  | "wrong-answer"
  | "no-transition";

export type ExpireReason =
  | "stale-audio"
  | "transcription-timeout"
  | "challenge-stale"
  | "portal-expired";

/**
 * Result of a single CAPTCHA attempt.
 * "expired" is kept apart from "rejected" so the log shows whether the
 * answer was wrong or simply arrived too late.
 */
export type SolveOutcome =
  | { status: "solved"; answer: string; portalMessage?: string }
  | { status: "rejected"; reason: RejectReason; answer?: string }
  | { status: "expired"; reason: ExpireReason };

/**
 * One calendar month of records to export.
 */
export interface ReportRequest {
  /** First day of the month, YYYY-MM-DD */
  periodStart: string;
  /** Last day of the month, YYYY-MM-DD */
  periodEnd: string;
  year: number;
  /** 1-12 */
  month: number;
  /** Portal display form, e.g. "2026年3月" */
  label: string;
  isSupplementaryPriorMonth: boolean;
}

export type DownloadResult =
  | {
      status: "downloaded";
      request: ReportRequest;
      /** Absolute paths of the exported files, one per result page */
      files: string[];
      pages: number;
    }
  | {
      status: "timeout";
      request: ReportRequest;
      /** Pages saved before the second timeout */
      files: string[];
      error: string;
    };
