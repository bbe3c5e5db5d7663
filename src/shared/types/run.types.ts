/**
 * Run Types
 *
 * State machine and report shapes for a single invocation.
 */
import { ErrorCode } from "../../config/constants";
import { ReportRequest } from "./portal.types";

export type RunState =
  | "INIT"
  | "LOGGING_IN"
  | "NAVIGATING"
  | "FETCHING_CURRENT"
  | "FETCHING_PRIOR"
  | "CLOSING"
  | "DONE"
  | "ABORTED";

export type StepStatus = "succeeded" | "failed" | "skipped";

export interface StepReport {
  /** e.g. "login", "navigate", "fetch 2026年3月", "close session" */
  step: string;
  status: StepStatus;
  detail?: string;
  errorCode?: ErrorCode;
  durationMs: number;
}

export interface PeriodReport {
  request: ReportRequest;
  status: "downloaded" | "failed";
  files: string[];
  error?: string;
  errorCode?: ErrorCode;
}

export interface RunReport {
  state: "DONE" | "ABORTED";
  /** Every state entered, in order */
  history: RunState[];
  steps: StepReport[];
  periods: PeriodReport[];
  /** Some but not all periods were downloaded */
  partial: boolean;
  exitCode: number;
  startedAt: Date;
  finishedAt: Date;
}
