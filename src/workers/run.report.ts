/**
 * Run Report
 *
 * Exit code rules and the itemized summary printed at the end of a run.
 */
import { PeriodReport, RunReport, StepReport } from "../shared/types/run.types";
import { LoginError, toPortalError } from "../shared/errors/portal.errors";

export const EXIT_CODES = {
  SUCCESS: 0,
  ABORTED: 1,
  PARTIAL: 2,
} as const;

export function exitCodeFor(state: RunReport["state"], periods: PeriodReport[]): number {
  if (state === "ABORTED") return EXIT_CODES.ABORTED;
  if (periods.some((p) => p.status === "failed")) return EXIT_CODES.PARTIAL;
  return EXIT_CODES.SUCCESS;
}

/** One-line description of a failure, with the portal's own message if any */
export function describeError(error: unknown): string {
  if (error instanceof LoginError && error.portalMessage) {
    return `${error.message}: ${error.portalMessage}`;
  }
  return toPortalError(error).message;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatStep(step: StepReport): string {
  const suffix = [step.errorCode, step.detail].filter(Boolean).join(": ");
  return `  [${step.status}] ${step.step} (${seconds(step.durationMs)})${suffix ? ` - ${suffix}` : ""}`;
}

function formatPeriod(period: PeriodReport): string[] {
  const { request } = period;
  const head = `  ${request.label} ${request.periodStart}..${request.periodEnd}${
    request.isSupplementaryPriorMonth ? " (supplementary)" : ""
  }`;

  if (period.status === "downloaded") {
    return [
      `${head}: downloaded ${period.files.length} file(s)`,
      ...period.files.map((file) => `    ${file}`),
    ];
  }
  return [
    `${head}: failed [${period.errorCode ?? "UNKNOWN"}] ${period.error ?? ""}`.trimEnd(),
    ...period.files.map((file) => `    ${file}`),
  ];
}

export function formatRunReport(report: RunReport): string[] {
  const elapsed = report.finishedAt.getTime() - report.startedAt.getTime();
  const lines = [
    `Run ${report.state}${report.partial ? " (partial)" : ""} in ${seconds(elapsed)}, exit code ${report.exitCode}`,
    `States: ${report.history.join(" -> ")}`,
    "Steps:",
    ...report.steps.map(formatStep),
  ];

  if (report.periods.length > 0) {
    lines.push("Periods:", ...report.periods.flatMap(formatPeriod));
  }
  return lines;
}
