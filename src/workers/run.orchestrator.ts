/**
 * Run Orchestrator
 *
 * Drives one invocation end to end:
 * 1. Open a browser session
 * 2. Log in (audio CAPTCHA included)
 * 3. Open the B2B query/download screen
 * 4. Download the current month, then the prior month early in the month
 * 5. Close the session
 *
 * Login and navigation failures abort the run. A period that fails is
 * recorded and the next one is still attempted; the run only aborts if
 * no period was downloaded. The session is closed on every path.
 */
import { BrowserSession, SessionFactory } from "../scraping/browser/browser-session";
import { SessionNavigator } from "../scraping/navigators/session-navigator";
import { ReportFetcher } from "../scraping/downloaders/report-fetcher";
import { planReportRequests } from "../scheduler/period-planner";
import { Credentials, ReportRequest } from "../shared/types/portal.types";
import { PeriodReport, RunReport, StepReport } from "../shared/types/run.types";
import { PortalError, toPortalError } from "../shared/errors/portal.errors";
import { ERROR_CODES } from "../config/constants";
import { logger } from "../monitoring/logger";
import { RunStateMachine } from "./run.state";
import { describeError, exitCodeFor } from "./run.report";

export interface OrchestratorDeps {
  openSession: SessionFactory;
  navigator: Pick<SessionNavigator, "login" | "openReportScreen">;
  fetcher: Pick<ReportFetcher, "fetch">;
  /** Period planning, replaceable for tests */
  plan?: (now: Date) => ReportRequest[];
}

export interface RunOptions {
  credentials: Credentials;
  downloadDir: string;
  now?: Date;
}

export class RunOrchestrator {
  private deps: OrchestratorDeps;
  private activeSession: BrowserSession | null = null;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  async run(options: RunOptions): Promise<RunReport> {
    const { navigator } = this.deps;
    const plan = this.deps.plan ?? planReportRequests;
    const machine = new RunStateMachine();
    const steps: StepReport[] = [];
    const periods: PeriodReport[] = [];
    const startedAt = new Date();
    let session: BrowserSession | null = null;

    try {
      machine.transition("LOGGING_IN");
      const opened = await this.step(steps, "open browser", () =>
        this.deps.openSession({ downloadDir: options.downloadDir })
      );
      session = opened;
      this.activeSession = opened;

      await this.step(steps, "login", () => navigator.login(opened, options.credentials));

      machine.transition("NAVIGATING");
      await this.step(steps, "open report screen", () => navigator.openReportScreen(opened));

      const requests = plan(options.now ?? new Date());
      logger.info(
        { periods: requests.map((r) => r.label) },
        "Report periods planned"
      );

      for (const [index, request] of requests.entries()) {
        machine.transition(index === 0 ? "FETCHING_CURRENT" : "FETCHING_PRIOR");
        periods.push(await this.fetchPeriod(opened, request, steps, index > 0));
      }

      if (!periods.some((p) => p.status === "downloaded")) {
        const failed = periods.find((p) => p.errorCode !== undefined);
        throw new PortalError(
          "No report period was downloaded",
          failed?.errorCode ?? ERROR_CODES.UNKNOWN
        );
      }

      machine.transition("CLOSING");
    } catch (error) {
      logger.error(
        { state: machine.state, error: describeError(error), code: toPortalError(error).code },
        "Run aborted"
      );
      machine.transition("ABORTED");
    } finally {
      if (session) {
        await this.closeSession(session, steps);
      }
    }

    if (machine.state === "CLOSING") {
      machine.transition("DONE");
    }

    const state = machine.state === "DONE" ? "DONE" : "ABORTED";
    const report: RunReport = {
      state,
      history: machine.history,
      steps,
      periods,
      partial: state === "DONE" && periods.some((p) => p.status === "failed"),
      exitCode: exitCodeFor(state, periods),
      startedAt,
      finishedAt: new Date(),
    };

    logger.info(
      { state: report.state, exitCode: report.exitCode, partial: report.partial },
      "Run finished"
    );
    return report;
  }

  /**
   * Close the session of a run still in progress (signal handlers).
   * The run then skips its own close.
   */
  async closeActiveSession(): Promise<void> {
    const session = this.activeSession;
    if (!session) return;
    this.activeSession = null;
    await session.close();
  }

  private async fetchPeriod(
    session: BrowserSession,
    request: ReportRequest,
    steps: StepReport[],
    reload: boolean
  ): Promise<PeriodReport> {
    const name = `fetch ${request.label}`;
    const started = Date.now();

    try {
      const result = await this.deps.fetcher.fetch(session, request, { reload });
      if (result.status === "downloaded") {
        steps.push({
          step: name,
          status: "succeeded",
          detail: `${result.files.length} file(s)`,
          durationMs: Date.now() - started,
        });
        return { request, status: "downloaded", files: result.files };
      }

      steps.push({
        step: name,
        status: "failed",
        detail: result.error,
        errorCode: ERROR_CODES.DOWNLOAD_TIMEOUT,
        durationMs: Date.now() - started,
      });
      return {
        request,
        status: "failed",
        files: result.files,
        error: result.error,
        errorCode: ERROR_CODES.DOWNLOAD_TIMEOUT,
      };
    } catch (error) {
      const portalError = toPortalError(error);
      logger.error(
        { period: request.label, error: portalError.message, code: portalError.code },
        "Report period failed"
      );
      steps.push({
        step: name,
        status: "failed",
        detail: portalError.message,
        errorCode: portalError.code,
        durationMs: Date.now() - started,
      });
      return {
        request,
        status: "failed",
        files: [],
        error: portalError.message,
        errorCode: portalError.code,
      };
    }
  }

  /** Run one fatal step, recording it before the error propagates */
  private async step<T>(
    steps: StepReport[],
    name: string,
    fn: () => Promise<T>
  ): Promise<T> {
    const started = Date.now();
    try {
      const value = await fn();
      steps.push({ step: name, status: "succeeded", durationMs: Date.now() - started });
      return value;
    } catch (error) {
      steps.push({
        step: name,
        status: "failed",
        detail: describeError(error),
        errorCode: toPortalError(error).code,
        durationMs: Date.now() - started,
      });
      throw error;
    }
  }

  private async closeSession(session: BrowserSession, steps: StepReport[]): Promise<void> {
    const started = Date.now();
    if (this.activeSession !== session) {
      steps.push({ step: "close session", status: "skipped", detail: "closed by shutdown", durationMs: 0 });
      return;
    }
    this.activeSession = null;
    try {
      await session.close();
      steps.push({ step: "close session", status: "succeeded", durationMs: Date.now() - started });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ error: message }, "Failed to close browser session");
      steps.push({
        step: "close session",
        status: "failed",
        detail: message,
        errorCode: ERROR_CODES.UNKNOWN,
        durationMs: Date.now() - started,
      });
    }
  }
}
