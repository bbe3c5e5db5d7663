/**
 * CAPTCHA Retry Controller
 *
 * Runs the solver until it succeeds or the attempt bound is hit. Every
 * failed attempt is followed by a CAPTCHA refresh, so no clip or answer is
 * submitted twice. After the last failure nothing more is requested: the
 * portal locks accounts after repeated failures, so the run stops here.
 */
import { BrowserSession } from "../browser/browser-session";
import { CaptchaChallenge, SolveOutcome } from "../../shared/types/portal.types";
import { ConfigError } from "../../shared/errors/portal.errors";
import { logger } from "../../monitoring/logger";
import { AudioChallengeSource } from "./audio-challenge";
import { CaptchaSolver, ChallengeForm } from "./captcha-solver";

export interface SolveReport {
  solved: boolean;
  attempts: number;
  outcomes: SolveOutcome[];
  /** Message shown with an accepted CAPTCHA, usually a credential error */
  portalMessage?: string;
}

export class RetryController {
  private solver: CaptchaSolver;
  private audio: AudioChallengeSource;

  constructor(solver: CaptchaSolver, audio: AudioChallengeSource) {
    this.solver = solver;
    this.audio = audio;
  }

  /**
   * @returns true once the CAPTCHA is passed, false after maxAttempts failures
   */
  async solveWithRetries(
    session: BrowserSession,
    maxAttempts: number,
    form: ChallengeForm
  ): Promise<boolean> {
    const report = await this.run(session, maxAttempts, form);
    return report.solved;
  }

  /** Same loop as solveWithRetries, returning every outcome */
  async run(
    session: BrowserSession,
    maxAttempts: number,
    form: ChallengeForm
  ): Promise<SolveReport> {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigError(`CAPTCHA max attempts must be a positive integer, got ${maxAttempts}`);
    }

    const challenge: CaptchaChallenge = {
      audioReference: null,
      issuedAt: 0,
      attemptCount: 0,
      maxAttempts,
    };
    const outcomes: SolveOutcome[] = [];

    for (;;) {
      const outcome = await this.solver.attempt(session, challenge, form);
      outcomes.push(outcome);

      if (outcome.status === "solved") {
        logger.info(
          { attempts: outcomes.length },
          "CAPTCHA solved"
        );
        return {
          solved: true,
          attempts: outcomes.length,
          outcomes,
          portalMessage: outcome.portalMessage,
        };
      }

      challenge.attemptCount++;
      logger.warn(
        {
          attempt: challenge.attemptCount,
          maxAttempts,
          status: outcome.status,
          reason: outcome.reason,
        },
        "CAPTCHA attempt failed"
      );

      if (challenge.attemptCount >= maxAttempts) break;
      await this.audio.refresh(session);
    }

    logger.error(
      { attempts: challenge.attemptCount, maxAttempts },
      "CAPTCHA attempts exhausted"
    );
    return { solved: false, attempts: challenge.attemptCount, outcomes };
  }
}
