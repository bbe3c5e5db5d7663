/**
 * CAPTCHA Solver: one attempt at the login audio CAPTCHA
 *
 * Flow:
 * 1. Fetch a fresh audio clip (AudioChallengeSource)
 * 2. Transcribe it under a deadline (TranscriptionAdapter)
 * 3. Reject locally anything not worth a server round-trip:
 *    engine failure, no digits, wrong length, challenge too old
 * 4. Let the form refill its other fields, type the digits, submit
 * 5. Classify the portal's reaction
 *
 * Local rejections never touch the answer field, so an empty or garbled
 * transcription does not spend a server-side attempt.
 */
import config from "../../config";
import { PORTAL } from "../../config/constants";
import { BrowserSession } from "../browser/browser-session";
import { CaptchaChallenge, SolveOutcome } from "../../shared/types/portal.types";
import {
  CaptchaExpiredError,
  CaptchaRejectedError,
  TranscriptionError,
} from "../../shared/errors/captcha.errors";
import { withTimeout } from "../../shared/utils/timeout";
import { logger } from "../../monitoring/logger";
import { AudioChallengeSource } from "./audio-challenge";
import { TranscriptionAdapter } from "./transcription-adapter";
import { classifyFeedback, DEFAULT_SIGNALS, ResponseSignals } from "./response-classifier";

/**
 * The form the CAPTCHA answer is submitted with.
 */
export interface ChallengeForm {
  answerSelector: string;
  submitSelector: string;
  /** Elements whose text carries the portal's validation messages */
  feedbackSelector: string;
  /** While the URL still starts with this, the challenge has not been passed */
  challengeUrlPrefix: string;
  /** Fill the remaining fields before each submit; the portal may clear them */
  prepare?: (session: BrowserSession) => Promise<void>;
}

export interface SolverOptions {
  /** Expected answer length, 0 accepts any length */
  expectedDigits: number;
  transcriptionTimeoutMs: number;
  /** Oldest challenge still worth submitting */
  challengeTtlMs: number;
  /** How long to wait for the page to react to a submit */
  settleMs: number;
  signals: ResponseSignals;
  now: () => number;
}

export class CaptchaSolver {
  private adapter: TranscriptionAdapter;
  private audio: AudioChallengeSource;
  private options: SolverOptions;

  constructor(
    adapter: TranscriptionAdapter,
    audio: AudioChallengeSource,
    options: Partial<SolverOptions> = {}
  ) {
    this.adapter = adapter;
    this.audio = audio;
    this.options = {
      expectedDigits: options.expectedDigits ?? config.captchaDigits,
      transcriptionTimeoutMs:
        options.transcriptionTimeoutMs ?? config.transcriptionTimeoutMs,
      challengeTtlMs: options.challengeTtlMs ?? config.captchaTtlMs,
      settleMs: options.settleMs ?? config.captchaSettleMs,
      signals: options.signals ?? DEFAULT_SIGNALS,
      now: options.now ?? Date.now,
    };
  }

  /**
   * Make one attempt. Errors that are part of normal CAPTCHA play come
   * back as outcomes; anything else (missing form, browser failure) throws.
   */
  async attempt(
    session: BrowserSession,
    challenge: CaptchaChallenge,
    form: ChallengeForm
  ): Promise<SolveOutcome> {
    try {
      return await this.solveOnce(session, challenge, form);
    } catch (error) {
      if (error instanceof TranscriptionError) {
        logger.warn({ error: error.message }, "Transcription failed, answer not submitted");
        return { status: "rejected", reason: "transcription-failed" };
      }
      if (error instanceof CaptchaRejectedError) {
        logger.warn({ reason: error.reason }, error.message);
        return { status: "rejected", reason: error.reason };
      }
      if (error instanceof CaptchaExpiredError) {
        logger.warn({ reason: error.reason }, error.message);
        return { status: "expired", reason: error.reason };
      }
      throw error;
    }
  }

  private async solveOnce(
    session: BrowserSession,
    challenge: CaptchaChallenge,
    form: ChallengeForm
  ): Promise<SolveOutcome> {
    const audio = await this.audio.fetch(session, challenge);

    const { transcriptionTimeoutMs } = this.options;
    const result = await withTimeout(
      (signal) => this.adapter.transcribe(audio, signal),
      transcriptionTimeoutMs,
      () =>
        new CaptchaExpiredError(
          "transcription-timeout",
          `Transcription took longer than ${transcriptionTimeoutMs}ms`
        )
    );

    const answer = result.digits;
    if (answer.length === 0) {
      throw new CaptchaRejectedError(
        "empty-transcription",
        "Transcription has no digits, answer not submitted"
      );
    }

    const { expectedDigits } = this.options;
    if (expectedDigits > 0 && answer.length !== expectedDigits) {
      throw new CaptchaRejectedError(
        "length-mismatch",
        `Transcription has ${answer.length} digits, expected ${expectedDigits}`
      );
    }

    const age = this.options.now() - challenge.issuedAt;
    if (age > this.options.challengeTtlMs) {
      throw new CaptchaExpiredError(
        "challenge-stale",
        `Challenge is ${age}ms old, not submitting`
      );
    }

    if (form.prepare) await form.prepare(session);
    await session.type(form.answerSelector, answer);

    // Drop dialogs left over from earlier pages
    session.takeDialogMessages();
    await session.click(form.submitSelector);
    await session.waitForNavigation(this.options.settleMs);

    return this.inspect(session, form, answer);
  }

  private async inspect(
    session: BrowserSession,
    form: ChallengeForm,
    answer: string
  ): Promise<SolveOutcome> {
    const messages = [
      ...session.takeDialogMessages(),
      ...(await session.textsOf(form.feedbackSelector)),
    ];
    const feedback = classifyFeedback(messages, this.options.signals);

    switch (feedback.kind) {
      case "rejected":
        logger.warn({ message: feedback.message }, "Portal rejected the CAPTCHA answer");
        return { status: "rejected", reason: "wrong-answer", answer };
      case "expired":
        logger.warn({ message: feedback.message }, "Portal reported the CAPTCHA as expired");
        return { status: "expired", reason: "portal-expired" };
      case "login-error":
        // CAPTCHA accepted, credentials were not; the navigator reports it
        return { status: "solved", answer, portalMessage: feedback.message };
      case "none":
        break;
    }

    const leftChallenge = !session.currentUrl().startsWith(form.challengeUrlPrefix);
    const fieldGone = !(await session.exists(form.answerSelector));
    if (leftChallenge || fieldGone) {
      return { status: "solved", answer };
    }

    logger.warn(
      { url: session.currentUrl(), messages },
      "Page did not move past the CAPTCHA"
    );
    return { status: "rejected", reason: "no-transition", answer };
  }
}

/** Login-form wiring for the e-invoice portal */
export function loginChallengeForm(
  challengeUrlPrefix: string,
  prepare?: (session: BrowserSession) => Promise<void>
): ChallengeForm {
  return {
    answerSelector: PORTAL.SELECTORS.CAPTCHA_INPUT,
    submitSelector: PORTAL.SELECTORS.LOGIN_SUBMIT,
    feedbackSelector: PORTAL.SELECTORS.FEEDBACK,
    challengeUrlPrefix,
    prepare,
  };
}
