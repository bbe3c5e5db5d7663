/**
 * Audio Challenge Source
 *
 * Gets the spoken version of the login CAPTCHA from the portal:
 * 1. Click the "語音播放圖形驗證碼" button
 * 2. Wait for the <audio> element to carry a source different from the
 *    challenge's current reference (a reused clip means a stale challenge)
 * 3. Download the clip inside the page so the session cookies apply
 *
 * refresh() asks the portal for a new CAPTCHA between attempts.
 */
import { PORTAL } from "../../config/constants";
import { BrowserSession } from "../browser/browser-session";
import { CaptchaChallenge } from "../../shared/types/portal.types";
import { CaptchaExpiredError } from "../../shared/errors/captcha.errors";
import { NavigationError } from "../../shared/errors/portal.errors";
import { sleep } from "../../shared/utils/retry";
import { logger } from "../../monitoring/logger";

export interface AudioChallengeOptions {
  /** How long to wait for a new audio source after clicking play */
  sourceTimeoutMs: number;
  pollIntervalMs: number;
  /** Pause after clicking refresh while the portal redraws the CAPTCHA */
  settleMs: number;
  now: () => number;
}

export class AudioChallengeSource {
  private options: AudioChallengeOptions;

  constructor(options: Partial<AudioChallengeOptions> = {}) {
    this.options = {
      sourceTimeoutMs: options.sourceTimeoutMs ?? PORTAL.WAIT_TIMEOUT_MS,
      pollIntervalMs: options.pollIntervalMs ?? 250,
      settleMs: options.settleMs ?? PORTAL.UI_SETTLE_MS,
      now: options.now ?? Date.now,
    };
  }

  /**
   * Fetch the audio clip for the active challenge and make it the
   * challenge's current reference.
   *
   * @throws NavigationError if the audio button is missing
   * @throws CaptchaExpiredError if the portal keeps serving the previous clip
   */
  async fetch(session: BrowserSession, challenge: CaptchaChallenge): Promise<Buffer> {
    const { CAPTCHA_AUDIO_BTN } = PORTAL.SELECTORS;

    if (!(await session.waitFor(CAPTCHA_AUDIO_BTN, PORTAL.WAIT_TIMEOUT_MS))) {
      throw new NavigationError("Audio CAPTCHA button not found on login page");
    }
    await session.click(CAPTCHA_AUDIO_BTN);

    const source = await this.waitForNewSource(session, challenge.audioReference);
    if (!source) {
      throw new CaptchaExpiredError(
        "stale-audio",
        "Portal did not serve a new audio clip"
      );
    }

    const url = new URL(source, session.currentUrl()).toString();
    const audio = await session.fetchBytes(url);

    challenge.audioReference = source;
    challenge.issuedAt = this.options.now();

    logger.info(
      { attempt: challenge.attemptCount + 1, bytes: audio.length },
      "Audio challenge fetched"
    );
    return audio;
  }

  /**
   * Ask the portal for a new CAPTCHA. When the page has no refresh control
   * the next play click is expected to produce a new clip by itself;
   * fetch() rejects it otherwise.
   */
  async refresh(session: BrowserSession): Promise<void> {
    const { CAPTCHA_REFRESH_BTN } = PORTAL.SELECTORS;
    if (await session.exists(CAPTCHA_REFRESH_BTN)) {
      await session.click(CAPTCHA_REFRESH_BTN);
      await sleep(this.options.settleMs);
      logger.info("CAPTCHA refreshed");
    } else {
      logger.debug("No CAPTCHA refresh control, relying on a new audio clip");
    }
  }

  private async waitForNewSource(
    session: BrowserSession,
    previous: string | null
  ): Promise<string | null> {
    const deadline = this.options.now() + this.options.sourceTimeoutMs;

    for (;;) {
      const source = await session.attributeOf(PORTAL.SELECTORS.CAPTCHA_AUDIO, "src");
      if (source && source !== previous) return source;
      if (this.options.now() >= deadline) return null;
      await sleep(this.options.pollIntervalMs);
    }
  }
}
