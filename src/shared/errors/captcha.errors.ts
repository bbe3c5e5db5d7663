/**
 * CAPTCHA-Specific Error Classes
 *
 * Granular errors for the audio CAPTCHA pipeline.
 * Raised inside the challenge solver and turned into solve outcomes there;
 * the orchestrator only ever sees CaptchaExhaustedError.
 */
import { ERROR_CODES } from "../../config/constants";
import { ExpireReason, RejectReason } from "../types/portal.types";
import { PortalError } from "./portal.errors";

/** Speech engine unreachable, failed, or returned nothing */
export class TranscriptionError extends PortalError {
  constructor(message: string = "Transcription failed") {
    super(message, ERROR_CODES.TRANSCRIPTION_FAILED, true);
    this.name = "TranscriptionError";
  }
}

/** The answer was wrong or could not be used */
export class CaptchaRejectedError extends PortalError {
  public readonly reason: RejectReason;

  constructor(reason: RejectReason, message: string = "CAPTCHA answer rejected") {
    super(message, ERROR_CODES.CAPTCHA_REJECTED, true);
    this.name = "CaptchaRejectedError";
    this.reason = reason;
  }
}

/** The challenge went stale before or during submission */
export class CaptchaExpiredError extends PortalError {
  public readonly reason: ExpireReason;

  constructor(reason: ExpireReason, message: string = "CAPTCHA challenge expired") {
    super(message, ERROR_CODES.CAPTCHA_EXPIRED, true);
    this.name = "CaptchaExpiredError";
    this.reason = reason;
  }
}
