/**
 * Custom Error Classes for Portal Operations
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * The orchestrator uses the code for the run report and the
 * retryable flag to decide whether a step may be attempted again.
 */
import { ERROR_CODES, ErrorCode } from "../../config/constants";

/**
 * Base class for all portal errors.
 * Includes an error code for classification in the run report.
 */
export class PortalError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, retryable: boolean = false) {
    super(message);
    this.name = "PortalError";
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * Login did not reach the authenticated dashboard even though the CAPTCHA
 * was accepted (bad credentials, account locked, session active elsewhere).
 * Never retried: a wrong password repeated risks locking the account.
 */
export class LoginError extends PortalError {
  public readonly portalMessage?: string;

  constructor(
    message: string = "Login failed",
    portalMessage?: string,
    code: ErrorCode = ERROR_CODES.LOGIN_FAILED
  ) {
    super(message, code, false);
    this.name = "LoginError";
    this.portalMessage = portalMessage;
  }
}

/** The CAPTCHA retry bound was reached; the run cannot log in */
export class CaptchaExhaustedError extends LoginError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(
      `CAPTCHA not solved after ${attempts} attempts`,
      undefined,
      ERROR_CODES.CAPTCHA_EXHAUSTED
    );
    this.name = "CaptchaExhaustedError";
    this.attempts = attempts;
  }
}

/** An element the portal layout should contain is missing */
export class NavigationError extends PortalError {
  constructor(message: string = "Expected portal element not found") {
    super(message, ERROR_CODES.NAVIGATION_FAILED, false);
    this.name = "NavigationError";
  }
}

/** No downloaded file appeared in the download directory in time */
export class DownloadTimeoutError extends PortalError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, message?: string) {
    super(
      message || `No download completed within ${timeoutMs}ms`,
      ERROR_CODES.DOWNLOAD_TIMEOUT,
      true
    );
    this.name = "DownloadTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Credentials or settings are missing or malformed */
export class ConfigError extends PortalError {
  constructor(message: string = "Invalid configuration") {
    super(message, ERROR_CODES.CONFIG_INVALID, false);
    this.name = "ConfigError";
  }
}

/** Coerce anything thrown into a PortalError for reporting */
export function toPortalError(error: unknown): PortalError {
  if (error instanceof PortalError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PortalError(message, ERROR_CODES.UNKNOWN, false);
}
