/**
 * CAPTCHA Response Classifier
 *
 * Reads what the portal said after a login submit. The portal gives no
 * machine-readable status, so the decision is text matching over its
 * feedback messages, with patterns taken from configuration
 * (CAPTCHA_REJECTED_PATTERNS, CAPTCHA_EXPIRED_PATTERNS, LOGIN_ERROR_PATTERNS).
 *
 * Precedence: rejected, then expired, then login error.
 */
import config from "../../config";

export interface ResponseSignals {
  rejectedPatterns: string[];
  expiredPatterns: string[];
  loginErrorPatterns: string[];
}

export type FeedbackKind = "rejected" | "expired" | "login-error" | "none";

export interface Feedback {
  kind: FeedbackKind;
  /** The message that matched */
  message?: string;
}

export const DEFAULT_SIGNALS: ResponseSignals = {
  rejectedPatterns: config.captchaRejectedPatterns,
  expiredPatterns: config.captchaExpiredPatterns,
  loginErrorPatterns: config.loginErrorPatterns,
};

function findMatch(messages: string[], patterns: string[]): string | undefined {
  return messages.find((message) =>
    patterns.some((pattern) => message.includes(pattern))
  );
}

export function classifyFeedback(
  messages: string[],
  signals: ResponseSignals = DEFAULT_SIGNALS
): Feedback {
  const checks: Array<[Exclude<FeedbackKind, "none">, string[]]> = [
    ["rejected", signals.rejectedPatterns],
    ["expired", signals.expiredPatterns],
    ["login-error", signals.loginErrorPatterns],
  ];

  for (const [kind, patterns] of checks) {
    const message = findMatch(messages, patterns);
    if (message !== undefined) return { kind, message };
  }
  return { kind: "none" };
}
