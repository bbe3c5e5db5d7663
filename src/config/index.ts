/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Runtime: environment and log level
 * - Portal: e-invoice portal URLs
 * - Credentials: location of the login record
 * - Browser: Chromium executable, headless mode, timeouts
 * - Captcha: attempt bound, answer length, challenge lifetime
 * - Transcription: Whisper-compatible endpoint settings
 * - Detection: text patterns that classify the portal's CAPTCHA feedback
 * - Download: target directory and wait limits
 */
import dotenv from "dotenv";

dotenv.config();

/** Split a "|"-separated env value into trimmed, non-empty entries */
function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value
    .split("|")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

const env = process.env.NODE_ENV || "development";

const config = {
  // --- Runtime ---
  env,
  logLevel: process.env.LOG_LEVEL || (env === "test" ? "silent" : "info"),

  // --- E-Invoice Portal ---
  portalBaseUrl:
    process.env.PORTAL_BASE_URL || "https://www.einvoice.nat.gov.tw",
  loginPath: process.env.PORTAL_LOGIN_PATH || "/accounts/login",
  dashboardPath: process.env.PORTAL_DASHBOARD_PATH || "/dashboard",

  // --- Credentials ---
  credentialsFile: process.env.CREDENTIALS_FILE || "loginInfo.json",

  // --- Browser ---
  chromePath: process.env.CHROME_PATH || "",
  headless: (process.env.HEADLESS || "true") !== "false",
  pageTimeoutMs: parseInt(process.env.PAGE_TIMEOUT_MS || "30000", 10),
  navigationTimeoutMs: parseInt(
    process.env.NAVIGATION_TIMEOUT_MS || "15000",
    10
  ),

  // --- Captcha ---
  captchaMaxAttempts: parseInt(process.env.CAPTCHA_MAX_ATTEMPTS || "3", 10),
  captchaDigits: parseInt(process.env.CAPTCHA_DIGITS || "5", 10),
  captchaTtlMs: parseInt(process.env.CAPTCHA_TTL_MS || "120000", 10),
  captchaSettleMs: parseInt(process.env.CAPTCHA_SETTLE_MS || "5000", 10),

  // --- Transcription (Whisper-compatible HTTP API) ---
  transcriptionUrl:
    process.env.TRANSCRIPTION_URL ||
    "https://api.openai.com/v1/audio/transcriptions",
  transcriptionApiKey: process.env.TRANSCRIPTION_API_KEY || "",
  transcriptionModel: process.env.TRANSCRIPTION_MODEL || "whisper-1",
  transcriptionLanguage: process.env.TRANSCRIPTION_LANGUAGE || "zh",
  transcriptionTimeoutMs: parseInt(
    process.env.TRANSCRIPTION_TIMEOUT_MS || "60000",
    10
  ),

  // --- CAPTCHA feedback detection ---
  captchaRejectedPatterns: parseList(process.env.CAPTCHA_REJECTED_PATTERNS, [
    "驗證碼錯誤",
    "驗證碼輸入錯誤",
    "驗證碼有誤",
    "驗證碼不正確",
  ]),
  captchaExpiredPatterns: parseList(process.env.CAPTCHA_EXPIRED_PATTERNS, [
    "驗證碼已過期",
    "驗證碼逾時",
    "驗證碼已失效",
    "請重新取得驗證碼",
  ]),
  loginErrorPatterns: parseList(process.env.LOGIN_ERROR_PATTERNS, [
    "密碼錯誤",
    "帳號或密碼",
    "帳號已鎖定",
    "重複登入",
  ]),

  // --- Download ---
  downloadDir: process.env.DOWNLOAD_DIR || "",
  downloadTimeoutMs: parseInt(process.env.DOWNLOAD_TIMEOUT_MS || "60000", 10),
  downloadPollMs: parseInt(process.env.DOWNLOAD_POLL_MS || "500", 10),
};

export type AppConfig = typeof config;

export default config;
