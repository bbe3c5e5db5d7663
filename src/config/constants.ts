/**
 * Application Constants
 *
 * Static values that don't change per environment.
 * Includes e-invoice portal selectors, the spoken-numeral table,
 * error codes and retry settings.
 */

// --- E-Invoice Portal ---
export const PORTAL = {
  /** Selectors used to drive the portal through the browser session */
  SELECTORS: {
    // Login
    BUSINESS_LOGIN_LINK: 'a[href^="/accounts/login/b"]',
    BUSINESS_ID_INPUT: "#ban",
    USER_ID_INPUT: "#user_id",
    PASSWORD_INPUT: "#user_password",
    CAPTCHA_INPUT: "#captcha",
    LOGIN_SUBMIT: "#submitBtn",
    CAPTCHA_AUDIO_BTN: 'button[title="語音播放圖形驗證碼"]',
    CAPTCHA_REFRESH_BTN: 'button[title="更新圖形驗證碼"]',
    CAPTCHA_AUDIO: "audio",
    /** Where the portal renders validation messages and alerts */
    FEEDBACK: '.invalid-feedback, .alert, .swal2-html-container, [role="alert"]',

    // Post-login popups
    POPUP_CLOSE: [
      'button[aria-label="Close"]',
      ".modal-close",
      ".close",
      "button.btn-close",
      '[data-dismiss="modal"]',
    ],
    POPUP_BUTTON: "button",

    // Menu path to the B2B single query/download screen
    MENU_PATH: [
      "#headingFunctionB2B_MENU",
      "#headingFunctionB2BC_SINGLE_QRY_DOWN",
      "#headingFunctionBTB412W",
    ],

    // Report form
    MONTH_INPUT: "#dp-input-date01",
    PICKER_OVERLAY: ".dp__overlay.dp--overlay-relative",
    PICKER_YEAR: ".dp__btn.dp--year-select",
    PICKER_PREV_YEAR: ".dp__btn.dp--arrow-btn-nav[aria-label='Previous year']",
    PICKER_NEXT_YEAR: ".dp__btn.dp--arrow-btn-nav[aria-label='Next year']",
    INVOICE_TYPE_RADIO: "#queryInvType_1",
    BUSINESS_TYPE_RADIO: "#businessType_1",
    SEARCH_BUTTON: 'button[title="查詢"]',
    PAGE_SIZE_SELECT: 'select[title="分頁"]',
    SELECT_ALL: "#checkbox-all",
    DOWNLOAD_BUTTON: 'button[title="下載Excel檔"]',
    NEXT_PAGE_BUTTON: 'button[title="下一頁"]',
  },
  /** Text on buttons that close the post-login announcement dialogs */
  POPUP_TEXTS: ["關閉", "確定", "OK", "Close"],
  /** Largest page size offered by the result grid */
  PAGE_SIZE: "1000",
  /** Maximum wait time for page elements */
  WAIT_TIMEOUT_MS: 10000,
  /** Short wait used when probing optional elements such as popups */
  PROBE_TIMEOUT_MS: 3000,
  /** Pause after a click so the portal's Vue components can re-render */
  UI_SETTLE_MS: 500,
} as const;

/** Month selector cell in the date picker, e.g. div[data-test="3月"] */
export function monthCellSelector(month: number): string {
  return `div[data-test="${month}月"]`;
}

// --- Report Periods ---
export const REPORT_PERIOD = {
  /** Portal dates are Taiwan local dates */
  TIMEZONE: "Asia/Taipei",
  /** Up to and including this day, the prior month is fetched as well */
  SUPPLEMENTARY_WINDOW_DAYS: 7,
} as const;

// --- Spoken Numerals ---
// Characters and words the speech engine emits for the digits of the
// audio challenge. The clip is read in Mandarin, so most entries are
// Chinese numerals; "E" is a frequent misrecognition of 一.
export const NUMERAL_CHARS: Readonly<Record<string, string>> = {
  "零": "0", "〇": "0", "一": "1", "二": "2", "兩": "2", "两": "2",
  "三": "3", "四": "4", "五": "5", "六": "6", "七": "7", "八": "8",
  "九": "9", "幺": "1", "壹": "1", "貳": "2", "參": "3", "肆": "4",
  "伍": "5", "陸": "6", "柒": "7", "捌": "8", "玖": "9", "E": "1",
};

export const NUMERAL_WORDS: Readonly<Record<string, string>> = {
  zero: "0", oh: "0", one: "1", two: "2", three: "3", four: "4",
  five: "5", six: "6", seven: "7", eight: "8", nine: "9",
};

// --- Error Codes ---
// Classified error types for the run report and retry decisions.
export const ERROR_CODES = {
  TRANSCRIPTION_FAILED: "TRANSCRIPTION_FAILED",
  CAPTCHA_REJECTED: "CAPTCHA_REJECTED",
  CAPTCHA_EXPIRED: "CAPTCHA_EXPIRED",
  CAPTCHA_EXHAUSTED: "CAPTCHA_EXHAUSTED",
  LOGIN_FAILED: "LOGIN_FAILED",
  NAVIGATION_FAILED: "NAVIGATION_FAILED",
  DOWNLOAD_TIMEOUT: "DOWNLOAD_TIMEOUT",
  CONFIG_INVALID: "CONFIG_INVALID",
  UNKNOWN: "UNKNOWN",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// --- Retry Configuration ---
export const RETRY_CONFIG = {
  /** Page loads of the login screen */
  NAVIGATION_ATTEMPTS: 3,
  NAVIGATION_DELAY_MS: 3000,
  /** A timed-out report download is retried once */
  DOWNLOAD_ATTEMPTS: 2,
  DOWNLOAD_DELAY_MS: 2000,
} as const;
