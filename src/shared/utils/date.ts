/**
 * Timezone-Aware Date Utilities
 *
 * Report periods use Asia/Taipei because the portal files invoices
 * under Taiwan local dates.
 */
import moment from "moment-timezone";
import { REPORT_PERIOD } from "../../config/constants";

const TIMEZONE = REPORT_PERIOD.TIMEZONE;

/** Get a moment in Taipei time, now or for the given instant */
export function inTaipei(date: Date | string = new Date()): moment.Moment {
  return moment(date).tz(TIMEZONE);
}

/** Format as an ISO calendar date (YYYY-MM-DD) */
export function formatDay(m: moment.Moment): string {
  return m.format("YYYY-MM-DD");
}

/** Portal month label, e.g. "2026年3月" */
export function formatMonthLabel(year: number, month: number): string {
  return `${year}年${month}月`;
}

/**
 * Parse the year shown by the portal's date picker ("2026年" or "2026").
 * @returns null when the text holds no 4-digit year
 */
export function parsePickerYear(text: string | null): number | null {
  if (!text) return null;
  const match = text.match(/(\d{4})/);
  return match ? parseInt(match[1], 10) : null;
}
