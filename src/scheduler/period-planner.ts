/**
 * Period Planner
 *
 * Decides which calendar months a run exports. The portal keeps
 * accepting allowance notes for the previous month during the first
 * week, so early in the month the prior month is fetched again.
 *
 * Order: current month first, prior month second.
 */
import moment from "moment-timezone";
import { REPORT_PERIOD } from "../config/constants";
import { ReportRequest } from "../shared/types/portal.types";
import { formatDay, formatMonthLabel, inTaipei } from "../shared/utils/date";

/** Build the request covering the whole calendar month containing `day` */
export function monthRequest(
  day: moment.Moment,
  isSupplementaryPriorMonth: boolean
): ReportRequest {
  const start = day.clone().startOf("month");
  const end = day.clone().endOf("month");
  const year = start.year();
  const month = start.month() + 1;

  return {
    periodStart: formatDay(start),
    periodEnd: formatDay(end),
    year,
    month,
    label: formatMonthLabel(year, month),
    isSupplementaryPriorMonth,
  };
}

/**
 * Plan the report requests for a run started at `now`.
 *
 * @returns one request, or two when the Taipei day-of-month is within
 *          the supplementary window
 */
export function planReportRequests(now: Date = new Date()): ReportRequest[] {
  const today = inTaipei(now);
  const requests = [monthRequest(today, false)];

  if (today.date() <= REPORT_PERIOD.SUPPLEMENTARY_WINDOW_DAYS) {
    const priorMonth = today.clone().startOf("month").subtract(1, "month");
    requests.push(monthRequest(priorMonth, true));
  }

  return requests;
}
