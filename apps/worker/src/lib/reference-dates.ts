import { parseCalendarDate } from "./coercion";
import { ValidationError } from "./errors";
import { logWarn } from "./logger";

export const MAX_RANGE_DAYS = 90;

const DAY_MS = 24 * 60 * 60 * 1000;

const toUtcDate = (value: string): Date => new Date(`${value}T00:00:00.000Z`);

const formatIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

const isWeekday = (date: Date) => date.getUTCDay() !== 0 && date.getUTCDay() !== 6;

const parseIsoDate = (value: string, label: string): string => {
  const trimmed = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}$/.test(trimmed) || parseCalendarDate(trimmed) !== trimmed) {
    throw new ValidationError(`${label} must be a YYYY-MM-DD date, received "${value}".`);
  }
  return trimmed;
};

export const previousBusinessDay = (today: Date): string => {
  let cursor = new Date(
    Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate()) - DAY_MS
  );
  while (!isWeekday(cursor)) {
    cursor = new Date(cursor.getTime() - DAY_MS);
  }
  return formatIsoDate(cursor);
};

export const businessDaysBetween = (start: string, end: string): string[] => {
  const startDate = toUtcDate(parseIsoDate(start, "Range start"));
  let endDate = toUtcDate(parseIsoDate(end, "Range end"));
  if (startDate > endDate) {
    throw new ValidationError(`Range start ${start} is after range end ${end}.`);
  }

  const spanDays = Math.round((endDate.getTime() - startDate.getTime()) / DAY_MS) + 1;
  if (spanDays > MAX_RANGE_DAYS) {
    endDate = new Date(startDate.getTime() + (MAX_RANGE_DAYS - 1) * DAY_MS);
    logWarn("REFERENCE_RANGE_TRUNCATED", {
      referenceDate: `${start}:${formatIsoDate(endDate)}`,
      recordCount: spanDays
    });
  }

  const days: string[] = [];
  for (let cursor = startDate; cursor <= endDate; cursor = new Date(cursor.getTime() + DAY_MS)) {
    if (isWeekday(cursor)) {
      days.push(formatIsoDate(cursor));
    }
  }
  return days;
};

export const resolveReferenceDates = ({
  date,
  range,
  today = new Date()
}: {
  date?: string;
  range?: string;
  today?: Date;
}): string[] => {
  if (date && range) {
    throw new ValidationError("Provide either a reference date or a date range, not both.");
  }
  if (date) {
    return [parseIsoDate(date, "Reference date")];
  }
  if (range) {
    const [start, end, ...rest] = range.split(":");
    if (!start || !end || rest.length > 0) {
      throw new ValidationError(`Date range must look like YYYY-MM-DD:YYYY-MM-DD, received "${range}".`);
    }
    return businessDaysBetween(start, end);
  }
  return [previousBusinessDay(today)];
};
