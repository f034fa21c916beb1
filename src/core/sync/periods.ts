export type Granularity = "DAY" | "WEEK" | "MONTH";

/** Calendar date as `YYYY-MM-DD`, always interpreted in UTC. */
export type IsoDate = string;

export type Period = {
  start: IsoDate;
  end: IsoDate;
  granularity: Granularity;
};

const DAY_MS = 24 * 60 * 60 * 1000;
const isoDatePattern = /^\d{4}-\d{2}-\d{2}$/;

export const parseIsoDate = (value: string): Date => {
  if (!isoDatePattern.test(value)) {
    throw new Error(`Invalid date: ${value} (expected YYYY-MM-DD)`);
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(parsed.getTime()) || formatIsoDate(parsed) !== value) {
    throw new Error(`Invalid date: ${value} (expected YYYY-MM-DD)`);
  }
  return parsed;
};

export const formatIsoDate = (date: Date): IsoDate => date.toISOString().slice(0, 10);

export const isIsoDate = (value: string): boolean => {
  try {
    parseIsoDate(value);
    return true;
  } catch {
    return false;
  }
};

export const addDays = (value: IsoDate, days: number): IsoDate =>
  formatIsoDate(new Date(parseIsoDate(value).getTime() + days * DAY_MS));

/** Amazon-style week: Sunday through Saturday. */
export const weekContaining = (value: IsoDate): Period => {
  const date = parseIsoDate(value);
  const start = addDays(value, -date.getUTCDay());
  return { start, end: addDays(start, 6), granularity: "WEEK" };
};

export const monthContaining = (value: IsoDate): Period => {
  const date = parseIsoDate(value);
  const first = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
  const last = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0));
  return { start: formatIsoDate(first), end: formatIsoDate(last), granularity: "MONTH" };
};

export const dayPeriod = (value: IsoDate): Period => ({ start: value, end: value, granularity: "DAY" });

/**
 * Most recent complete period whose data should be available, given that the
 * upstream publishes `delayHours` after the period closes.
 */
export const latestAvailablePeriod = (granularity: Granularity, now: Date, delayHours: number): Period => {
  const cutoff = formatIsoDate(new Date(now.getTime() - delayHours * 60 * 60 * 1000));
  // the cutoff day itself is still open
  const lastClosedDay = addDays(cutoff, -1);

  if (granularity === "DAY") return dayPeriod(lastClosedDay);

  if (granularity === "WEEK") {
    const week = weekContaining(lastClosedDay);
    return week.end === lastClosedDay ? week : weekContaining(addDays(week.start, -1));
  }

  const month = monthContaining(lastClosedDay);
  return month.end === lastClosedDay ? month : monthContaining(addDays(month.start, -1));
};

/**
 * Complete periods of the given granularity between `from` and `to`, newest first.
 * Weeks must start on or after `from`; months are included from the month containing `from`.
 */
export const enumeratePeriods = (granularity: Granularity, from: IsoDate, to: IsoDate): Period[] => {
  parseIsoDate(from);
  parseIsoDate(to);
  const periods: Period[] = [];

  if (granularity === "DAY") {
    for (let day = from; day <= to; day = addDays(day, 1)) periods.push(dayPeriod(day));
  } else if (granularity === "WEEK") {
    let week = weekContaining(from);
    if (week.start < from) week = weekContaining(addDays(week.start, 7));
    while (week.end <= to) {
      periods.push(week);
      week = weekContaining(addDays(week.start, 7));
    }
  } else {
    let month = monthContaining(from);
    while (month.start <= to) {
      if (month.end <= to) periods.push(month);
      month = monthContaining(addDays(month.end, 1));
    }
  }

  return periods.reverse();
};

/** Every calendar day of the period, oldest first. */
export const daysOf = (period: Period): IsoDate[] => {
  const days: IsoDate[] = [];
  for (let day = period.start; day <= period.end; day = addDays(day, 1)) days.push(day);
  return days;
};
