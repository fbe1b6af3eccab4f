import { PeriodLayout } from "../config";

export interface Period {
  year: number;
  month: number;
  day: number;
}

const MONTH_NAMES: Array<[string, number]> = [
  ["january", 1],
  ["jan", 1],
  ["february", 2],
  ["feb", 2],
  ["march", 3],
  ["mar", 3],
  ["april", 4],
  ["apr", 4],
  ["may", 5],
  ["june", 6],
  ["jun", 6],
  ["july", 7],
  ["jul", 7],
  ["august", 8],
  ["aug", 8],
  ["september", 9],
  ["sept", 9],
  ["sep", 9],
  ["october", 10],
  ["oct", 10],
  ["november", 11],
  ["nov", 11],
  ["december", 12],
  ["dec", 12],
];

// Federal fiscal quarters: Q1 closes Dec 31 of the prior calendar year.
const FISCAL_QUARTER_END: Record<number, { month: number; day: number; yearOffset: number }> = {
  1: { month: 12, day: 31, yearOffset: -1 },
  2: { month: 3, day: 31, yearOffset: 0 },
  3: { month: 6, day: 30, yearOffset: 0 },
  4: { month: 9, day: 30, yearOffset: 0 },
};

function period(year: number, month: number, day = 1): Period {
  return { year, month, day };
}

/**
 * Best-effort date embedded in link text, a file name or a URL.
 * Tried in order: "February 2026", "2026-02", "FY2025 Q3", "2026Q2", "FY2025", bare "2026".
 */
export function detectPeriod(text: string): Period | undefined {
  const normalized = text.toLowerCase();

  for (const [name, month] of MONTH_NAMES) {
    const match = normalized.match(new RegExp(`\\b${name}[-\\s]?(\\d{4})\\b`));
    if (match) {
      return period(Number.parseInt(match[1], 10), month);
    }
  }

  const yearMonth = normalized.match(/\b(\d{4})[-_](\d{1,2})\b/);
  if (yearMonth) {
    const year = Number.parseInt(yearMonth[1], 10);
    const month = Number.parseInt(yearMonth[2], 10);
    if (month >= 1 && month <= 12 && year >= 2000 && year <= 2100) {
      return period(year, month);
    }
  }

  let fiscal: { year: number; quarter: number } | undefined;
  const fyFirst = normalized.match(/(?:fy|fiscal\s*year)\s*(\d{4}).*?q(\d)/);
  if (fyFirst) {
    fiscal = { year: Number.parseInt(fyFirst[1], 10), quarter: Number.parseInt(fyFirst[2], 10) };
  } else {
    const quarterFirst = normalized.match(/q(\d).*?(?:fy|fiscal\s*year)\s*(\d{4})/);
    if (quarterFirst) {
      fiscal = { year: Number.parseInt(quarterFirst[2], 10), quarter: Number.parseInt(quarterFirst[1], 10) };
    }
  }
  if (fiscal) {
    const end = FISCAL_QUARTER_END[fiscal.quarter];
    if (end) {
      return period(fiscal.year + end.yearOffset, end.month, end.day);
    }
  }

  const calendarQuarter = normalized.match(/\b(\d{4})[-_]?q(\d)\b/);
  if (calendarQuarter) {
    const quarter = Number.parseInt(calendarQuarter[2], 10);
    if (quarter >= 1 && quarter <= 4) {
      return period(Number.parseInt(calendarQuarter[1], 10), (quarter - 1) * 3 + 1);
    }
  }

  // A fiscal year alone dates to its last day.
  const fiscalOnly = normalized.match(/(?:fy|fiscal\s*year)\s*(\d{4})(?!\d)/);
  if (fiscalOnly) {
    return period(Number.parseInt(fiscalOnly[1], 10), 9, 30);
  }

  const bareYear = normalized.match(/\b(20\d{2})\b/);
  if (bareYear) {
    return period(Number.parseInt(bareYear[1], 10), 1);
  }

  return undefined;
}

export function detectFiscalYear(text: string): number | undefined {
  const match = text.match(/FY\s?(\d{4}|\d{2})(?!\d)/i);
  if (!match) {
    return undefined;
  }
  const digits = match[1];
  return Number.parseInt(digits.length === 2 ? `20${digits}` : digits, 10);
}

export function fiscalYearOf(value: Period): number {
  return value.month >= 10 ? value.year + 1 : value.year;
}

export function comparePeriods(a: Period, b: Period): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** Uses 30-day months, so the cutoff drifts slightly from calendar months. */
export function isWithinMonths(value: Period, reference: Date, months: number): boolean {
  const cutoff = reference.getTime() - months * 30 * 24 * 60 * 60 * 1000;
  return Date.UTC(value.year, value.month - 1, value.day) >= cutoff;
}

export function periodSegment(layout: PeriodLayout, value: Period | undefined, text: string): string | undefined {
  switch (layout) {
    case "none":
      return undefined;
    case "year":
      return value ? String(value.year) : undefined;
    case "month":
      return value ? `${value.year}-${String(value.month).padStart(2, "0")}` : undefined;
    case "fiscal_year": {
      const fiscalYear = detectFiscalYear(text) ?? (value ? fiscalYearOf(value) : undefined);
      return fiscalYear !== undefined ? `FY${fiscalYear}` : undefined;
    }
  }
}
