// Year-month period helpers ('YYYY-MM')

const PERIOD_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/;

export interface YearMonth {
  readonly year: number;
  readonly month: number;          // 1-12
}

export function parsePeriod(period: string): YearMonth | null {
  const m = PERIOD_PATTERN.exec(period);
  if (!m) return null;
  return { year: Number(m[1]), month: Number(m[2]) };
}

export function formatPeriod({ year, month }: YearMonth): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/** Months since year 0, for ordering and gap checks. */
export function periodIndex({ year, month }: YearMonth): number {
  return year * 12 + (month - 1);
}

export function addMonths(period: YearMonth, months: number): YearMonth {
  const idx = periodIndex(period) + months;
  return { year: Math.floor(idx / 12), month: (idx % 12) + 1 };
}

export function quarterOf(month: number): number {
  return Math.floor((month - 1) / 3) + 1;
}
