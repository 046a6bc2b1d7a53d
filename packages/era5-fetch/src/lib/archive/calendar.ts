export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

/**
 * Last calendar day of a month under Gregorian rules.
 * `month` is 1-based.
 */
export function daysInMonth(year: number, month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`month must be 1-12, got ${month}`);
  }
  if (month === 2 && isLeapYear(year)) return 29;
  return MONTH_LENGTHS[month - 1];
}

export function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

/** `YYYYMM` */
export function yearMonth(year: number, month: number): string {
  return `${year}${pad2(month)}`;
}

/** `YYYYMMDD` */
export function yearMonthDay(year: number, month: number, day: number): string {
  return `${yearMonth(year, month)}${pad2(day)}`;
}
