export type WeekCode = {
  year: number;
  week: number;
};

/** Splits a `YYYYWW` code such as 202415 into its year and week number. */
export function parseWeekCode(code: number | null): WeekCode | null {
  if (code === null || !Number.isInteger(code) || code <= 0) return null;
  return { year: Math.floor(code / 100), week: code % 100 };
}
