import type { PartialDate } from "./partialDate";

/**
 * Year-difference multipliers keyed by the lowest mean year they apply to. Older
 * records are less precise, so a year's difference costs less.
 */
const YEAR_BANDS: ReadonlyArray<readonly [floor: number, multiplier: number]> = [
  [1980, 10],
  [1970, 8],
  [1960, 6.5],
  [1950, 5],
  [1940, 4.5],
  [1930, 4],
  [1920, 3.5],
  [1910, 3],
  [1900, 2.5],
  [1890, 1],
  [1850, 0.6],
  [1800, 0.5],
  [1700, 0.45],
  [1600, 0.4],
  [1500, 0.35],
  [1400, 0.3],
  [1300, 0.25],
  [1200, 0.2],
  [1100, 0.15],
  [Number.NEGATIVE_INFINITY, 0.1],
];

const EXACT_MATCH_BONUS = 20;
const DAYS_PER_MONTH = 30.4;

export function yearMultiplier(meanYear: number): number {
  const band = YEAR_BANDS.find(([floor]) => meanYear >= floor);
  return band ? band[1] : 0.1;
}

function scoreMonths(difference: number): number {
  if (difference === 0) {
    return 5;
  }
  if (difference === 1) {
    return 3;
  }
  if (difference === 2) {
    return 1;
  }
  if (difference === 3) {
    return 0;
  }
  return -difference;
}

/**
 * Similarity of two partial dates; higher is closer. Only fields known in both
 * dates count, so the score is symmetric but not bounded.
 */
export function compareDates(a: PartialDate, b: PartialDate): number {
  let score = 0;
  let yearDifference: number | undefined;
  let monthDifference: number | undefined;
  let dayDifference: number | undefined;

  if (a.year !== undefined && b.year !== undefined) {
    yearDifference = Math.abs(a.year - b.year);
    score += 20 - yearDifference * yearMultiplier((a.year + b.year) / 2);
  }

  if (a.month !== undefined && b.month !== undefined) {
    monthDifference = Math.abs(a.month - b.month);
    // Likely latent bug: no wraparound, so December against January scores -11
    // where a one-month gap would score 9.
    score += scoreMonths(monthDifference);
  }

  if (a.day !== undefined && b.day !== undefined) {
    const direct = Math.abs(a.day - b.day);
    dayDifference = Math.min(direct, DAYS_PER_MONTH - direct);
    score += (10 - dayDifference * 3) / 2;
  }

  if (yearDifference === 0 && monthDifference === 0) {
    score += EXACT_MATCH_BONUS;
  }
  if (monthDifference === 0 && dayDifference === 0) {
    score += EXACT_MATCH_BONUS;
  }
  if (yearDifference === 0 && monthDifference === 0 && dayDifference === 0) {
    score += EXACT_MATCH_BONUS;
  }

  return score;
}

export { compareDates as compare };
