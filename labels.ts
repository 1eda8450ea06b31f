const MONTHS = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
} as const;

export const MONTH_ABBREVIATIONS: readonly string[] = Object.keys(MONTHS);

const MONTH_LOOKUP = new Map<string, number>(Object.entries(MONTHS));

export const BC_MARKER = "bc";

/**
 * Tokens the normalizer never fuses with neighbouring digits or discards as noise.
 */
export const PROTECTED_TOKENS: readonly string[] = [...MONTH_ABBREVIATIONS, BC_MARKER];

export function monthNumber(token: string): number | undefined {
  return MONTH_LOOKUP.get(token.toLowerCase());
}
