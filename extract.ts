import { tryParse, resolveReferenceYear, type ParseOptions } from "./explicit";
import { MONTH_ABBREVIATIONS } from "./labels";

/**
 * One hypothesised reading of a noisy date: the raw tokens taken as year, month and day.
 */
export interface CandidateCombo {
  year?: string;
  month?: string;
  day?: string;
}

type Occurrence = [text: string, index: number];

const MONTH_PATTERNS: readonly RegExp[] = [
  /[1-9]/g,
  /0[1-9]/g,
  /1[0-9]/g,
  ...MONTH_ABBREVIATIONS.map((month) => new RegExp(month, "gi")),
];

const DAY_PATTERNS: readonly RegExp[] = [/[1-9]/g, /0[1-9]/g, /1[0-9]/g, /2[0-9]/g, /3[01]/g];

function findAllMatches(text: string, patterns: readonly RegExp[]): string[] {
  return patterns.flatMap((pattern) => text.match(pattern) ?? []);
}

/**
 * Pairs every match with how many identical matches came before it.
 */
function withOccurrenceIndex(matches: string[]): Occurrence[] {
  const seen = new Map<string, number>();
  return matches.map((match): Occurrence => {
    const index = seen.get(match) ?? 0;
    seen.set(match, index + 1);
    return [match, index];
  });
}

/**
 * Every window of four consecutive digits, overlapping ones included, that is not
 * later than the reference year.
 */
function findYearCandidates(text: string, referenceYear: number): string[] {
  const years: string[] = [];
  for (let start = 0; start + 4 <= text.length; start += 1) {
    const window = text.slice(start, start + 4);
    if (/^\d{4}$/.test(window) && Number(window) <= referenceYear) {
      years.push(window);
    }
  }
  return years;
}

/**
 * Replaces the `index`-th non-overlapping occurrence of `needle`, leaving the text
 * untouched when there are fewer occurrences.
 */
export function replaceOccurrence(text: string, needle: string, index: number, replacement = " "): string {
  let from = 0;
  for (let seen = 0; ; seen += 1) {
    const at = text.indexOf(needle, from);
    if (at === -1) {
      return text;
    }
    if (seen === index) {
      return `${text.slice(0, at)}${replacement}${text.slice(at + needle.length)}`;
    }
    from = at + needle.length;
  }
}

function removeOccurrence(text: string, needle: string, index: number): string {
  return replaceOccurrence(text, needle, index).trim().replaceAll("  ", " ");
}

function comboLength(combo: CandidateCombo): number {
  return (combo.year?.length ?? 0) + (combo.month?.length ?? 0) + (combo.day?.length ?? 0);
}

function comboFieldCount(combo: CandidateCombo): number {
  return [combo.year, combo.month, combo.day].filter((field) => field !== undefined).length;
}

function compareCombos(a: CandidateCombo, b: CandidateCombo): number {
  return comboLength(b) - comboLength(a) || comboFieldCount(b) - comboFieldCount(a);
}

export function formatCombo(combo: CandidateCombo): string {
  return [combo.year, combo.month, combo.day].filter((field) => field !== undefined).join(" ");
}

/**
 * Enumerates the readings of `text` worth keeping, best first. Equally ranked
 * readings stay in the order they were found. The empty reading is always included.
 */
export function listCandidates(text: string, options: ParseOptions = {}): CandidateCombo[] {
  const combos = new Map<string, CandidateCombo>();
  const accept = (combo: CandidateCombo) => {
    const key = JSON.stringify([combo.year ?? null, combo.month ?? null, combo.day ?? null]);
    if (!combos.has(key)) {
      combos.set(key, combo);
    }
  };

  accept({});

  const years = withOccurrenceIndex(findYearCandidates(text, resolveReferenceYear(options)));
  for (const [year, yearIndex] of years) {
    accept({ year });

    const withoutYear = removeOccurrence(text, year, yearIndex);
    const months = withOccurrenceIndex(findAllMatches(withoutYear, MONTH_PATTERNS));
    for (const [month, monthIndex] of months) {
      accept({ year, month });

      const withoutMonth = removeOccurrence(withoutYear, month, monthIndex);
      for (const day of findAllMatches(withoutMonth, DAY_PATTERNS)) {
        if (tryParse(`${year} ${month} ${day}`, options).numFields > 0) {
          accept({ year, month, day });
        }
      }
    }
  }

  return [...combos.values()].sort(compareCombos);
}

/**
 * Folds equally ranked readings into what they agree on: the year only when every
 * reading names the same year, month and day only when every reading names both.
 */
function foldTies(tied: CandidateCombo[]): CandidateCombo {
  return tied.reduce((agreed, combo) => {
    const folded: CandidateCombo = {};
    if (agreed.year !== undefined && agreed.year === combo.year) {
      folded.year = agreed.year;
    }
    if (agreed.month === combo.month && agreed.day === combo.day) {
      if (agreed.month !== undefined) {
        folded.month = agreed.month;
      }
      if (agreed.day !== undefined) {
        folded.day = agreed.day;
      }
    }
    return folded;
  });
}

/**
 * Picks the most information-dense reading of `text`.
 *
 * @example extractCandidates("2 sep may 1999") // { year: "1999" }
 */
export function extractCandidates(text: string, options: ParseOptions = {}): CandidateCombo {
  const ranked = listCandidates(text, options);
  const [best] = ranked;
  const tied = ranked.filter((combo) => compareCombos(best, combo) === 0);
  return foldTies(tied);
}
