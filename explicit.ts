import * as chrono from "chrono-node";
import { BC_MARKER, monthNumber } from "./labels";

/**
 * Year reported when the text supplied no year at all.
 */
export const SENTINEL_YEAR = 9999;

export interface CalendarInstant {
  year: number;
  month: number;
  day: number;
}

export interface ExplicitParse {
  instant: CalendarInstant;
  /**
   * How many of year, month and day the text actually supplied (0-3).
   */
  numFields: number;
}

export interface ParseOptions {
  /**
   * Year treated as "now": the pivot for two-digit years and the upper bound for
   * year candidates. Defaults to the current calendar year.
   */
  referenceYear?: number;
}

export const REJECTED_INSTANT: Readonly<CalendarInstant> = Object.freeze({ year: 1, month: 1, day: 1 });

type DateLabel = "year" | "month";

type KnownComponents = { [component in chrono.Component]?: number };

interface DateValue {
  value: number;
  label?: DateLabel;
}

interface TokenLayout {
  values: DateValue[];
  clock?: string;
}

interface ResolvedFields {
  year?: number;
  month?: number;
  day?: number;
}

const BARE_TWO_DIGIT_PATTERN = /^0{0,2}\d{2}$/;
const BC_PATTERN = new RegExp(`\\b${BC_MARKER}\\b`);
const WHOLE_TEXT_PATTERN = /^.+$/;

const rejected = (): ExplicitParse => ({ instant: { ...REJECTED_INSTANT }, numFields: 0 });

export function resolveReferenceYear(options: ParseOptions = {}): number {
  return options.referenceYear ?? new Date().getFullYear();
}

function pushValue(values: DateValue[], entry: DateValue): boolean {
  if (entry.label && values.some((existing) => existing.label === entry.label)) {
    return false;
  }
  values.push(entry);
  return values.length <= 3;
}

/**
 * Reads the date values out of the token list, labelling the ones whose role is
 * certain. A number written with more than two digits is always a year. Returns
 * undefined when the tokens cannot form a date.
 */
function collectValues(tokens: string[]): TokenLayout | undefined {
  const layout: TokenLayout = { values: [] };
  const { values } = layout;

  for (const token of tokens) {
    const month = monthNumber(token);
    if (month !== undefined) {
      if (!pushValue(values, { value: month, label: "month" })) {
        return undefined;
      }
      continue;
    }

    if (!/^\d+$/.test(token)) {
      return undefined;
    }

    const length = token.length;

    if (values.length === 3 && layout.clock === undefined && (length === 2 || length === 4)) {
      // hh or hhmm trailing a complete date
      layout.clock = token;
      continue;
    }

    if (length === 6) {
      if (values.length) {
        if (layout.clock !== undefined) {
          return undefined;
        }
        layout.clock = token;
        continue;
      }
      // YYMMDD
      values.push(
        { value: Number(token.slice(0, 2)) },
        { value: Number(token.slice(2, 4)) },
        { value: Number(token.slice(4, 6)) },
      );
      continue;
    }

    if (length === 8 || length === 12 || length === 14) {
      // YYYYMMDD[hhmm[ss]]
      if (length > 8) {
        layout.clock = token.slice(8);
      }
      const accepted =
        pushValue(values, { value: Number(token.slice(0, 4)), label: "year" }) &&
        pushValue(values, { value: Number(token.slice(4, 6)) }) &&
        pushValue(values, { value: Number(token.slice(6, 8)) });
      if (!accepted) {
        return undefined;
      }
      continue;
    }

    const value = Number(token);
    if (!pushValue(values, length > 2 ? { value, label: "year" } : { value })) {
      return undefined;
    }
  }

  return layout;
}

function resolveFromLabels(values: DateValue[]): ResolvedFields {
  const fields: ResolvedFields = {};
  values.forEach((entry) => {
    if (entry.label === "year") {
      fields.year = entry.value;
    } else if (entry.label === "month") {
      fields.month = entry.value;
    } else {
      fields.day = entry.value;
    }
  });
  return fields;
}

/**
 * Assigns year, month and day roles to the collected values. Ambiguous numeric
 * dates read month first (`06 08 2024` is June 8th), a number above 31 can only be
 * a year and a number above 12 cannot be a month.
 */
function resolveFields(values: DateValue[]): ResolvedFields {
  const labelled = values.filter((entry) => entry.label).length;
  if (labelled === values.length || (values.length === 3 && labelled === 2)) {
    return resolveFromLabels(values);
  }

  const [first, second, third] = values.map((entry) => entry.value);
  const monthIndex = values.findIndex((entry) => entry.label === "month");
  const yearIndex = values.findIndex((entry) => entry.label === "year");

  if (values.length === 1 || (monthIndex !== -1 && values.length === 2)) {
    const fields: ResolvedFields = {};
    let other = first;
    if (monthIndex !== -1) {
      fields.month = values[monthIndex].value;
      other = values[monthIndex === 0 ? values.length - 1 : monthIndex - 1].value;
    }
    if (other > 31) {
      fields.year = other;
    } else {
      fields.day = other;
    }
    return fields;
  }

  if (values.length === 2) {
    if (first > 31) {
      return { year: first, month: second };
    }
    if (second > 31) {
      return { month: first, year: second };
    }
    return { month: first, day: second };
  }

  switch (monthIndex) {
    case 0:
      return second > 31
        ? { month: first, year: second, day: third }
        : { month: first, day: second, year: third };
    case 1:
      return first > 31
        ? { year: first, month: second, day: third }
        : { day: first, month: second, year: third };
    case 2:
      return second > 31
        ? { day: first, year: second, month: third }
        : { year: first, day: second, month: third };
    default:
      if (first > 31 || yearIndex === 0) {
        return { year: first, month: second, day: third };
      }
      if (first > 12) {
        return { day: first, month: second, year: third };
      }
      return { month: first, day: second, year: third };
  }
}

/**
 * Places a two-digit year in the hundred-year window centred on the reference year.
 */
export function pivotTwoDigitYear(year: number, referenceYear: number): number {
  let result = year + Math.floor(referenceYear / 100) * 100;
  if (result >= referenceYear + 50) {
    result -= 100;
  } else if (result < referenceYear - 50) {
    result += 100;
  }
  return result;
}

function clockComponents(digits: string): KnownComponents {
  const components: KnownComponents = { hour: Number(digits.slice(0, 2)) };
  if (digits.length > 2) {
    components.minute = Number(digits.slice(2, 4));
  }
  if (digits.length > 4) {
    components.second = Number(digits.slice(4, 6));
  }
  return components;
}

function readLayout(text: string, referenceYear: number): KnownComponents | undefined {
  const layout = collectValues(text.split(/\s+/));
  if (!layout?.values.length) {
    return undefined;
  }

  const { year, month, day } = resolveFields(layout.values);
  const known: KnownComponents = layout.clock === undefined ? {} : clockComponents(layout.clock);

  if (year !== undefined) {
    const centurySpecified = layout.values.some((entry) => entry.label === "year");
    known.year = year < 100 && !centurySpecified ? pivotTwoDigitYear(year, referenceYear) : year;
    if (known.year < 1 || known.year > 9999) {
      return undefined;
    }
  }
  if (month !== undefined) {
    known.month = month;
  }
  if (day !== undefined) {
    known.day = day;
  }
  return known;
}

/**
 * chrono parser for the space-separated numeric and month-name layouts left by
 * `cleanDateText`. Fields the text omits are implied as 9999-01-01 at noon, so
 * `isCertain` tells supplied fields from defaulted ones.
 */
function createLayoutParser(referenceYear: number): chrono.Parser {
  return {
    pattern: () => WHOLE_TEXT_PATTERN,
    extract: (context, match) => {
      const known = readLayout(match[0], referenceYear);
      if (!known) {
        return null;
      }

      const components = context
        .createParsingComponents(known)
        .imply("year", SENTINEL_YEAR)
        .imply("month", 1)
        .imply("day", 1)
        .imply("hour", 12)
        .imply("minute", 0)
        .imply("second", 0)
        .imply("millisecond", 0);

      return components.isValidDate() ? components : null;
    },
  };
}

/**
 * Reads a cleaned date string in one of the common explicit layouts.
 *
 * A rejected string yields `numFields: 0`; nothing here throws.
 */
export function tryParse(cleaned: string, options: ParseOptions = {}): ExplicitParse {
  const text = cleaned.trim();
  if (!text || BARE_TWO_DIGIT_PATTERN.test(text) || BC_PATTERN.test(text)) {
    return rejected();
  }

  // chrono retries a failed match from the next character; only a reading of the whole text counts.
  const reader = new chrono.Chrono({ parsers: [createLayoutParser(resolveReferenceYear(options))], refiners: [] });
  const result = reader
    .parse(text)
    .find((candidate) => candidate.index === 0 && candidate.text === text);
  if (!result) {
    return rejected();
  }

  const components = result.start;
  const instant: CalendarInstant = {
    year: components.get("year") ?? SENTINEL_YEAR,
    month: components.get("month") ?? 1,
    day: components.get("day") ?? 1,
  };

  const numFields = text.split(/\s+/).length + (components.isCertain("year") ? 0 : 1);
  return { instant, numFields: Math.min(numFields, 3) };
}
