import { InvalidArgumentError, ValidationError } from "./errors";
import { SENTINEL_YEAR, tryParse, type ExplicitParse, type ParseOptions } from "./explicit";
import { extractCandidates, formatCombo } from "./extract";
import { cleanDateText } from "./normalize";
import { PartialDate } from "./partialDate";
import type { PartialDateFields } from "./schema";

// Calendar parsers reject years such as 0000, 0099 or any negative year.
const BARE_YEAR_PATTERN = /^-?\d{4}$/;

function buildDate(fields: PartialDateFields): PartialDate {
  try {
    return new PartialDate(fields);
  } catch (error) {
    if (error instanceof ValidationError) {
      return PartialDate.empty();
    }
    throw error;
  }
}

function toFields({ instant, numFields }: ExplicitParse): PartialDateFields {
  const fields: PartialDateFields = {};
  if (numFields >= 1 && instant.year !== SENTINEL_YEAR) {
    fields.year = instant.year;
  }
  if (numFields >= 2) {
    fields.month = instant.month;
  }
  if (numFields >= 3) {
    fields.day = instant.day;
  }
  return fields;
}

/**
 * Reads the most plausible partial date out of free text.
 *
 * Never throws for text it cannot read; such input yields an all-unknown date.
 *
 * @example parseDate("06.Aug.2024").toString() // "2024-8-6"
 * @example parseDate("sep 21 pengu").toString() // "unknown-9-21"
 * @throws InvalidArgumentError when `input` is neither a string, null nor undefined.
 */
export function parseDate(input: unknown, options: ParseOptions = {}): PartialDate {
  if (input === null || input === undefined) {
    return PartialDate.empty();
  }
  if (typeof input !== "string") {
    throw new InvalidArgumentError(`parseDate expects a string, null or undefined; received ${typeof input}`);
  }

  const cleaned = cleanDateText(input);
  if (BARE_YEAR_PATTERN.test(cleaned)) {
    // "-0000" is year zero, not negative zero.
    return buildDate({ year: Number(cleaned) || 0 });
  }

  let parsed = tryParse(cleaned, options);
  if (parsed.numFields === 0) {
    parsed = tryParse(formatCombo(extractCandidates(cleaned, options)), options);
  }

  return buildDate(toFields(parsed));
}
