import { BC_MARKER, PROTECTED_TOKENS } from "./labels";

// Letters that survive NFKD decomposition without an ASCII base.
const LETTER_REPLACEMENTS: Record<string, string> = {
  ß: "ss",
  æ: "ae",
  Æ: "AE",
  ø: "o",
  Ø: "O",
  œ: "oe",
  Œ: "OE",
  ł: "l",
  Ł: "L",
  đ: "d",
  Đ: "D",
  ð: "d",
  Ð: "D",
  þ: "th",
  Þ: "Th",
  ı: "i",
};

const AM_PM_PATTERN = /\b(?:a\.?m|p\.?m)\b\.?/g;
const LEADING_MINUS_PATTERN = /^-(\d{1,4})(?!\d)/;
const CLOCK_WITH_SECONDS_PATTERN = /(?<!\d)\d{1,2}:\d{2}:\d{2}(?!\d)/g;
const CLOCK_PATTERN = /(?<!\d)\d{1,2}:\d{2}(?!\d)/g;
const SEPARATOR_PATTERN = /[/,."'\-_]/g;
const NON_ALPHANUMERIC_PATTERN = /[^a-z0-9\s]/g;
const LETTER_DIGIT_BOUNDARY = /(?<=[a-z])(?=\d)|(?<=\d)(?=[a-z])/g;
const PROTECTED_PATTERN = new RegExp(`(${PROTECTED_TOKENS.join("|")})`, "g");
const SHORT_YEAR_PATTERN = /^(\d{1,3})( bc)?$/;
const BC_YEAR_PATTERN = new RegExp(`^(\\d{4}) ${BC_MARKER}$`);

// Shortest input that can hold "H:MM" plus something else.
const MIN_CLOCK_LENGTH = 5;

const collapseSpaces = (value: string): string => value.replace(/\s+/g, " ").trim();

const isKeptWord = (word: string): boolean => PROTECTED_TOKENS.includes(word) || /^\d+$/.test(word);

export function transliterate(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^\x00-\x7f]/g, (char) => LETTER_REPLACEMENTS[char] ?? " ");
}

/**
 * Reduces free text to the tokens a date can be read from: numbers, three-letter
 * month abbreviations and, for BC years, a leading minus sign.
 *
 * @example cleanDateText("06_August_2024 3:30 PM") // "06 aug 2024"
 * @example cleanDateText("-44") // "-0044"
 */
export function cleanDateText(raw: string): string {
  let text = transliterate(raw).toLowerCase().trim();

  text = text.replace(AM_PM_PATTERN, " ");
  text = text.trim().replace(LEADING_MINUS_PATTERN, `$1 ${BC_MARKER}`);

  if (text.length >= MIN_CLOCK_LENGTH) {
    text = text.replace(CLOCK_WITH_SECONDS_PATTERN, " ").replace(CLOCK_PATTERN, " ");
  }

  text = text
    .replace(SEPARATOR_PATTERN, " ")
    .replace(NON_ALPHANUMERIC_PATTERN, " ")
    .replace(LETTER_DIGIT_BOUNDARY, " ")
    .replace(PROTECTED_PATTERN, " $1 ");

  text = text.split(/\s+/).filter(isKeptWord).join(" ");

  const shortYear = text.match(SHORT_YEAR_PATTERN);
  if (shortYear) {
    text = `${shortYear[1].padStart(4, "0")}${shortYear[2] ?? ""}`;
  }

  const bcYear = text.match(BC_YEAR_PATTERN);
  if (bcYear) {
    text = `-${bcYear[1]}`;
  }

  return collapseSpaces(text);
}
