export { PartialDate, UNKNOWN_MARKER } from "./partialDate";
export { PartialDateSchema, MIN_YEAR, MAX_YEAR, type PartialDateFields } from "./schema";
export { ValidationError, InvalidArgumentError } from "./errors";
export { parseDate } from "./dates";
export { compareDates, compare } from "./compare";
export { reconcile, scoreValues } from "./confidence";
export { cleanDateText, transliterate } from "./normalize";
export {
  tryParse,
  SENTINEL_YEAR,
  type CalendarInstant,
  type ExplicitParse,
  type ParseOptions,
} from "./explicit";
export { extractCandidates, listCandidates, type CandidateCombo } from "./extract";
