import { z, type ZodError } from "zod";
import { reconcile } from "./confidence";
import { parseDate } from "./dates";
import type { ParseOptions } from "./explicit";
import type { PartialDateFields } from "./schema";

export const EnvSchema = z.object({
  PARTIAL_DATES_REFERENCE_YEAR: z.coerce.number().int().min(1).max(9999).optional(),
});

export type CliEnvironment = z.infer<typeof EnvSchema>;

export interface DateReading {
  date: PartialDateFields;
  text: string;
}

export interface ObservationReport extends DateReading {
  input: string;
}

export interface DateReport {
  observations: ObservationReport[];
  consensus: DateReading;
}

export function toParseOptions(config: CliEnvironment): ParseOptions {
  return { referenceYear: config.PARTIAL_DATES_REFERENCE_YEAR };
}

/**
 * One ` - path: message` line per zod issue.
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length ? issue.path.join(".") : "<root>";
    return ` - ${path}: ${issue.message}`;
  });
}

export function splitLines(input: string): string[] {
  return input
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Parses every non-blank line and reconciles them. Returns undefined when there is
 * nothing to read.
 */
export function buildReport(input: string, options: ParseOptions = {}): DateReport | undefined {
  const lines = splitLines(input);
  if (!lines.length) {
    return undefined;
  }

  const dates = lines.map((line) => parseDate(line, options));
  const consensus = reconcile(dates);

  return {
    observations: dates.map((date, index) => ({
      input: lines[index],
      date: date.toJSON(),
      text: date.toString(),
    })),
    consensus: { date: consensus.toJSON(), text: consensus.toString() },
  };
}
