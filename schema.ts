import { z } from "zod";

export const MIN_YEAR = -100_000;
export const MAX_YEAR = 100_000;

/**
 * Schema describing a date where any of year, month and day may be unknown.
 */
export const PartialDateSchema = z.object({
  /**
   * Astronomical year; negative values are BC.
   */
  year: z
    .number()
    .int()
    .min(MIN_YEAR, { message: "year must be between -100,000 BC and 100,000 AD" })
    .max(MAX_YEAR, { message: "year must be between -100,000 BC and 100,000 AD" })
    .optional(),
  /**
   * Month number (1-12), if known.
   */
  month: z
    .number()
    .int()
    .min(1, { message: "month must be between 1 and 12" })
    .max(12, { message: "month must be between 1 and 12" })
    .optional(),
  /**
   * Day of the month (1-31), if known. Not checked against the month's length.
   */
  day: z
    .number()
    .int()
    .min(1, { message: "day must be between 1 and 31" })
    .max(31, { message: "day must be between 1 and 31" })
    .optional(),
});

export type PartialDateFields = z.infer<typeof PartialDateSchema>;
