import { ValidationError } from "./errors";
import { PartialDateSchema, type PartialDateFields } from "./schema";

export const UNKNOWN_MARKER = "unknown";

/**
 * An immutable date where any of year, month and day may be unknown.
 *
 * Day is only range-checked (1-31); `new PartialDate({ year: 2023, month: 2, day: 31 })`
 * is accepted. Dates produced by `parseDate` never carry such combinations.
 */
export class PartialDate {
  readonly year?: number;
  readonly month?: number;
  readonly day?: number;

  constructor(fields: PartialDateFields = {}) {
    const result = PartialDateSchema.safeParse(fields);
    if (!result.success) {
      throw new ValidationError(result.error.issues);
    }

    const { year, month, day } = result.data;
    if (year !== undefined) {
      this.year = year;
    }
    if (month !== undefined) {
      this.month = month;
    }
    if (day !== undefined) {
      this.day = day;
    }

    Object.freeze(this);
  }

  static empty(): PartialDate {
    return new PartialDate();
  }

  /**
   * Validates a plain record, such as one read back from JSON.
   */
  static from(value: unknown): PartialDate {
    const result = PartialDateSchema.safeParse(value ?? {});
    if (!result.success) {
      throw new ValidationError(result.error.issues);
    }
    return new PartialDate(result.data);
  }

  isEmpty(): boolean {
    return this.year === undefined && this.month === undefined && this.day === undefined;
  }

  toJSON(): PartialDateFields {
    const fields: PartialDateFields = {};
    if (this.year !== undefined) {
      fields.year = this.year;
    }
    if (this.month !== undefined) {
      fields.month = this.month;
    }
    if (this.day !== undefined) {
      fields.day = this.day;
    }
    return fields;
  }

  toString(): string {
    if (this.isEmpty()) {
      return UNKNOWN_MARKER;
    }

    const year = this.year === undefined ? UNKNOWN_MARKER : String(this.year);
    if (this.day !== undefined) {
      return `${year}-${this.month ?? UNKNOWN_MARKER}-${this.day}`;
    }
    if (this.month !== undefined) {
      return `${year}-${this.month}`;
    }
    return year;
  }
}
