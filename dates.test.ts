import { describe, expect, it } from "vitest";
import { parseDate } from "./dates";
import { InvalidArgumentError } from "./errors";

const options = { referenceYear: 2024 };

describe("parseDate", () => {
  it("reads unambiguous layouts to the same date", () => {
    for (const input of ["2024-08-06", "Aug 6, 2024", "06.Aug.2024"]) {
      expect(parseDate(input, options).toString()).toBe("2024-8-6");
    }
  });

  it("applies the two-digit year heuristics", () => {
    expect(parseDate("99-12-3", options).toString()).toBe("1999-12-3");
    expect(parseDate("24-08-06", options).toString()).toBe("2006-8-24");
  });

  it("pivots two-digit years around the reference year", () => {
    expect(parseDate("06-08-24", { referenceYear: 2080 }).toString()).toBe("2124-6-8");
  });

  it("returns an unknown date for absent or empty input", () => {
    expect(parseDate(undefined).toString()).toBe("unknown");
    expect(parseDate(null).isEmpty()).toBe(true);
    expect(parseDate("").toString()).toBe("unknown");
  });

  it("keeps bare and BC years as year-only dates", () => {
    expect(parseDate("30").toJSON()).toEqual({ year: 30 });
    expect(parseDate("-1100").toJSON()).toEqual({ year: -1100 });
    expect(parseDate("-9000").toJSON()).toEqual({ year: -9000 });
    expect(parseDate("-44").toJSON()).toEqual({ year: -44 });
  });

  it("reads a signed zero year as year zero", () => {
    expect(Object.is(parseDate("-0").year, 0)).toBe(true);
    expect(Object.is(parseDate("-0000").year, 0)).toBe(true);
    expect(parseDate("-0000").toString()).toBe("0");
  });

  it("keeps the century of zero-padded years", () => {
    expect(parseDate("0032-12-3", options).toString()).toBe("32-12-3");
    expect(parseDate("12/3/0050", options).toString()).toBe("50-12-3");
  });

  it("ignores noise words around the date", () => {
    const noisy = parseDate("sep 21 pengu theodore banana trashpanda", options);
    expect(noisy.toJSON()).toEqual({ month: 9, day: 21 });

    const withYear = parseDate("sep 21 pengu theodore banana trashpanda 1812", options);
    expect(withYear.toJSON()).toEqual({ year: 1812, month: 9, day: 21 });
  });

  it("reads transcriptions with accents and ordinal suffixes", () => {
    expect(parseDate("Bórn on the 6th of Augúst, 1789.", options).toJSON()).toEqual({
      year: 1789,
      month: 8,
      day: 6,
    });
  });

  it("falls back to the overlapping four-digit reading", () => {
    expect(parseDate("12345", options).toString()).toBe("1234-5");
  });

  it("rejects values that are not text", () => {
    expect(() => parseDate(42)).toThrow(InvalidArgumentError);
    expect(() => parseDate({ year: 1900 })).toThrow("received object");
  });
});
