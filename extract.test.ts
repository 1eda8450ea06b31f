import { describe, expect, it } from "vitest";
import { extractCandidates, formatCombo, listCandidates, replaceOccurrence } from "./extract";

const options = { referenceYear: 2024 };

describe("replaceOccurrence", () => {
  it("replaces only the requested occurrence", () => {
    expect(replaceOccurrence("12 1 12", "12", 1)).toBe("12 1  ");
    expect(replaceOccurrence("12 1 12", "12", 0)).toBe("  1 12");
  });

  it("leaves the text alone when the occurrence does not exist", () => {
    expect(replaceOccurrence("1990", "1990", 1)).toBe("1990");
    expect(replaceOccurrence("abc", "x", 0)).toBe("abc");
  });
});

describe("listCandidates", () => {
  it("ranks longer and more specific readings first", () => {
    expect(listCandidates("1100 bc jan 1", options)).toEqual([
      { year: "1100", month: "jan", day: "1" },
      { year: "1100", month: "jan" },
      { year: "1100", month: "1" },
      { year: "1100" },
      {},
    ]);
  });

  it("always keeps the empty reading", () => {
    expect(listCandidates("no digits here", options)).toEqual([{}]);
  });
});

describe("extractCandidates", () => {
  it("reduces tied readings to the year they share", () => {
    expect(extractCandidates("2 sep may 1999", options)).toEqual({ year: "1999" });
    expect(extractCandidates("2 1000 3", options)).toEqual({ year: "1000" });
  });

  it("returns an empty reading when no year is present", () => {
    expect(extractCandidates("3 99 12", options)).toEqual({});
  });

  it("ignores years after the reference year", () => {
    expect(extractCandidates("5 2030 7", options)).toEqual({});
    expect(extractCandidates("5 2030 7", { referenceYear: 2030 })).toEqual({ year: "2030" });
  });

  it("considers overlapping four-digit windows", () => {
    expect(extractCandidates("12345", options)).toEqual({ year: "1234", month: "5" });
    expect(extractCandidates("12345", { referenceYear: 2400 })).toEqual({});
  });
});

describe("formatCombo", () => {
  it("joins the known parts in year month day order", () => {
    expect(formatCombo({ year: "1100", month: "jan", day: "1" })).toBe("1100 jan 1");
    expect(formatCombo({ year: "1999" })).toBe("1999");
    expect(formatCombo({})).toBe("");
  });
});
