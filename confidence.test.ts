import { describe, expect, it } from "vitest";
import { chooseValue, reconcile, scoreValues } from "./confidence";
import { PartialDate } from "./partialDate";

describe("scoreValues", () => {
  it("adds distance-discounted support from other values", () => {
    const scores = scoreValues([1, 1, 2]);

    expect([...scores.keys()]).toEqual([1, 2]);
    expect(scores.get(1)).toBeCloseTo(2 / 3 + 0.2);
    expect(scores.get(2)).toBeCloseTo(1 / 3 + 0.4);
  });

  it("skips unknown values", () => {
    expect(scoreValues([undefined, 7, undefined])).toEqual(new Map([[7, 1]]));
  });
});

describe("chooseValue", () => {
  it("returns undefined when nothing was observed", () => {
    expect(chooseValue([])).toBeUndefined();
    expect(chooseValue([undefined, undefined])).toBeUndefined();
  });

  it("compromises on a value between its neighbours", () => {
    expect(chooseValue([1990, 1992, 1991])).toBe(1991);
  });

  it("breaks ties by first occurrence", () => {
    expect(chooseValue([1990, 1991])).toBe(1990);
    expect(chooseValue([1991, 1990])).toBe(1991);
  });
});

describe("reconcile", () => {
  it("prefers the majority year", () => {
    const result = reconcile([
      new PartialDate({ year: 1990 }),
      new PartialDate({ year: 1990 }),
      new PartialDate({ year: 1991 }),
    ]);

    expect(result.year).toBe(1990);
  });

  it("returns an unknown date for no observations", () => {
    expect(reconcile([]).isEmpty()).toBe(true);
    expect(reconcile([]).toString()).toBe("unknown");
  });

  it("reconciles each field independently", () => {
    const result = reconcile([
      new PartialDate({ year: 1900, month: 5 }),
      new PartialDate({ year: 1900 }),
      new PartialDate({ month: 5, day: 3 }),
    ]);

    expect(result.toJSON()).toEqual({ year: 1900, month: 5, day: 3 });
  });

  it("builds a new date without touching the observations", () => {
    const observation = new PartialDate({ year: 1850, month: 2 });
    const result = reconcile([observation]);

    expect(result).not.toBe(observation);
    expect(result.toJSON()).toEqual({ year: 1850, month: 2 });
    expect(observation.toJSON()).toEqual({ year: 1850, month: 2 });
  });
});
