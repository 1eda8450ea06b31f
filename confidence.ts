import { PartialDate } from "./partialDate";

/**
 * How strongly a nearby value lends support to another; transcription noise
 * clusters around the true value.
 */
export const NEIGHBOUR_WEIGHT = 1.2;

/**
 * Confidence for each distinct value, in first-occurrence order: its own share of
 * the observations plus support from every other value, discounted by distance.
 */
export function scoreValues(values: readonly (number | undefined)[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const value of values) {
    if (value !== undefined) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }

  const total = [...counts.values()].reduce((sum, count) => sum + count, 0);
  const scores = new Map<number, number>();

  for (const [value, count] of counts) {
    let confidence = count / total;
    for (const [other, otherCount] of counts) {
      if (other !== value) {
        confidence += (NEIGHBOUR_WEIGHT * (otherCount / total)) / (1 + Math.abs(value - other));
      }
    }
    scores.set(value, confidence);
  }

  return scores;
}

/**
 * The best-supported value, or undefined when nothing was observed. Ties keep the
 * value observed first.
 */
export function chooseValue(values: readonly (number | undefined)[]): number | undefined {
  let best: number | undefined;
  let bestConfidence = Number.NEGATIVE_INFINITY;

  for (const [value, confidence] of scoreValues(values)) {
    if (confidence > bestConfidence) {
      best = value;
      bestConfidence = confidence;
    }
  }

  return best;
}

/**
 * Merges several observations of one event into a consensus date, field by field.
 */
export function reconcile(observations: readonly PartialDate[]): PartialDate {
  return new PartialDate({
    year: chooseValue(observations.map((date) => date.year)),
    month: chooseValue(observations.map((date) => date.month)),
    day: chooseValue(observations.map((date) => date.day)),
  });
}
