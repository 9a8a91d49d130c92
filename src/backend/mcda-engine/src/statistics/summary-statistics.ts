/**
 * Empirical summary statistics over trial samples.
 *
 * Percentiles use linear interpolation between order statistics at position
 * p/100 × (n − 1), so the result does not depend on sample order.
 *
 * @tested tests/property/summary-statistics.property.test.ts
 */

export function mean(values: ArrayLike<number>): number {
  if (values.length === 0) {
    throw new RangeError('Cannot take the mean of an empty sample');
  }
  let total = 0;
  for (let i = 0; i < values.length; i++) {
    total += values[i];
  }
  return total / values.length;
}

/**
 * Percentile of an ascending-sorted sample
 */
export function percentileOfSorted(sorted: ArrayLike<number>, p: number): number {
  if (sorted.length === 0) {
    throw new RangeError('Cannot take a percentile of an empty sample');
  }
  if (!(p >= 0 && p <= 100)) {
    throw new RangeError(`Percentile must be within [0, 100], got ${p}`);
  }

  const position = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) {
    return sorted[lower];
  }
  const t = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * t;
}

export function percentile(values: ArrayLike<number>, p: number): number {
  return percentileOfSorted(Float64Array.from(values).sort(), p);
}

/**
 * Mean and a central percentile interval of one sample
 */
export interface SampleSummary {
  mean: number;
  lower: number;
  upper: number;
}

/**
 * Summarizes a sample with its mean and the [lowerP, upperP] percentiles
 */
export function summarizeSample(values: Float64Array, lowerP = 2.5, upperP = 97.5): SampleSummary {
  const sorted = values.slice().sort();
  return {
    mean: mean(values),
    lower: percentileOfSorted(sorted, lowerP),
    upper: percentileOfSorted(sorted, upperP),
  };
}
