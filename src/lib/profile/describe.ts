import type { CategoricalStats, FrequencyEntry, NumericStats } from "./types";

/**
 * Linear-interpolation quantile over ascending values: position `(n - 1) * p`,
 * interpolated between the two neighbouring order statistics.
 */
export const quantile = (sorted: readonly number[], p: number): number | null => {
  if (sorted.length === 0) {
    return null;
  }
  const position = (sorted.length - 1) * p;
  const base = Math.floor(position);
  const rest = position - base;
  if (base + 1 < sorted.length) {
    return sorted[base] + rest * (sorted[base + 1] - sorted[base]);
  }
  return sorted[base];
};

export const sortAscending = (values: readonly number[]): number[] =>
  [...values].sort((a, b) => a - b);

const emptyNumericStats = (): NumericStats => ({
  count: 0,
  mean: null,
  std: null,
  variance: null,
  min: null,
  q1: null,
  median: null,
  q3: null,
  max: null,
  sum: null,
  range: null,
  iqr: null,
  skewness: null,
  kurtosis: null
});

/** Mean that stays finite when the plain sum of the values overflows. */
export const arithmeticMean = (values: readonly number[]): number => {
  const sum = values.reduce((total, value) => total + value, 0);
  if (Number.isFinite(sum)) {
    return sum / values.length;
  }
  const scale = values.reduce((largest, value) => Math.max(largest, Math.abs(value)), 0);
  return (values.reduce((total, value) => total + value / scale, 0) / values.length) * scale;
};

/**
 * Deviations from `mean` divided by the largest absolute deviation. Powers of the
 * scaled deviations neither overflow nor underflow; multiply back by `scale`.
 */
export const scaledDeviations = (
  values: readonly number[],
  mean: number
): { deviations: number[]; scale: number } => {
  const raw = values.map((value) => value - mean);
  const scale = raw.reduce((largest, deviation) => Math.max(largest, Math.abs(deviation)), 0);
  return { deviations: scale > 0 ? raw.map((deviation) => deviation / scale) : raw, scale };
};

const centralMoments = (deviations: readonly number[]) => {
  let m2 = 0;
  let m3 = 0;
  let m4 = 0;
  deviations.forEach((deviation) => {
    const squared = deviation * deviation;
    m2 += squared;
    m3 += squared * deviation;
    m4 += squared * squared;
  });
  const n = deviations.length;
  return { sumSquares: m2, m2: m2 / n, m3: m3 / n, m4: m4 / n };
};

export const describeNumeric = (values: readonly number[]): NumericStats => {
  const n = values.length;
  if (n === 0) {
    return emptyNumericStats();
  }

  const sorted = sortAscending(values);
  const sum = values.reduce((total, value) => total + value, 0);
  const mean = arithmeticMean(values);
  const min = sorted[0];
  const max = sorted[n - 1];
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  // identical values: dispersion is exactly zero and shape is undefined
  const constant = min === max;
  const { deviations, scale } = scaledDeviations(values, mean);
  const moments = centralMoments(deviations);

  // in units of scale²; the variance itself overflows only past Number.MAX_VALUE
  const scaledVariance = moments.sumSquares / (n - 1);
  const variance = n < 2 ? null : constant ? 0 : scaledVariance * scale * scale;
  const std = n < 2 ? null : constant ? 0 : Math.sqrt(scaledVariance) * scale;

  const skewness =
    n < 3 || constant
      ? null
      : (Math.sqrt(n * (n - 1)) / (n - 2)) * (moments.m3 / Math.pow(moments.m2, 1.5));

  const kurtosis =
    n < 4 || constant
      ? null
      : ((n - 1) / ((n - 2) * (n - 3))) *
        ((n + 1) * (moments.m4 / (moments.m2 * moments.m2)) - 3 * (n - 1));

  return {
    count: n,
    mean,
    std,
    variance,
    min,
    q1,
    median: quantile(sorted, 0.5),
    q3,
    max,
    sum,
    range: max - min,
    iqr: q1 === null || q3 === null ? null : q3 - q1,
    skewness,
    kurtosis
  };
};

export const describeCategorical = (values: readonly string[]): CategoricalStats => {
  const counts = new Map<string, number>();
  values.forEach((value) => {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  });

  // Array#sort is stable, so equal counts keep first-seen order
  const frequencies: FrequencyEntry[] = Array.from(counts, ([value, count]) => ({ value, count })).sort(
    (a, b) => b.count - a.count
  );

  return {
    count: values.length,
    distinctCount: counts.size,
    mostFrequent: frequencies[0] ? { ...frequencies[0] } : null,
    frequencies
  };
};
