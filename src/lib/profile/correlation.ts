import { arithmeticMean, scaledDeviations } from "./describe";
import type { CorrelationMatrix } from "./types";

export type NumericSeries = {
  name: string;
  values: readonly (number | null)[];
};

const clampUnit = (value: number): number => Math.max(-1, Math.min(1, value));

const jointPairs = (a: NumericSeries, b: NumericSeries): [number[], number[]] => {
  const xs: number[] = [];
  const ys: number[] = [];
  const length = Math.min(a.values.length, b.values.length);
  for (let index = 0; index < length; index += 1) {
    const x = a.values[index];
    const y = b.values[index];
    if (x !== null && y !== null) {
      xs.push(x);
      ys.push(y);
    }
  }
  return [xs, ys];
};

export const pearson = (xs: readonly number[], ys: readonly number[]): number | null => {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    return null;
  }
  const x = scaledDeviations(xs.slice(0, n), arithmeticMean(xs.slice(0, n)));
  const y = scaledDeviations(ys.slice(0, n), arithmeticMean(ys.slice(0, n)));
  if (x.scale === 0 || y.scale === 0) {
    return null;
  }

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i += 1) {
    const dx = x.deviations[i];
    const dy = y.deviations[i];
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  const coefficient = covariance / (Math.sqrt(varianceX) * Math.sqrt(varianceY));
  return Number.isFinite(coefficient) ? clampUnit(coefficient) : null;
};

const countPresent = (series: NumericSeries): number =>
  series.values.reduce<number>((count, value) => (value === null ? count : count + 1), 0);

export const correlationMatrix = (series: readonly NumericSeries[]): CorrelationMatrix => {
  const coefficients: (number | null)[][] = series.map(() => series.map(() => null));

  for (let i = 0; i < series.length; i += 1) {
    coefficients[i][i] = countPresent(series[i]) >= 2 ? 1 : null;
    for (let j = i + 1; j < series.length; j += 1) {
      const [xs, ys] = jointPairs(series[i], series[j]);
      const coefficient = pearson(xs, ys);
      coefficients[i][j] = coefficient;
      coefficients[j][i] = coefficient;
    }
  }

  return { columns: series.map((entry) => entry.name), coefficients };
};

export const correlationBetween = (
  matrix: { readonly columns: readonly string[]; readonly coefficients: readonly (readonly (number | null)[])[] },
  a: string,
  b: string
): number | null => {
  const i = matrix.columns.indexOf(a);
  const j = matrix.columns.indexOf(b);
  if (i === -1 || j === -1) {
    return null;
  }
  return matrix.coefficients[i][j];
};
