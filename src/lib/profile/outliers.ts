import { quantile, sortAscending } from "./describe";
import type { IndexedValue, OutlierReport } from "./types";

export const IQR_FENCE_MULTIPLIER = 1.5;
export const MIN_OUTLIER_SAMPLE = 4;

const emptyReport = (): OutlierReport => ({
  lowerFence: null,
  upperFence: null,
  outliers: [],
  count: 0
});

export const detectOutliers = (points: readonly IndexedValue[]): OutlierReport => {
  if (points.length < MIN_OUTLIER_SAMPLE) {
    return emptyReport();
  }

  const sorted = sortAscending(points.map((point) => point.value));
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  if (q1 === null || q3 === null) {
    return emptyReport();
  }

  const iqr = q3 - q1;
  const lowerFence = q1 - IQR_FENCE_MULTIPLIER * iqr;
  const upperFence = q3 + IQR_FENCE_MULTIPLIER * iqr;
  const outliers = points
    .filter((point) => point.value < lowerFence || point.value > upperFence)
    .sort((a, b) => a.rowIndex - b.rowIndex)
    .map((point) => ({ ...point }));

  return { lowerFence, upperFence, outliers, count: outliers.length };
};
