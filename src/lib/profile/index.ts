export { isMissingCell, MISSING_TOKENS, parseNumericText, resolveCell } from "./cells";
export { classifyColumn, resolveColumn } from "./classify";
export { correlationBetween, correlationMatrix, pearson, type NumericSeries } from "./correlation";
export {
  arithmeticMean,
  describeCategorical,
  describeNumeric,
  quantile,
  scaledDeviations
} from "./describe";
export { analyzeMissing, countMissing } from "./missing";
export { detectOutliers, IQR_FENCE_MULTIPLIER, MIN_OUTLIER_SAMPLE } from "./outliers";
export { profileRawTable, profileTable } from "./profileTable";
export { fromRawTable, TableShapeError, validateTable, type TableShapeErrorCode } from "./table";
export type * from "./types";
