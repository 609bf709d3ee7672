export const EMPTY_MARK = "—";

export const formatNumber = (value: number | null, digits = 2): string => {
  if (value === null || Number.isNaN(value)) {
    return EMPTY_MARK;
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  return value.toFixed(digits);
};

export const formatPercentage = (value: number, digits = 1): string => `${value.toFixed(digits)}%`;
