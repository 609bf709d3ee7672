export type RawCell = string | number | boolean | null | undefined;

export type TableColumn = {
  name: string;
  values: readonly RawCell[];
};

export type DataTable = {
  columns: readonly TableColumn[];
};

export type ResolvedCell =
  | { kind: "number"; value: number; text: string }
  | { kind: "text"; text: string }
  | { kind: "missing" };

export type ColumnClassification = "numerical" | "categorical";

export type StorageType = "integer" | "float" | "text" | "empty";

export type ResolvedColumn = {
  name: string;
  cells: ResolvedCell[];
  classification: ColumnClassification;
  storageType: StorageType;
};

export type MissingCount = {
  count: number;
  percentage: number;
};

export type MissingReport = {
  columns: Record<string, MissingCount>;
  total: MissingCount;
};

export type NumericStats = {
  count: number;
  mean: number | null;
  std: number | null;
  variance: number | null;
  min: number | null;
  q1: number | null;
  median: number | null;
  q3: number | null;
  max: number | null;
  sum: number | null;
  range: number | null;
  iqr: number | null;
  skewness: number | null;
  kurtosis: number | null;
};

export type FrequencyEntry = {
  value: string;
  count: number;
};

export type CategoricalStats = {
  count: number;
  distinctCount: number;
  mostFrequent: FrequencyEntry | null;
  frequencies: FrequencyEntry[];
};

export type IndexedValue = {
  rowIndex: number;
  value: number;
};

export type OutlierReport = {
  lowerFence: number | null;
  upperFence: number | null;
  outliers: IndexedValue[];
  count: number;
};

export type CorrelationMatrix = {
  columns: string[];
  coefficients: (number | null)[][];
};

export type ColumnOverview = {
  name: string;
  classification: ColumnClassification;
  storageType: StorageType;
};

export type Profile = {
  rowCount: number;
  columnCount: number;
  columns: ColumnOverview[];
  missing: MissingReport;
  numeric: Record<string, NumericStats>;
  categorical: Record<string, CategoricalStats>;
  outliers: Record<string, OutlierReport>;
  correlation: CorrelationMatrix;
};

type DeepReadonly<T> = T extends (infer Item)[]
  ? readonly DeepReadonly<Item>[]
  : T extends object
    ? { readonly [Key in keyof T]: DeepReadonly<T[Key]> }
    : T;

export type FrozenProfile = DeepReadonly<Profile>;
