import type { RawTable } from "../import/types";
import { resolveColumn } from "./classify";
import { correlationMatrix, type NumericSeries } from "./correlation";
import { describeCategorical, describeNumeric } from "./describe";
import { analyzeMissing } from "./missing";
import { detectOutliers } from "./outliers";
import { fromRawTable, tableRowCount, validateTable } from "./table";
import type {
  CategoricalStats,
  DataTable,
  FrozenProfile,
  IndexedValue,
  NumericStats,
  OutlierReport,
  Profile,
  ResolvedColumn
} from "./types";

const freezeDeep = (value: unknown): void => {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return;
  }
  Object.values(value).forEach(freezeDeep);
  Object.freeze(value);
};

const presentNumbers = (column: ResolvedColumn): IndexedValue[] => {
  const points: IndexedValue[] = [];
  column.cells.forEach((cell, rowIndex) => {
    if (cell.kind === "number") {
      points.push({ rowIndex, value: cell.value });
    }
  });
  return points;
};

const presentTexts = (column: ResolvedColumn): string[] => {
  const texts: string[] = [];
  column.cells.forEach((cell) => {
    if (cell.kind !== "missing") {
      texts.push(cell.text);
    }
  });
  return texts;
};

const toSeries = (column: ResolvedColumn): NumericSeries => ({
  name: column.name,
  values: column.cells.map((cell) => (cell.kind === "number" ? cell.value : null))
});

export const profileTable = (table: DataTable): FrozenProfile => {
  validateTable(table);

  const rowCount = tableRowCount(table);
  const columns = table.columns.map(resolveColumn);
  const numericColumns = columns.filter((column) => column.classification === "numerical");

  // built from entries: a column named "__proto__" must stay an own key
  const numeric: [string, NumericStats][] = [];
  const outliers: [string, OutlierReport][] = [];
  const categorical: [string, CategoricalStats][] = [];

  columns.forEach((column) => {
    if (column.classification === "numerical") {
      const points = presentNumbers(column);
      numeric.push([column.name, describeNumeric(points.map((point) => point.value))]);
      outliers.push([column.name, detectOutliers(points)]);
      return;
    }
    categorical.push([column.name, describeCategorical(presentTexts(column))]);
  });

  const profile: Profile = {
    rowCount,
    columnCount: columns.length,
    columns: columns.map(({ name, classification, storageType }) => ({
      name,
      classification,
      storageType
    })),
    missing: analyzeMissing(columns, rowCount),
    numeric: Object.fromEntries(numeric),
    categorical: Object.fromEntries(categorical),
    outliers: Object.fromEntries(outliers),
    correlation: correlationMatrix(numericColumns.map(toSeries))
  };

  freezeDeep(profile);
  return profile;
};

export const profileRawTable = (raw: RawTable): FrozenProfile => profileTable(fromRawTable(raw));
