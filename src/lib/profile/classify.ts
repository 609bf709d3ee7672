import { resolveCell } from "./cells";
import type {
  ColumnClassification,
  ResolvedCell,
  ResolvedColumn,
  StorageType,
  TableColumn
} from "./types";

export const classifyColumn = (cells: readonly ResolvedCell[]): ColumnClassification => {
  let numericCount = 0;
  for (const cell of cells) {
    if (cell.kind === "text") {
      return "categorical";
    }
    if (cell.kind === "number") {
      numericCount += 1;
    }
  }
  return numericCount > 0 ? "numerical" : "categorical";
};

const detectStorageType = (
  cells: readonly ResolvedCell[],
  classification: ColumnClassification
): StorageType => {
  if (classification === "categorical") {
    return cells.some((cell) => cell.kind !== "missing") ? "text" : "empty";
  }
  return cells.every((cell) => cell.kind !== "number" || Number.isInteger(cell.value))
    ? "integer"
    : "float";
};

export const resolveColumn = (column: TableColumn): ResolvedColumn => {
  const cells = column.values.map(resolveCell);
  const classification = classifyColumn(cells);
  return {
    name: column.name,
    cells,
    classification,
    storageType: detectStorageType(cells, classification)
  };
};
