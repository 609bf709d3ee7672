import type { RawTable } from "../import/types";
import type { DataTable } from "./types";

export type TableShapeErrorCode = "UNEQUAL_COLUMN_LENGTH" | "RAGGED_ROW" | "DUPLICATE_COLUMN_NAME";

export class TableShapeError extends Error {
  readonly code: TableShapeErrorCode;

  constructor(code: TableShapeErrorCode, message: string) {
    super(message);
    this.name = "TableShapeError";
    this.code = code;
  }
}

export const tableRowCount = (table: DataTable): number => table.columns[0]?.values.length ?? 0;

export const validateTable = (table: DataTable): void => {
  const seen = new Set<string>();
  const rowCount = tableRowCount(table);

  table.columns.forEach((column, index) => {
    if (seen.has(column.name)) {
      throw new TableShapeError(
        "DUPLICATE_COLUMN_NAME",
        `Column name "${column.name}" appears more than once (position ${index + 1}).`
      );
    }
    seen.add(column.name);

    if (column.values.length !== rowCount) {
      throw new TableShapeError(
        "UNEQUAL_COLUMN_LENGTH",
        `Column "${column.name}" has ${column.values.length} values, expected ${rowCount}.`
      );
    }
  });
};

export const fromRawTable = (raw: RawTable): DataTable => {
  const width = raw.headers.length;
  raw.rows.forEach((row, rowIndex) => {
    if (row.length !== width) {
      throw new TableShapeError(
        "RAGGED_ROW",
        `Row ${rowIndex + 1} has ${row.length} cells, expected ${width}.`
      );
    }
  });

  return {
    columns: raw.headers.map((name, columnIndex) => ({
      name,
      values: raw.rows.map((row) => row[columnIndex])
    }))
  };
};
