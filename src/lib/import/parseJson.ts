import { recordsToTable } from "./parseCsv";
import type { RawTable, RawTableCell } from "./types";

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toCell = (value: unknown): RawTableCell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return JSON.stringify(value);
};

const fromRecords = (records: readonly unknown[]): RawTable => {
  const headers: string[] = [];
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (!isRecord(record)) {
      throw new Error(`JSON row ${index + 1} is not an object.`);
    }
    Object.keys(record).forEach((key) => {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    });
  });

  const rows = records.map((record) =>
    headers.map((header) => (isRecord(record) ? toCell(record[header]) : null))
  );
  return recordsToTable(rows, headers);
};

// { columns: [...], data: [[...], ...] }
const fromSplit = (columns: readonly unknown[], data: readonly unknown[]): RawTable => {
  const rows = data.map((row, index) => {
    if (!Array.isArray(row)) {
      throw new Error(`JSON data row ${index + 1} is not an array.`);
    }
    return row.map(toCell);
  });
  return recordsToTable(rows, columns);
};

// { column: [values] } or { column: { rowKey: value } }
const fromColumns = (source: JsonRecord): RawTable => {
  const headers = Object.keys(source);
  const columns = headers.map((header) => {
    const values = source[header];
    if (Array.isArray(values)) {
      return values;
    }
    if (isRecord(values)) {
      return Object.values(values);
    }
    throw new Error(`JSON column "${header}" must be an array or an object.`);
  });
  const rowCount = columns.reduce((max, values) => Math.max(max, values.length), 0);
  const rows = Array.from({ length: rowCount }, (_, rowIndex) =>
    columns.map((values) => toCell(values[rowIndex]))
  );
  return recordsToTable(rows, headers);
};

export const parseJsonText = (text: string): RawTable => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`JSON could not be parsed: ${reason}`);
  }

  if (Array.isArray(parsed)) {
    return fromRecords(parsed);
  }
  if (isRecord(parsed)) {
    const { columns, data } = parsed;
    if (Array.isArray(columns) && Array.isArray(data)) {
      return fromSplit(columns, data);
    }
    return fromColumns(parsed);
  }
  throw new Error("JSON must contain an array of rows or an object of columns.");
};
