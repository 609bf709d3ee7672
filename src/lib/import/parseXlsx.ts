import * as XLSX from "xlsx";
import { recordsToTable } from "./parseCsv";
import type { RawTable, RawTableCell } from "./types";

const normalizeCell = (value: unknown): RawTableCell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  const text = String(value);
  return text.trim() === "" ? null : text;
};

export const parseXlsxBuffer = (buffer: ArrayBuffer): RawTable[] => {
  const workbook = XLSX.read(buffer, { type: "array" });
  return workbook.SheetNames.map((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      blankrows: false
    });

    const [rawHeaders = [], ...body] = rows;
    const table = recordsToTable(
      body.map((row) => Array.from(row, normalizeCell)),
      rawHeaders
    );
    return { sheetName, ...table };
  });
};
