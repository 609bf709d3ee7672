export type RawTableCell = string | number | boolean | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: RawTableCell[][];
};

export type SourceFileType = "csv" | "txt" | "xlsx" | "json";
