import { parseCsvText, parseWhitespaceText } from "./parseCsv";
import { parseJsonText } from "./parseJson";
import { parseXlsxBuffer } from "./parseXlsx";
import type { RawTable, SourceFileType } from "./types";

export type ParseFileResult = {
  rawTables: RawTable[];
  activeTable: RawTable;
  fileType: SourceFileType;
  sheetNames: string[];
};

export const SUPPORTED_EXTENSIONS = ["csv", "txt", "xlsx", "xls", "json"] as const;

const fileExtension = (name: string): string =>
  name.includes(".") ? name.split(".").pop()?.toLowerCase() ?? "" : "";

const decodeText = (buffer: ArrayBuffer): string => new TextDecoder("utf-8").decode(buffer);

const singleTable = (table: RawTable, fileType: SourceFileType): ParseFileResult => ({
  rawTables: [table],
  activeTable: table,
  fileType,
  sheetNames: []
});

const parseText = (text: string): RawTable => {
  const header = text.split(/\r?\n/, 1)[0] ?? "";
  return header.includes("\t") ? parseCsvText(text, { delimiter: "\t" }) : parseWhitespaceText(text);
};

export const parseFileBuffer = (fileName: string, buffer: ArrayBuffer): ParseFileResult => {
  const extension = fileExtension(fileName);

  if (extension === "csv") {
    return singleTable(parseCsvText(decodeText(buffer)), "csv");
  }
  if (extension === "txt") {
    return singleTable(parseText(decodeText(buffer)), "txt");
  }
  if (extension === "json") {
    return singleTable(parseJsonText(decodeText(buffer)), "json");
  }
  if (extension === "xlsx" || extension === "xls") {
    const tables = parseXlsxBuffer(buffer);
    if (tables.length === 0) {
      throw new Error("No sheets detected in the workbook.");
    }
    return {
      rawTables: tables,
      activeTable: tables[0],
      fileType: "xlsx",
      sheetNames: tables.map((table) => table.sheetName ?? "Sheet")
    };
  }

  throw new Error(
    `Unsupported file type. Please upload one of: ${SUPPORTED_EXTENSIONS.map((ext) => `.${ext}`).join(", ")}.`
  );
};

export const parseFile = async (file: File): Promise<ParseFileResult> =>
  parseFileBuffer(file.name, await file.arrayBuffer());
