import type { RawTable, RawTableCell } from "./types";

export type CsvParseOptions = {
  delimiter?: string;
};

const candidateDelimiters = [",", ";", "\t"];

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const detectDelimiter = (headerLine: string): string => {
  let best = ",";
  let bestCount = 0;
  candidateDelimiters.forEach((delimiter) => {
    const count = headerLine.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  });
  return best;
};

const firstLine = (text: string): string => {
  const end = text.indexOf("\n");
  return end === -1 ? text : text.slice(0, end);
};

/** Splits delimited text into records; quoted fields may contain delimiters, doubled quotes and newlines. */
const parseRecords = (text: string, delimiter: string): string[][] => {
  const records: string[][] = [];
  let record: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '"') {
      if (inQuotes && text[index + 1] === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }
    if (!inQuotes && char === delimiter) {
      record.push(current);
      current = "";
      continue;
    }
    if (!inQuotes && char === "\n") {
      record.push(current);
      records.push(record);
      record = [];
      current = "";
      continue;
    }
    current += char;
  }

  if (current.length > 0 || record.length > 0) {
    record.push(current);
    records.push(record);
  }

  return records.filter((entry) => entry.some((cell) => cell.trim().length > 0));
};

const toCell = (value: string): RawTableCell => (value.trim() === "" ? null : value);

export const buildHeaders = (rawHeaders: readonly unknown[]): string[] => {
  const used = new Set<string>();
  return rawHeaders.map((header, index) => {
    const label = header === null || header === undefined ? "" : String(header).trim();
    let name = label || `Column ${index + 1}`;
    let suffix = 1;
    while (used.has(name)) {
      name = `${label || `Column ${index + 1}`}.${suffix}`;
      suffix += 1;
    }
    used.add(name);
    return name;
  });
};

export const recordsToTable = (records: readonly (readonly RawTableCell[])[], rawHeaders: readonly unknown[]): RawTable => {
  const headers = buildHeaders(rawHeaders);
  const rows = records.map((record) => headers.map((_, index) => record[index] ?? null));
  return { headers, rows };
};

export const parseCsvText = (text: string, options: CsvParseOptions = {}): RawTable => {
  const sanitized = sanitizeText(text);
  const delimiter = options.delimiter ?? detectDelimiter(firstLine(sanitized));
  const records = parseRecords(sanitized, delimiter);
  if (records.length === 0) {
    throw new Error("CSV appears to be empty.");
  }

  const [rawHeaders, ...body] = records;
  return recordsToTable(
    body.map((record) => record.map(toCell)),
    rawHeaders
  );
};

export const parseWhitespaceText = (text: string): RawTable => {
  const lines = sanitizeText(text)
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length === 0) {
    throw new Error("Text file appears to be empty.");
  }

  const [headerLine, ...body] = lines.map((line) => line.split(/\s+/));
  return recordsToTable(body, headerLine);
};
