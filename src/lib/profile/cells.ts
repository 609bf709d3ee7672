import type { RawCell, ResolvedCell } from "./types";

const numericPattern = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

export const MISSING_TOKENS: ReadonlySet<string> = new Set([
  "",
  "NA",
  "N/A",
  "NaN",
  "nan",
  "null",
  "NULL",
  "None",
  "#N/A"
]);

const MISSING: ResolvedCell = { kind: "missing" };

export const isMissingCell = (value: RawCell): boolean => {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === "number") {
    return Number.isNaN(value);
  }
  if (typeof value === "string") {
    return MISSING_TOKENS.has(value.trim());
  }
  return false;
};

export const parseNumericText = (value: string): number | null => {
  const trimmed = value.trim();
  if (!numericPattern.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

export const resolveCell = (value: RawCell): ResolvedCell => {
  if (value === null || value === undefined || isMissingCell(value)) {
    return MISSING;
  }
  if (typeof value === "boolean") {
    return { kind: "text", text: value ? "TRUE" : "FALSE" };
  }
  if (typeof value === "number") {
    const text = String(value);
    return Number.isFinite(value) ? { kind: "number", value, text } : { kind: "text", text };
  }
  const parsed = parseNumericText(value);
  return parsed === null ? { kind: "text", text: value } : { kind: "number", value: parsed, text: value };
};
