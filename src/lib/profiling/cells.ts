import type { CellValue, Dataset } from "./types";

const MAX_SAMPLE_LENGTH = 120;

const nullTokens = new Set(["na", "n/a", "nan", "null", "none", "-"]);
const trueTokens = new Set(["true", "yes", "y", "t"]);
const falseTokens = new Set(["false", "no", "n", "f"]);

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const commaDecimalPattern = /^-?\d+,\d+(?:[eE][+-]?\d+)?$/;
const thousandsPattern = /^-?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;
const currencyPrefixPattern = /^([-+]?)[$€£¥]/;

const isoDatePattern =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const usDatePattern = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

export const isNullCell = (value: CellValue | undefined): boolean => {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === "number") {
    return !Number.isFinite(value);
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length === 0 || nullTokens.has(trimmed.toLowerCase());
  }
  return false;
};

export const parseNumericCell = (value: CellValue): number | null => {
  if (value === null || typeof value === "boolean") {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  let cleaned = value.trim().replace(/\s+/g, "");
  if (!cleaned) {
    return null;
  }
  const currency = currencyPrefixPattern.exec(cleaned);
  if (currency) {
    cleaned = `${currency[1]}${cleaned.slice(currency[0].length)}`;
  }
  if (cleaned.startsWith("+")) {
    cleaned = cleaned.slice(1);
  }
  if (thousandsPattern.test(cleaned)) {
    cleaned = cleaned.replace(/,/g, "");
  } else if (commaDecimalPattern.test(cleaned)) {
    cleaned = cleaned.replace(",", ".");
  }
  if (!numericPattern.test(cleaned)) {
    return null;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
};

export const parseBooleanCell = (value: CellValue): boolean | null => {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return null;
  }
  const token = value.trim().toLowerCase();
  if (trueTokens.has(token)) {
    return true;
  }
  if (falseTokens.has(token)) {
    return false;
  }
  return null;
};

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

const offsetMinutes = (offset: string | undefined): number | null => {
  if (!offset || offset.toUpperCase() === "Z") {
    return 0;
  }
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 14 || minutes > 59) {
    return null;
  }
  const total = hours * 60 + minutes;
  return offset.startsWith("-") ? -total : total;
};

const toUtcTimestamp = (parts: {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
  offset?: number;
}): number | null => {
  const { year, month, day, hour = 0, minute = 0, second = 0, millisecond = 0, offset = 0 } =
    parts;
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  return (
    Date.UTC(year, month - 1, day, hour, minute, second, millisecond) - offset * 60_000
  );
};

/**
 * Parses ISO-like (`2024-03-01`, `2024/03/01 10:15`, `2024-03-01T10:15:00Z`) and
 * US (`03/01/2024`) date strings into epoch milliseconds. Timestamps without an
 * offset are read as UTC. Numbers and booleans are never dates.
 */
export const parseDateCell = (value: CellValue): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  const iso = isoDatePattern.exec(trimmed);
  if (iso) {
    const offset = offsetMinutes(iso[8]);
    if (offset === null) {
      return null;
    }
    return toUtcTimestamp({
      year: Number(iso[1]),
      month: Number(iso[2]),
      day: Number(iso[3]),
      hour: iso[4] ? Number(iso[4]) : 0,
      minute: iso[5] ? Number(iso[5]) : 0,
      second: iso[6] ? Number(iso[6]) : 0,
      millisecond: iso[7] ? Number(iso[7].padEnd(3, "0")) : 0,
      offset
    });
  }
  const us = usDatePattern.exec(trimmed);
  if (us) {
    return toUtcTimestamp({
      year: Number(us[3]),
      month: Number(us[1]),
      day: Number(us[2])
    });
  }
  return null;
};

export const toLabel = (value: CellValue): string => {
  if (value === null) {
    return "";
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value.toString() : "";
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return value.trim();
};

export const toSampleText = (value: CellValue): string =>
  toLabel(value).slice(0, MAX_SAMPLE_LENGTH);

export const readCell = (row: Dataset["rows"][number], column: string): CellValue => {
  const value = row[column];
  return value === undefined ? null : value;
};

export const readNumericColumn = (dataset: Dataset, column: string): (number | null)[] =>
  dataset.rows.map((row) => parseNumericCell(readCell(row, column)));

export const readDateColumn = (dataset: Dataset, column: string): (number | null)[] =>
  dataset.rows.map((row) => parseDateCell(readCell(row, column)));

export const readTextColumn = (dataset: Dataset, column: string): (string | null)[] =>
  dataset.rows.map((row) => {
    const cell = readCell(row, column);
    return isNullCell(cell) ? null : toLabel(cell);
  });
