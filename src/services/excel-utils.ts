import type { Borders, Fill, Style } from "exceljs";
import type { ApiRecord, CellInput } from "../types/index.js";

const MAX_SHEET_NAME_LENGTH = 31;
const INVALID_SHEET_NAME_CHARS = /[:\\/?*[\]]/g;

const THIN_BORDER: Partial<Borders> = {
  top: { style: "thin" },
  left: { style: "thin" },
  bottom: { style: "thin" },
  right: { style: "thin" },
};

/**
 * Header cells: bold white text on dark blue, centred.
 */
export const HEADER_STYLE: Readonly<Partial<Style>> = {
  font: { bold: true, size: 12, color: { argb: "FFFFFFFF" } },
  fill: { type: "pattern", pattern: "solid", fgColor: { argb: "FF000080" } },
  alignment: { horizontal: "center", vertical: "middle" },
  border: THIN_BORDER,
};

/**
 * Base style for every data cell.
 */
export const DATA_STYLE: Readonly<Partial<Style>> = {
  alignment: { horizontal: "left", vertical: "top", wrapText: true },
  border: THIN_BORDER,
};

/** Light yellow fill marking cells whose full value lives in a note */
export const OVERFLOW_FILL: Fill = {
  type: "pattern",
  pattern: "solid",
  fgColor: { argb: "FFFFFF99" },
};

/**
 * Compose a new style from a base style with the overflow fill on top.
 * The base is left untouched.
 */
export function withOverflowHighlight(base: Readonly<Partial<Style>>): Partial<Style> {
  return { ...base, fill: OVERFLOW_FILL };
}

/**
 * Map a raw record value onto a cell input.
 * Objects and arrays are serialised as JSON; undefined counts as null.
 *
 * @param value - Value as decoded from the response
 */
export function toCellInput(value: unknown): CellInput {
  if (value === null || value === undefined) {
    return { kind: "null" };
  }
  if (typeof value === "number") {
    return { kind: "number", value };
  }
  if (typeof value === "boolean") {
    return { kind: "boolean", value };
  }
  if (typeof value === "string") {
    return { kind: "string", value };
  }
  if (typeof value === "object") {
    return { kind: "string", value: JSON.stringify(value) };
  }
  return { kind: "string", value: String(value) };
}

/**
 * Transform a response record into cell inputs for the given columns.
 * Columns the record lacks come back as null inputs.
 *
 * @param record - Response record
 * @param fields - Column order
 * @returns One cell input per field, in field order
 */
export function transformRecordForExcel(
  record: ApiRecord,
  fields: readonly string[]
): CellInput[] {
  return fields.map((field) =>
    toCellInput(Object.prototype.hasOwnProperty.call(record, field) ? record[field] : undefined)
  );
}

/**
 * Collect the distinct field names of all records, in the order they
 * are first seen.
 *
 * @param records - Response records
 * @returns Column names for the header row
 */
export function collectFieldNames(records: readonly ApiRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  return [...seen];
}

/**
 * Sanitize a sheet name.
 * Excel limits: 31 chars, no []\/?:*, no leading or trailing apostrophe
 *
 * @param name - Desired sheet name
 * @returns Valid name, or "Sheet" when nothing usable remains
 */
export function getSafeSheetName(name: string): string {
  const safe = name
    .replace(INVALID_SHEET_NAME_CHARS, " ")
    .trim()
    .replace(/^'+|'+$/g, "")
    .slice(0, MAX_SHEET_NAME_LENGTH);

  return safe.length > 0 ? safe : "Sheet";
}
