/**
 * A single record from the response list. Field sets may differ between
 * records; values are whatever the upstream API put there.
 */
export type ApiRecord = Record<string, unknown>;

/**
 * Pagination envelope around the record list.
 * On the wire the list is named `data`; the loader exposes it as `records`.
 */
export interface ResponseData {
  page: number;
  limit: number;
  total: number;
  order: string;
  field: string;
  /** Records in response order, or null when the list was absent */
  records: ApiRecord[] | null;
}

/**
 * Top-level API response as read from the input file.
 */
export interface ApiResponse {
  code: number;
  msg: string;
  requestId: string;
  data: ResponseData | null;
}

/**
 * Normalised cell input. Every record value is mapped onto one of these
 * before it reaches the overflow policy.
 */
export type CellInput =
  | { kind: "null" }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "string"; value: string };

/**
 * Detected shape of an overflowing string.
 */
export type ContentKind = "json" | "xml" | "base64" | "text";

/**
 * Summary returned by a successful conversion.
 */
export interface ConversionResult {
  /** Path of the written workbook */
  outputPath: string;
  /** Number of data rows written */
  recordCount: number;
  /** Number of columns (distinct field names) */
  columnCount: number;
  /** Cells that took the overflow path */
  overflowCount: number;
  /** Overflow cells whose note could not be attached */
  annotationFailures: number;
}
