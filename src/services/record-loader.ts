import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ApiRecord, ApiResponse } from "../types/index.js";

/** Envelope numbers: quoted digits are read as numbers, anything else is 0 */
const lenientNumber = z.coerce.number().int().catch(0);

/** Envelope strings: numbers and booleans are stringified, anything else is "" */
const lenientString = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(String)
  .catch("");

function isPlainRecord(value: unknown): value is ApiRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Records pass through untouched, so keys such as `__proto__` that
 * JSON.parse creates as own properties survive.
 */
const recordSchema = z.custom<ApiRecord>(isPlainRecord, { message: "Expected object" });

/**
 * Wire format of the response. Unknown fields are stripped and metadata
 * scalars never fail. Only the envelope shape and the record list are
 * checked.
 */
const responseDataSchema = z.object({
  page: lenientNumber,
  limit: lenientNumber,
  total: lenientNumber,
  order: lenientString,
  field: lenientString,
  data: z.array(recordSchema).nullable().optional(),
});

const apiResponseSchema = z.object({
  code: lenientNumber,
  msg: lenientString,
  requestId: lenientString,
  data: responseDataSchema.nullable().optional(),
});

/**
 * The input file could not be read or does not hold a valid response.
 */
export class LoadError extends Error {
  readonly code = "LOAD_ERROR";

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LoadError";
  }
}

export type EmptyDataReason = "missing-data" | "missing-records" | "empty-records";

/**
 * The response holds no records to convert.
 */
export class EmptyDataError extends Error {
  readonly code = "EMPTY_DATA";

  constructor(
    message: string,
    public readonly reason: EmptyDataReason,
  ) {
    super(message);
    this.name = "EmptyDataError";
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse an already-decoded JSON value into an ApiResponse.
 * A literal `null` document yields a response without data.
 *
 * @param json - Decoded JSON value
 * @param source - Path or label used in error messages
 */
export function parseApiResponse(json: unknown, source: string): ApiResponse {
  if (json === null) {
    return { code: 0, msg: "", requestId: "", data: null };
  }

  const parsed = apiResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new LoadError(
      `Unexpected response shape in ${source}: ${describeIssues(parsed.error)}`,
      source,
      { cause: parsed.error },
    );
  }

  const { code, msg, requestId, data } = parsed.data;
  return {
    code,
    msg,
    requestId,
    data: data
      ? {
          page: data.page,
          limit: data.limit,
          total: data.total,
          order: data.order,
          field: data.field,
          records: data.data ?? null,
        }
      : null,
  };
}

/**
 * Read a JSON file and parse it into an ApiResponse.
 *
 * @param path - Path to the JSON document
 * @throws LoadError if the file cannot be read or parsed
 */
export async function loadApiResponse(path: string): Promise<ApiResponse> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError(`Cannot read ${path}: ${reason}`, path, { cause: error });
  }

  let json: unknown;
  try {
    // Editors on Windows like to save JSON with a BOM
    json = JSON.parse(text.replace(/^\uFEFF/, ""));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError(`Invalid JSON in ${path}: ${reason}`, path, { cause: error });
  }

  return parseApiResponse(json, path);
}

/**
 * Return the response's records, or fail when there is nothing to convert.
 *
 * @throws EmptyDataError if data or its record list is missing or empty
 */
export function requireRecords(response: ApiResponse): ApiRecord[] {
  if (!response.data) {
    throw new EmptyDataError("Response has no data section", "missing-data");
  }
  if (!response.data.records) {
    throw new EmptyDataError("Response data has no record list", "missing-records");
  }
  if (response.data.records.length === 0) {
    throw new EmptyDataError("Record list is empty", "empty-records");
  }
  return response.data.records;
}
