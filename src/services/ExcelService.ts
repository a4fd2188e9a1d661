import { open, type FileHandle } from "node:fs/promises";
import ExcelJS from "exceljs";
import type { Cell, Comment, Workbook, Worksheet } from "exceljs";
import baseLogger, { createRunLogger, type Logger } from "../lib/logger.js";
import type { ApiRecord, ConversionResult } from "../types/index.js";
import {
  DATA_STYLE,
  HEADER_STYLE,
  collectFieldNames,
  getSafeSheetName,
  transformRecordForExcel,
  withOverflowHighlight,
} from "./excel-utils.js";
import {
  DEFAULT_OVERFLOW_OPTIONS,
  formatCellValue,
  type NoteContent,
  type OverflowOptions,
} from "./overflow-policy.js";
import { loadApiResponse, requireRecords } from "./record-loader.js";

/**
 * Attaches a note to a cell. Replaceable so callers can route notes
 * elsewhere or simulate a failing drawing layer.
 */
export type NoteAttacher = (cell: Cell, note: NoteContent) => void;

/**
 * Options for building a workbook.
 */
export interface WorkbookBuildOptions {
  /** Desired sheet name, sanitised before use */
  sheetName?: string;
  /** Overflow limits (defaults to DEFAULT_OVERFLOW_OPTIONS) */
  overflow?: OverflowOptions;
  /** Note attachment hook (defaults to attachCellNote) */
  attachNote?: NoteAttacher;
  /** Logger for per-cell warnings */
  logger?: Logger;
}

/**
 * Result of building a workbook in memory.
 */
export interface BuiltWorkbook {
  workbook: Workbook;
  worksheet: Worksheet;
  /** Column order used for the header and every row */
  fields: string[];
  overflowCount: number;
  annotationFailures: number;
}

/**
 * Options for a full file-to-file conversion.
 */
export type ConversionOptions = WorkbookBuildOptions;

const DEFAULT_SHEET_NAME = "数据导出";
const NOTE_FONT = { name: "宋体", size: 9 } as const;

/**
 * A note could not be attached to an overflowing cell.
 * Recovered per cell: the cell gets a fallback value instead.
 */
export class AnnotationAttachError extends Error {
  readonly code = "ANNOTATION_ATTACH_FAILED";

  constructor(
    message: string,
    public readonly address: string,
    public readonly fieldName: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AnnotationAttachError";
  }
}

/**
 * The workbook could not be written to disk.
 */
export class WriteError extends Error {
  readonly code = "WRITE_ERROR";

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "WriteError";
  }
}

/**
 * Default note attacher. The author goes in a bold first run, which is
 * how spreadsheet apps render a note's author.
 */
export const attachCellNote: NoteAttacher = (cell, note) => {
  const comment: Comment = {
    texts: [
      { text: `${note.author}:\n`, font: { ...NOTE_FONT, bold: true } },
      { text: note.body, font: { ...NOTE_FONT } },
    ],
    editAs: "absolute",
  };
  cell.note = comment;
};

function writeHeaderRow(worksheet: Worksheet, fields: readonly string[]): void {
  const row = worksheet.getRow(1);
  fields.forEach((field, index) => {
    const cell = row.getCell(index + 1);
    cell.value = field;
    cell.style = { ...HEADER_STYLE };
  });
}

/**
 * Build a single-sheet workbook from response records.
 *
 * Row 1 holds the field names; each record fills one row below it.
 * Strings over the overflow limit are replaced by a marker, get a note
 * with the preview, and are highlighted. If the note cannot be attached
 * the cell falls back to a length marker and the build carries on.
 *
 * @param records - Records to write, one row each
 * @param options - Build options
 * @returns The workbook with build statistics
 */
export function buildWorkbook(
  records: readonly ApiRecord[],
  options: WorkbookBuildOptions = {}
): BuiltWorkbook {
  const overflow = options.overflow ?? DEFAULT_OVERFLOW_OPTIONS;
  const attachNote = options.attachNote ?? attachCellNote;
  const log = options.logger ?? baseLogger;

  const workbook = new ExcelJS.Workbook();
  workbook.creator = overflow.noteAuthor;
  workbook.created = new Date();

  const sheetName = getSafeSheetName(options.sheetName ?? DEFAULT_SHEET_NAME);
  const worksheet = workbook.addWorksheet(sheetName);

  const fields = collectFieldNames(records);
  writeHeaderRow(worksheet, fields);

  let overflowCount = 0;
  let annotationFailures = 0;

  records.forEach((record, recordIndex) => {
    const row = worksheet.getRow(recordIndex + 2);
    const inputs = transformRecordForExcel(record, fields);

    inputs.forEach((input, columnIndex) => {
      const fieldName = fields[columnIndex];
      const cell = row.getCell(columnIndex + 1);
      cell.style = { ...DATA_STYLE };

      const outcome = formatCellValue(fieldName, input, overflow);
      if (outcome.kind === "plain") {
        cell.value = outcome.value;
        return;
      }

      overflowCount++;
      cell.value = outcome.value;

      try {
        attachNote(cell, outcome.note);
      } catch (error) {
        annotationFailures++;
        cell.value = outcome.fallbackValue;
        const failure = new AnnotationAttachError(
          `Failed to attach note to ${cell.address}`,
          cell.address,
          fieldName,
          { cause: error }
        );
        log.warn({ msg: failure.message, field: fieldName, err: failure });
        return;
      }

      cell.style = withOverflowHighlight(DATA_STYLE);
    });
  });

  return { workbook, worksheet, fields, overflowCount, annotationFailures };
}

/**
 * Serialize a workbook and write it to disk, replacing any existing file.
 *
 * The whole file is buffered before the target is opened, and the file
 * handle is closed whether or not the write succeeds. A failed close is
 * reported as a WriteError unless an earlier write failure is already
 * being thrown, in which case it is only logged.
 *
 * @param workbook - Workbook to write
 * @param path - Target file path
 * @param log - Logger for close failures that follow a write failure
 * @throws WriteError if serialization or any file operation fails
 */
export async function writeWorkbook(
  workbook: Workbook,
  path: string,
  log: Logger = baseLogger
): Promise<void> {
  let data: Uint8Array;
  try {
    data = new Uint8Array(await workbook.xlsx.writeBuffer());
  } catch (error) {
    throw new WriteError(`Failed to serialize workbook for ${path}`, path, {
      cause: error,
    });
  }

  let handle: FileHandle | undefined;
  let failure: WriteError | undefined;
  try {
    handle = await open(path, "w");
    await handle.writeFile(data);
  } catch (error) {
    failure = new WriteError(`Cannot write ${path}: ${reasonOf(error)}`, path, { cause: error });
  }

  if (handle) {
    try {
      await handle.close();
    } catch (error) {
      if (failure) {
        log.warn({ msg: `Failed to close ${path}`, err: error });
      } else {
        failure = new WriteError(`Cannot close ${path}: ${reasonOf(error)}`, path, {
          cause: error,
        });
      }
    }
  }

  if (failure) {
    throw failure;
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert a JSON API response file into an .xlsx workbook.
 *
 * @param jsonFilePath - Input JSON path
 * @param excelFilePath - Output workbook path
 * @param options - Build options
 * @returns Conversion summary
 * @throws LoadError if the input cannot be read or parsed
 * @throws EmptyDataError if the response holds no records
 * @throws WriteError if the workbook cannot be written
 *
 * @example
 * ```typescript
 * const result = await convertJsonToExcel("users.json", "users.xlsx");
 * console.log(`Wrote ${result.recordCount} rows to ${result.outputPath}`);
 * ```
 */
export async function convertJsonToExcel(
  jsonFilePath: string,
  excelFilePath: string,
  options: ConversionOptions = {}
): Promise<ConversionResult> {
  const log = options.logger ?? createRunLogger(jsonFilePath, excelFilePath);

  log.debug({ msg: "Loading JSON response" });
  const response = await loadApiResponse(jsonFilePath);
  const records = requireRecords(response);

  const built = buildWorkbook(records, { ...options, logger: log });
  await writeWorkbook(built.workbook, excelFilePath, log);

  const result: ConversionResult = {
    outputPath: excelFilePath,
    recordCount: records.length,
    columnCount: built.fields.length,
    overflowCount: built.overflowCount,
    annotationFailures: built.annotationFailures,
  };

  log.info({ msg: "Excel file written", ...result });
  return result;
}

export default convertJsonToExcel;
