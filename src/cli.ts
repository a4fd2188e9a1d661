import { parseArgs } from "node:util";
import { ConfigError, loadConfig, type AppConfig } from "./lib/config.js";
import { createRunLogger, generateRunId } from "./lib/logger.js";
import { captureExceptionWithContext, flushSentry, initSentry } from "./lib/sentry.js";
import { convertJsonToExcel } from "./services/ExcelService.js";
import { DEFAULT_OVERFLOW_OPTIONS, type OverflowOptions } from "./services/overflow-policy.js";
import { EmptyDataError } from "./services/record-loader.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NO_DATA = 2;

const USAGE = `Usage: jsonsheet <jsonFilePath> [excelFilePath] [--sheet <name>]

Converts a paginated JSON API response into a single-sheet .xlsx workbook.
Values longer than the cell limit are truncated and attached as notes.

Options:
  -s, --sheet <name>  Worksheet name (default: $JSONSHEET_SHEET_NAME or 数据导出)
  -h, --help          Show this message
`;

interface Writable {
  write(chunk: string): unknown;
}

/**
 * Streams and environment the CLI talks to.
 */
export interface CliIO {
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
}

/**
 * Derive the workbook path from the input path by replacing the first
 * "json" with "xlsx". Paths without "json" get ".xlsx" appended so the
 * input is never overwritten.
 */
export function deriveOutputPath(jsonFilePath: string): string {
  if (!jsonFilePath.includes("json")) {
    return `${jsonFilePath}.xlsx`;
  }
  return jsonFilePath.replace("json", "xlsx");
}

function overflowOptionsFrom(config: AppConfig): OverflowOptions {
  return {
    ...DEFAULT_OVERFLOW_OPTIONS,
    maxCellLength: config.maxCellLength,
    commentPreviewLength: config.notePreviewLength,
    noteAuthor: config.noteAuthor,
  };
}

/**
 * Run the converter with command-line arguments.
 *
 * @param argv - Arguments after the executable and script
 * @param io - Output streams and environment
 * @returns Process exit code
 */
export async function runCli(
  argv: string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr, env: process.env }
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${reason}\n\n${USAGE}`);
    return EXIT_FAILURE;
  }

  if (parsed.values.help) {
    io.stdout.write(USAGE);
    return EXIT_OK;
  }

  const [jsonFilePath, explicitOutput] = parsed.positionals;
  if (!jsonFilePath) {
    io.stderr.write(`Missing JSON file path\n\n${USAGE}`);
    return EXIT_FAILURE;
  }

  let config: AppConfig;
  try {
    config = loadConfig(io.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr.write(`${error.message}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  initSentry({ dsn: config.sentryDsn, environment: config.nodeEnv });

  const excelFilePath = explicitOutput ?? deriveOutputPath(jsonFilePath);
  const runId = generateRunId();
  const log = createRunLogger(jsonFilePath, excelFilePath, runId);
  log.level = config.logLevel;

  try {
    const result = await convertJsonToExcel(jsonFilePath, excelFilePath, {
      sheetName: parsed.values.sheet ?? config.sheetName,
      overflow: overflowOptionsFrom(config),
      logger: log,
    });

    io.stdout.write(`Excel file written: ${result.outputPath}\n`);
    io.stdout.write(`Processed ${result.recordCount} records\n`);
    if (result.overflowCount > 0) {
      io.stdout.write(
        `${result.overflowCount} oversized values moved to notes` +
          (result.annotationFailures > 0
            ? ` (${result.annotationFailures} could not be attached)\n`
            : "\n")
      );
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof EmptyDataError) {
      log.warn({ msg: error.message, code: error.code, reason: error.reason });
      io.stderr.write(`No records to convert: ${error.message}\n`);
      return EXIT_NO_DATA;
    }

    const code = errorCodeOf(error);
    log.error({ msg: "Conversion failed", code, err: error });
    captureExceptionWithContext(error, {
      runId,
      errorCode: code,
      metadata: { input: jsonFilePath, output: excelFilePath },
    });
    const reason = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Conversion failed: ${reason}\n`);
    return EXIT_FAILURE;
  } finally {
    await flushSentry();
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      sheet: { type: "string", short: "s" },
      help: { type: "boolean", short: "h" },
    },
  });
}

function errorCodeOf(error: unknown): string {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "UNEXPECTED";
}
