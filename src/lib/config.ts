import { z } from "zod";

/**
 * Largest string Excel accepts in a single cell.
 */
export const EXCEL_CELL_CHAR_LIMIT = 32767;

/**
 * Environment variables read by the converter. Everything has a default,
 * so an empty environment is valid.
 */
const envSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z.string().default("production"),
  SENTRY_DSN: z.string().url().optional(),
  JSONSHEET_MAX_CELL_LENGTH: z.coerce
    .number()
    .int()
    .min(1)
    .max(EXCEL_CELL_CHAR_LIMIT)
    .default(32700),
  JSONSHEET_NOTE_PREVIEW_LENGTH: z.coerce.number().int().min(1).default(1000),
  JSONSHEET_SHEET_NAME: z.string().min(1).default("数据导出"),
  JSONSHEET_NOTE_AUTHOR: z.string().min(1).default("数据导出系统"),
});

/**
 * Resolved converter configuration.
 */
export interface AppConfig {
  logLevel: string;
  nodeEnv: string;
  sentryDsn?: string;
  /** Strings longer than this take the overflow path */
  maxCellLength: number;
  /** Characters of an overflowing value copied into its note */
  notePreviewLength: number;
  sheetName: string;
  noteAuthor: string;
}

/**
 * Raised when an environment variable holds an invalid value.
 */
export class ConfigError extends Error {
  readonly code = "CONFIG_ERROR";

  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Validate the environment and build the converter configuration.
 * Empty strings count as unset.
 *
 * @param env - Environment to read (defaults to process.env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV,
    sentryDsn: values.SENTRY_DSN,
    maxCellLength: values.JSONSHEET_MAX_CELL_LENGTH,
    notePreviewLength: values.JSONSHEET_NOTE_PREVIEW_LENGTH,
    sheetName: values.JSONSHEET_SHEET_NAME,
    noteAuthor: values.JSONSHEET_NOTE_AUTHOR,
  };
}
