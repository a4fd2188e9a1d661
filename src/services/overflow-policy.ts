import type { CellInput, ContentKind } from "../types/index.js";

/**
 * Limits that drive the overflow policy. Passed explicitly so callers can
 * convert with different limits side by side.
 */
export interface OverflowOptions {
  /** Strings longer than this are truncated and annotated */
  maxCellLength: number;
  /** Characters of the full value copied into the note */
  commentPreviewLength: number;
  /** Characters shown after the marker for JSON and XML values */
  structuredPreviewLength: number;
  /** Characters shown after the marker for plain text */
  textPreviewLength: number;
  /** Author label shown at the top of each note */
  noteAuthor: string;
}

export const DEFAULT_OVERFLOW_OPTIONS: Readonly<OverflowOptions> = {
  maxCellLength: 32700,
  commentPreviewLength: 1000,
  structuredPreviewLength: 200,
  textPreviewLength: 100,
  noteAuthor: "数据导出系统",
};

const NOTE_SEPARATOR = "----------------------------------------";

const CONTENT_LABELS: Record<ContentKind, string> = {
  json: "JSON 数据",
  xml: "XML 数据",
  base64: "Base64 编码数据",
  text: "文本数据",
};

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Note attached to an overflowing cell.
 */
export interface NoteContent {
  author: string;
  body: string;
}

/**
 * What to put in a cell for a given input.
 */
export type CellOutcome =
  | { kind: "plain"; value: string | number | boolean }
  | {
      kind: "overflow";
      /** Marker text shown in the cell */
      value: string;
      contentKind: ContentKind;
      note: NoteContent;
      /** Shown instead of `value` when the note cannot be attached */
      fallbackValue: string;
    };

export function isJsonLike(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed.length === 0) return false;
  return (
    (trimmed.startsWith("{") && trimmed.endsWith("}")) ||
    (trimmed.startsWith("[") && trimmed.endsWith("]"))
  );
}

export function isXmlLike(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed.length === 0) return false;
  return trimmed.startsWith("<?xml") || (trimmed.startsWith("<") && trimmed.endsWith(">"));
}

/**
 * Character-set check only; the value is never decoded.
 */
export function isBase64Like(text: string): boolean {
  if (text.length < 20) return false;
  return text.length % 4 === 0 && BASE64_PATTERN.test(text);
}

/**
 * Classify a string by shape. First match wins: JSON, XML, Base64, text.
 */
export function classifyContent(text: string): ContentKind {
  if (isJsonLike(text)) return "json";
  if (isXmlLike(text)) return "xml";
  if (isBase64Like(text)) return "base64";
  return "text";
}

/**
 * Build the marker text that replaces an overflowing value in its cell.
 */
export function createDisplayText(
  fullText: string,
  fieldName: string,
  kind: ContentKind,
  options: OverflowOptions = DEFAULT_OVERFLOW_OPTIONS,
): string {
  const total = fullText.length;

  switch (kind) {
    case "json":
      return `📊 [JSON数据: ${total}字符] ${fullText.slice(0, options.structuredPreviewLength)}...`;
    case "xml":
      return `📋 [XML数据: ${total}字符] ${fullText.slice(0, options.structuredPreviewLength)}...`;
    case "base64":
      return `🔒 [Base64数据: ${total}字符]`;
    case "text":
      return `📝 [${fieldName}: ${total}字符] ${fullText.slice(0, options.textPreviewLength)}...`;
  }
}

/**
 * Build the note body for an overflowing value: header, preview, omitted
 * count and content type.
 */
export function createNoteContent(
  fullText: string,
  fieldName: string,
  kind: ContentKind,
  options: OverflowOptions = DEFAULT_OVERFLOW_OPTIONS,
): string {
  const total = fullText.length;
  const previewLength = options.commentPreviewLength;

  let body =
    `字段: ${fieldName}\n` +
    `总长度: ${total} 字符\n` +
    `预览内容:\n` +
    `${NOTE_SEPARATOR}\n` +
    fullText.slice(0, previewLength);

  if (total > previewLength) {
    body += `\n${NOTE_SEPARATOR}\n... [剩余 ${total - previewLength} 字符未显示]`;
  }

  body += `\n\n📌 内容类型: ${CONTENT_LABELS[kind]}`;
  return body;
}

export function createFallbackText(fullText: string): string {
  return `[内容过长: ${fullText.length}字符]`;
}

/**
 * Decide what a cell shows for the given input.
 *
 * Null becomes an empty string, numbers and booleans pass through, and
 * strings up to `maxCellLength` are kept verbatim. Longer strings are
 * classified and replaced by a marker, with a note carrying the preview.
 *
 * @param fieldName - Column the value belongs to
 * @param input - Normalised record value
 * @param options - Overflow limits
 */
export function formatCellValue(
  fieldName: string,
  input: CellInput,
  options: OverflowOptions = DEFAULT_OVERFLOW_OPTIONS,
): CellOutcome {
  if (input.kind === "null") {
    return { kind: "plain", value: "" };
  }
  if (input.kind !== "string") {
    return { kind: "plain", value: input.value };
  }

  const text = input.value;
  if (text.length <= options.maxCellLength) {
    return { kind: "plain", value: text };
  }

  const contentKind = classifyContent(text);
  return {
    kind: "overflow",
    value: createDisplayText(text, fieldName, contentKind, options),
    contentKind,
    note: {
      author: options.noteAuthor,
      body: createNoteContent(text, fieldName, contentKind, options),
    },
    fallbackValue: createFallbackText(text),
  };
}
