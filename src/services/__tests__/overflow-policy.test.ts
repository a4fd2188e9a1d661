import { describe, it, expect } from "vitest";
import {
  DEFAULT_OVERFLOW_OPTIONS,
  classifyContent,
  createDisplayText,
  createFallbackText,
  createNoteContent,
  formatCellValue,
  isBase64Like,
  isJsonLike,
  isXmlLike,
} from "../overflow-policy.js";

const SEPARATOR = "----------------------------------------";

describe("classifyContent", () => {
  it("detects JSON objects and arrays after trimming", () => {
    expect(classifyContent('{"a":1}')).toBe("json");
    expect(classifyContent("  [1, 2, 3]\n")).toBe("json");
  });

  it("does not treat mismatched brackets as JSON", () => {
    expect(isJsonLike("{1, 2]")).toBe(false);
    expect(isJsonLike("[oops}")).toBe(false);
  });

  it("detects XML by declaration or angle brackets", () => {
    expect(classifyContent('<?xml version="1.0"?>trailing text')).toBe("xml");
    expect(classifyContent("  <root><child/></root>  ")).toBe("xml");
    expect(isXmlLike("<unterminated")).toBe(false);
  });

  it("detects Base64 by charset, padding and length", () => {
    expect(classifyContent("QUJD".repeat(5))).toBe("base64");
    expect(classifyContent("A".repeat(18) + "==")).toBe("base64");
    expect(isBase64Like("QUJD")).toBe(false);
    expect(isBase64Like("A".repeat(21))).toBe(false);
    expect(isBase64Like("A".repeat(17) + "===")).toBe(false);
    expect(isBase64Like("QUJD QUJD QUJD QUJD Q")).toBe(false);
  });

  it("never classifies the empty string as Base64", () => {
    expect(isBase64Like("")).toBe(false);
    expect(classifyContent("")).toBe("text");
  });

  it("prefers JSON over Base64 when a JSON shell wraps a Base64 body", () => {
    expect(classifyContent("{" + "QUJD".repeat(25) + "}")).toBe("json");
  });

  it("falls back to text", () => {
    expect(classifyContent("x".repeat(50))).toBe("text");
  });
});

describe("createDisplayText", () => {
  it("formats JSON with a 200 character preview", () => {
    const value = "{" + "a".repeat(32700) + "}";
    expect(createDisplayText(value, "payload", "json")).toBe(
      `📊 [JSON数据: 32702字符] {${"a".repeat(199)}...`
    );
  });

  it("formats XML with a 200 character preview", () => {
    const value = "<doc>" + "b".repeat(300) + "</doc>";
    expect(createDisplayText(value, "payload", "xml")).toBe(
      `📋 [XML数据: 311字符] <doc>${"b".repeat(195)}...`
    );
  });

  it("formats Base64 without a preview", () => {
    expect(createDisplayText("QUJD".repeat(10), "file", "base64")).toBe("🔒 [Base64数据: 40字符]");
  });

  it("formats text with the field name and a 100 character preview", () => {
    expect(createDisplayText("y".repeat(150), "remark", "text")).toBe(
      `📝 [remark: 150字符] ${"y".repeat(100)}...`
    );
  });
});

describe("createNoteContent", () => {
  it("reports omitted characters when the value exceeds the preview", () => {
    const value = "x".repeat(40000);
    expect(createNoteContent(value, "blob", "text")).toBe(
      "字段: blob\n" +
        "总长度: 40000 字符\n" +
        "预览内容:\n" +
        `${SEPARATOR}\n` +
        "x".repeat(1000) +
        `\n${SEPARATOR}\n` +
        "... [剩余 39000 字符未显示]" +
        "\n\n📌 内容类型: 文本数据"
    );
  });

  it("omits the remainder line when the value fits the preview", () => {
    const options = { ...DEFAULT_OVERFLOW_OPTIONS, commentPreviewLength: 10 };
    expect(createNoteContent("abcdefghij", "f", "base64", options)).toBe(
      `字段: f\n总长度: 10 字符\n预览内容:\n${SEPARATOR}\nabcdefghij\n\n📌 内容类型: Base64 编码数据`
    );
  });

  it("labels JSON and XML content", () => {
    expect(createNoteContent("{}", "f", "json").endsWith("📌 内容类型: JSON 数据")).toBe(true);
    expect(createNoteContent("<a/>", "f", "xml").endsWith("📌 内容类型: XML 数据")).toBe(true);
  });
});

describe("formatCellValue", () => {
  it("renders null as an empty string", () => {
    expect(formatCellValue("a", { kind: "null" })).toEqual({ kind: "plain", value: "" });
  });

  it("passes numbers and booleans through without a length check", () => {
    expect(formatCellValue("a", { kind: "number", value: 3.5 })).toEqual({
      kind: "plain",
      value: 3.5,
    });
    expect(formatCellValue("a", { kind: "boolean", value: false })).toEqual({
      kind: "plain",
      value: false,
    });
  });

  it("keeps a string of exactly the limit verbatim", () => {
    const value = "x".repeat(32700);
    expect(formatCellValue("a", { kind: "string", value })).toEqual({ kind: "plain", value });
  });

  it("keeps short JSON verbatim without classifying it", () => {
    const value = '{"nested":true}';
    expect(formatCellValue("a", { kind: "string", value })).toEqual({ kind: "plain", value });
  });

  it("takes the overflow path one character past the limit", () => {
    const value = "x".repeat(32701);
    const outcome = formatCellValue("memo", { kind: "string", value });

    expect(outcome).toEqual({
      kind: "overflow",
      value: `📝 [memo: 32701字符] ${"x".repeat(100)}...`,
      contentKind: "text",
      note: {
        author: "数据导出系统",
        body: createNoteContent(value, "memo", "text"),
      },
      fallbackValue: "[内容过长: 32701字符]",
    });
  });

  it("honours custom limits and author", () => {
    const options = {
      ...DEFAULT_OVERFLOW_OPTIONS,
      maxCellLength: 10,
      textPreviewLength: 3,
      noteAuthor: "exporter",
    };
    const outcome = formatCellValue("f", { kind: "string", value: "hello world" }, options);

    expect(outcome.kind).toBe("overflow");
    if (outcome.kind !== "overflow") return;
    expect(outcome.value).toBe("📝 [f: 11字符] hel...");
    expect(outcome.note.author).toBe("exporter");
  });
});

describe("createFallbackText", () => {
  it("states the content length", () => {
    expect(createFallbackText("z".repeat(12345))).toBe("[内容过长: 12345字符]");
  });
});
