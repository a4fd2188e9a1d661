/**
 * Sentry Module Unit Tests
 *
 * Tests initialization, no-op behavior when DSN is missing, context
 * enrichment and flushing.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// Track calls to scope methods
let scopeSetTag: ReturnType<typeof vi.fn>;
let scopeSetContext: ReturnType<typeof vi.fn>;
let mockInit: ReturnType<typeof vi.fn>;
let mockCaptureException: ReturnType<typeof vi.fn>;
let mockWithScope: ReturnType<typeof vi.fn>;
let mockFlush: ReturnType<typeof vi.fn>;

vi.mock("@sentry/node", () => {
  scopeSetTag = vi.fn();
  scopeSetContext = vi.fn();
  mockInit = vi.fn();
  mockCaptureException = vi.fn();
  mockFlush = vi.fn(async () => true);
  mockWithScope = vi.fn((callback: (scope: unknown) => void) => {
    callback({
      setTag: scopeSetTag,
      setContext: scopeSetContext,
    });
  });

  return {
    init: mockInit,
    captureException: mockCaptureException,
    withScope: mockWithScope,
    flush: mockFlush,
  };
});

describe("Sentry Module", () => {
  let sentryModule: typeof import("../sentry.js");

  beforeEach(async () => {
    vi.resetModules();
    vi.clearAllMocks();
    delete process.env.SENTRY_DSN;
    sentryModule = await import("../sentry.js");
  });

  afterEach(() => {
    delete process.env.SENTRY_DSN;
  });

  describe("initSentry", () => {
    it("does not call Sentry.init when no DSN is available", () => {
      sentryModule.initSentry();
      expect(mockInit).not.toHaveBeenCalled();
      expect(sentryModule.isSentryInitialized()).toBe(false);
    });

    it("initializes with an explicit DSN and environment", () => {
      sentryModule.initSentry({ dsn: "https://public@sentry.example.com/1", environment: "staging" });

      expect(mockInit).toHaveBeenCalledWith(
        expect.objectContaining({
          dsn: "https://public@sentry.example.com/1",
          environment: "staging",
        })
      );
      expect(sentryModule.isSentryInitialized()).toBe(true);
    });

    it("falls back to SENTRY_DSN from the environment", () => {
      process.env.SENTRY_DSN = "https://public@sentry.example.com/2";
      sentryModule.initSentry({ dsn: undefined });

      expect(mockInit).toHaveBeenCalledWith(
        expect.objectContaining({ dsn: "https://public@sentry.example.com/2" })
      );
    });
  });

  describe("captureExceptionWithContext", () => {
    it("is a no-op before initialization", () => {
      sentryModule.captureExceptionWithContext(new Error("boom"));
      expect(mockCaptureException).not.toHaveBeenCalled();
    });

    it("attaches run ID, error code and metadata", () => {
      sentryModule.initSentry({ dsn: "https://public@sentry.example.com/1" });
      const error = new Error("boom");

      sentryModule.captureExceptionWithContext(error, {
        runId: "run-1",
        errorCode: "LOAD_ERROR",
        metadata: { input: "a.json" },
      });

      expect(scopeSetTag).toHaveBeenCalledWith("runId", "run-1");
      expect(scopeSetTag).toHaveBeenCalledWith("errorCode", "LOAD_ERROR");
      expect(scopeSetContext).toHaveBeenCalledWith("metadata", { input: "a.json" });
      expect(mockCaptureException).toHaveBeenCalledWith(error);
    });
  });

  describe("flushSentry", () => {
    it("resolves immediately when Sentry is disabled", async () => {
      await expect(sentryModule.flushSentry()).resolves.toBe(true);
      expect(mockFlush).not.toHaveBeenCalled();
    });

    it("waits for the queue when Sentry is enabled", async () => {
      sentryModule.initSentry({ dsn: "https://public@sentry.example.com/1" });

      await expect(sentryModule.flushSentry(500)).resolves.toBe(true);
      expect(mockFlush).toHaveBeenCalledWith(500);
    });
  });
});
