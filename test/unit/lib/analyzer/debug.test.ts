/**
 * Debug logging tests.
 */
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, vi, afterEach } from "vitest";
import { DEFAULT_LOGGING_CONFIG } from "@/lib/config-schemas";
import { createDebugLogger, formatLogLine } from "@/lib/analyzer/debug";

const TS = "2026-01-01T00:00:00.000Z";

describe("formatLogLine", () => {
  it("renders timestamp, scope and message", () => {
    expect(formatLogLine("Retriever", "Retrieved 3 items", undefined, 8000, TS)).toBe(
      "[2026-01-01T00:00:00.000Z] [Retriever] Retrieved 3 items",
    );
  });

  it("appends JSON payloads and serializes errors by name and message", () => {
    expect(formatLogLine("S", "m", { count: 2 }, 8000, TS)).toBe(`[${TS}] [S] m | {"count":2}`);
    expect(formatLogLine("S", "m", new Error("boom"), 8000, TS)).toBe(`[${TS}] [S] m | {"name":"Error","message":"boom"}`);
    expect(formatLogLine("S", "m", "plain", 8000, TS)).toBe(`[${TS}] [S] m | plain`);
  });

  it("truncates long payloads", () => {
    expect(formatLogLine("S", "m", "abcdef", 3, TS)).toBe(`[${TS}] [S] m | abc…[truncated]`);
  });

  it("marks unserializable payloads", () => {
    const circular: { self?: unknown } = {};
    circular.self = circular;
    expect(formatLogLine("S", "m", circular, 8000, TS)).toBe(`[${TS}] [S] m | [unserializable]`);
  });
});

describe("createDebugLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("routes levels to the matching console method", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createDebugLogger("Pipeline", DEFAULT_LOGGING_CONFIG);
    logger.info("started");
    logger.warn("slow");
    logger.error("failed");

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toMatch(/\[Pipeline\] started$/);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("appends lines to the log file without console output", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "claim-verifier-log-"));
    const filePath = path.join(dir, "debug.log");

    const logger = createDebugLogger("Verifier", { ...DEFAULT_LOGGING_CONFIG, filePath, console: false });
    logger.info("hello", { n: 1 });

    await vi.waitFor(() => {
      expect(fs.readFileSync(filePath, "utf-8")).toMatch(/\[Verifier\] hello \| \{"n":1\}\n$/);
    });
    expect(log).not.toHaveBeenCalled();
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
