import { describe, it, expect, afterEach, vi } from "vitest";
import { config, emit, formatDiagnostic, setDiagnosticWriter, type Severity } from "../src/index.js";

describe("diagnostics", () => {
  afterEach(() => {
    setDiagnosticWriter(undefined);
    config.reset();
    vi.restoreAllMocks();
  });

  it("formats with prefix and severity", () => {
    expect(formatDiagnostic("warn", "list out of order")).toBe("[ordkit] WARN: list out of order");
    expect(formatDiagnostic("error", "boom", "[test]")).toBe("[test] ERROR: boom");
  });

  it("writes through a per-call writer", () => {
    const lines: Array<[string, Severity]> = [];
    emit("info", "hello", { writer: (line, severity) => lines.push([line, severity]) });
    expect(lines).toEqual([["[ordkit] INFO: hello", "info"]]);
  });

  it("uses an installed writer", () => {
    const lines: string[] = [];
    setDiagnosticWriter((line) => lines.push(line));
    emit("error", "bad");
    expect(lines).toEqual(["[ordkit] ERROR: bad"]);
  });

  it("falls back to the console", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    emit("warn", "careful");
    expect(warn).toHaveBeenCalledWith("[ordkit] WARN: careful");
  });

  it("drops debug lines unless debug is enabled", () => {
    const lines: string[] = [];
    setDiagnosticWriter((line) => lines.push(line));
    emit("debug", "hidden");
    expect(lines).toEqual([]);

    config.set({ debug: true });
    emit("debug", "shown");
    expect(lines).toEqual(["[ordkit] DEBUG: shown"]);
  });
});
