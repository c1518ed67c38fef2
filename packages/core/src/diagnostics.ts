/**
 * Runtime diagnostics.
 *
 * Messages go to the console with an `[ordkit]` prefix unless a writer is
 * supplied per call or installed process-wide.
 */

import { config } from "./config.js";

export type Severity = "error" | "warn" | "info" | "debug";

export type DiagnosticWriter = (line: string, severity: Severity) => void;

export interface EmitOptions {
  /** Custom writer function (default: the console method for the severity) */
  writer?: DiagnosticWriter;
  /** Prefix placed before the severity tag (default: "[ordkit]") */
  prefix?: string;
}

const DEFAULT_PREFIX = "[ordkit]";

let installedWriter: DiagnosticWriter | undefined;

function consoleWriter(line: string, severity: Severity): void {
  switch (severity) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    case "debug":
      console.debug(line);
      break;
  }
}

/**
 * Install a writer used by every later `emit` call. Pass `undefined` to go
 * back to the console.
 */
export function setDiagnosticWriter(writer: DiagnosticWriter | undefined): void {
  installedWriter = writer;
}

export function formatDiagnostic(
  severity: Severity,
  message: string,
  prefix: string = DEFAULT_PREFIX
): string {
  return `${prefix} ${severity.toUpperCase()}: ${message}`;
}

/**
 * Emit one diagnostic line. Debug lines are dropped unless `debug` is on.
 */
export function emit(severity: Severity, message: string, options: EmitOptions = {}): void {
  if (severity === "debug" && !config.has("debug")) return;
  const writer = options.writer ?? installedWriter ?? consoleWriter;
  writer(formatDiagnostic(severity, message, options.prefix), severity);
}
