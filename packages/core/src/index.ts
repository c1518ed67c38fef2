/**
 * @ordkit/core — configuration and diagnostics shared by the ordkit packages.
 */

export type { InvariantCheckMode, ChecksConfig, OrdkitConfig } from "./config.js";
export { config, defineConfig, parseEnvConfig, ConfigError } from "./config.js";

export type { Severity, DiagnosticWriter, EmitOptions } from "./diagnostics.js";
export { emit, formatDiagnostic, setDiagnosticWriter } from "./diagnostics.js";
