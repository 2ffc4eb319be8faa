/**
 * InvoiceVerifier – Lightweight console logger
 *
 * Debug and info lines are printed only when enabled; warnings and errors
 * always are. With `stderr` set, nothing is written to stdout, which then
 * carries only the machine-readable report.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface InvoiceVerifierLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Print debug/info (default: false) */
  enabled?: boolean;
  /** Appended to the prefix: [InvoiceVerifier:ocr] */
  scope?: string;
  /** Route debug/info to stderr as well */
  stderr?: boolean;
}

const PREFIX = "InvoiceVerifier";

type ConsoleMethod = (message: string, ...args: unknown[]) => void;

function consoleFor(level: LogLevel, stderr: boolean): ConsoleMethod {
  if (level === "warn") return console.warn;
  if (level === "error" || stderr) return console.error;
  return level === "debug" ? console.log : console.info;
}

/**
 * Create a logger instance.
 *
 * @param options – `true`/`false` is shorthand for `{ enabled }`.
 */
export function createLogger(
  options: boolean | LoggerOptions = false,
): InvoiceVerifierLogger {
  const { enabled = false, scope, stderr = false } =
    typeof options === "boolean" ? { enabled: options } : options;
  const tag = scope ? `[${PREFIX}:${scope}]` : `[${PREFIX}]`;

  const emit = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!enabled && (level === "debug" || level === "info")) return;
    const line = `${tag}[${level.toUpperCase()}][${new Date().toISOString()}] ${message}`;
    consoleFor(level, stderr)(line, ...args);
  };

  return {
    debug: (message, ...args) => emit("debug", message, args),
    info: (message, ...args) => emit("info", message, args),
    warn: (message, ...args) => emit("warn", message, args),
    error: (message, ...args) => emit("error", message, args),
  };
}

/** Shared quiet logger (debug and info suppressed) */
export const silentLogger: InvoiceVerifierLogger = createLogger(false);
