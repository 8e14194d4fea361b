/**
 * Line logger for Troupe.
 *
 * Everything goes to stderr so stdout stays clean for `--json` output and
 * for tools that pipe results. Each line reads:
 *
 *   [troupe] info  engine pipeline_start pipeline=review strategy=sequential
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return fallback;
  }
}

function formatValue(value: string | number | boolean | null): string {
  if (typeof value !== "string") return String(value);
  return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
}

export function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(" ");
}

export type LoggerOptions = {
  level?: LogLevel;
  sink?: LogSink;
};

export class Logger {
  private readonly scope: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(scope: string, options: LoggerOptions = {}) {
    this.scope = scope;
    this.level = options.level ?? parseLogLevel(process.env.TROUPE_LOG_LEVEL);
    this.sink = options.sink ?? ((line) => process.stderr.write(`${line}\n`));
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}.${scope}`, { level: this.level, sink: this.sink });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) return;
    const suffix = formatFields(fields);
    const line = `[troupe] ${level.padEnd(5)} ${this.scope} ${message}`;
    this.sink(suffix ? `${line} ${suffix}` : line);
  }
}

export function createLogger(scope: string, options?: LoggerOptions): Logger {
  return new Logger(scope, options);
}

/** Trims long free text (tasks, replies) before it goes into a log line. */
export function preview(text: string, max = 80): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}
