export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  child(name: string): Logger;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function is_log_level(v: string): v is LogLevel {
  return v in LEVEL_ORDER;
}

export function parse_log_level(raw: string | undefined): LogLevel {
  const v = String(raw || "info").trim().toLowerCase();
  return is_log_level(v) ? v : "info";
}

function format_ctx(ctx: LogContext | undefined): string {
  if (!ctx) return "";
  const parts: string[] = [];
  for (const [k, v] of Object.entries(ctx)) {
    if (v === undefined) continue;
    parts.push(`${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/** `[시각 LEVEL name] msg k=v` 형식으로 콘솔에 기록. */
class ConsoleLogger implements Logger {
  constructor(
    private readonly name: string,
    private readonly level: LogLevel,
  ) {}

  debug(msg: string, ctx?: LogContext): void { this.log("debug", msg, ctx); }
  info(msg: string, ctx?: LogContext): void { this.log("info", msg, ctx); }
  warn(msg: string, ctx?: LogContext): void { this.log("warn", msg, ctx); }
  error(msg: string, ctx?: LogContext): void { this.log("error", msg, ctx); }

  child(name: string): Logger {
    return new ConsoleLogger(`${this.name}.${name}`, this.level);
  }

  private log(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const line = `[${new Date().toISOString()} ${level.toUpperCase()} ${this.name}] ${msg}${format_ctx(ctx)}`;
    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  }
}

const _log_level = parse_log_level(process.env.LOG_LEVEL);

export function create_logger(name: string, level: LogLevel = _log_level): Logger {
  return new ConsoleLogger(name, level);
}

