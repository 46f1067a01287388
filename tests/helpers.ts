import type { LogContext, Logger } from "../src/logger.ts";
import type { SayFn } from "../src/commands/types.ts";

export type LogRecord = { level: "debug" | "info" | "warn" | "error"; msg: string; ctx?: LogContext };

export type RecordingLogger = Logger & { records: LogRecord[] };

export function recording_logger(records: LogRecord[] = []): RecordingLogger {
  return {
    records,
    debug: (msg, ctx) => { records.push({ level: "debug", msg, ctx }); },
    info: (msg, ctx) => { records.push({ level: "info", msg, ctx }); },
    warn: (msg, ctx) => { records.push({ level: "warn", msg, ctx }); },
    error: (msg, ctx) => { records.push({ level: "error", msg, ctx }); },
    child: () => recording_logger(records),
  };
}

export function collect_say(): { say: SayFn; said: string[] } {
  const said: string[] = [];
  return {
    said,
    say: async (content) => { said.push(content); },
  };
}
