import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export type Logger = pino.Logger;

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isLogFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

function stderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      process.stderr.write(chunk, cb);
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const o = JSON.parse(line) as { msg?: unknown };
          if (typeof o.msg === "string") {
            process.stderr.write(o.msg + "\n");
          }
        } catch {
          process.stderr.write(line + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): void {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: "mpvctl" }, plainMessageStderr());
  } else if (format === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: stderr() });
    rootLogger = pino({ level: logLevel, name: "mpvctl" }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: "mpvctl" }, stderr());
  }
}

function ensureLogger(): pino.Logger {
  if (!rootLogger) {
    // Library use: stay quiet unless the host application configures logging.
    rootLogger = pino({ level: "warn", name: "mpvctl" }, plainMessageStderr());
  }
  return rootLogger;
}

export function getLogger(): pino.Logger {
  return ensureLogger();
}

/** Child logger bound to a component, e.g. one IPC connection. */
export function childLogger(bindings: Record<string, unknown>): pino.Logger {
  return ensureLogger().child(bindings);
}

export const log = {
  info: (...args: Parameters<pino.Logger["info"]>) => ensureLogger().info(...args),
  warn: (...args: Parameters<pino.Logger["warn"]>) => ensureLogger().warn(...args),
  error: (...args: Parameters<pino.Logger["error"]>) => ensureLogger().error(...args),
  debug: (...args: Parameters<pino.Logger["debug"]>) => ensureLogger().debug(...args),
  trace: (...args: Parameters<pino.Logger["trace"]>) => ensureLogger().trace(...args),
};
