import fs from "fs";
import path from "path";
import { logSettingsFromEnv, type LogSettings } from "./config.js";

type Level = "error" | "warn" | "info" | "debug" | "trace";

const LEVELS: Record<Level, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  error(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  trace(message: string, meta?: LogMeta): void;
}

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    const base: Record<string, unknown> = {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) base[key] = serialize(v);
    }
    return base;
  }
  if (!value || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(serialize);
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = serialize(v);
  }
  return out;
}

export function createLogger(settings: LogSettings): Logger {
  const configuredLevel: Level = isLevel(settings.level) ? settings.level : "info";
  const minLevel = LEVELS[configuredLevel];
  const consoleEnabled = settings.console;
  const logFile = settings.file;

  let stream: fs.WriteStream | null = null;

  function ensureStream() {
    if (!logFile) return null;
    if (stream) return stream;
    try {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
      fs.appendFileSync(
        logFile,
        `# git-file-bridge log (level=${configuredLevel}) started ${new Date().toISOString()}\n`
      );
      stream = fs.createWriteStream(logFile, { flags: "a" });
      stream.on("error", (err) => {
        console.error("[logger] write stream error", err);
        stream?.end();
        stream = null;
      });
    } catch (e) {
      console.error("[logger] failed to create log file stream", e);
      stream = null;
    }
    return stream;
  }

  function write(level: Level, message: string, meta?: LogMeta) {
    if (LEVELS[level] > minLevel) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      msg: message
    };
    if (meta !== undefined) entry.meta = serialize(meta);

    if (consoleEnabled) {
      const consoleMethod = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
      if (entry.meta !== undefined) {
        consoleMethod(`[${level}] ${message}`, entry.meta);
      } else {
        consoleMethod(`[${level}] ${message}`);
      }
    }
    const s = ensureStream();
    if (s) {
      s.write(JSON.stringify(entry) + "\n");
    }
  }

  return {
    error(message, meta) { write("error", message, meta); },
    warn(message, meta) { write("warn", message, meta); },
    info(message, meta) { write("info", message, meta); },
    debug(message, meta) { write("debug", message, meta); },
    trace(message, meta) { write("trace", message, meta); }
  };
}

export const logger: Logger = createLogger(logSettingsFromEnv());
