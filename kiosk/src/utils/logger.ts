import fs from "node:fs";
import path from "node:path";
import { config, type LogLevel } from "../config";
import { toErrorMessage } from "./errors";

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LoggerSettings {
  level: LogLevel;
  console: boolean;
  file: fs.WriteStream | null;
  filePath: string | null;
}

const settings: LoggerSettings = {
  level: config.logLevel,
  console: true,
  file: null,
  filePath: null,
};

export interface LoggerOptions {
  level?: LogLevel;
  console?: boolean;
  filePath?: string;
}

// A log file that cannot be written falls back to console-only logging.
const openLogFile = (filePath: string): fs.WriteStream | null => {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  } catch (error) {
    console.error(`Log file disabled (${filePath}): ${toErrorMessage(error)}`);
    return null;
  }
  const stream = fs.createWriteStream(filePath, { flags: "a", encoding: "utf-8" });
  stream.on("error", (error) => {
    if (settings.file !== stream) return;
    console.error(`Log file disabled (${filePath}): ${error.message}`);
    settings.file = null;
    settings.filePath = null;
    stream.destroy();
  });
  return stream;
};

export const configureLogger = (options: LoggerOptions) => {
  if (options.level) settings.level = options.level;
  if (options.console !== undefined) settings.console = options.console;
  if (options.filePath) {
    settings.file?.end();
    settings.file = openLogFile(options.filePath);
    settings.filePath = settings.file ? options.filePath : null;
  }
};

export const loggerStatus = () => ({
  level: settings.level,
  console: settings.console,
  filePath: settings.filePath,
});

export const closeLogger = () => {
  settings.file?.end();
  settings.file = null;
  settings.filePath = null;
};

const formatMessage = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
  const timestamp = new Date().toISOString();
  const base = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
};

const shouldLog = (level: LogLevel): boolean => levelPriority[level] >= levelPriority[settings.level];

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, message, meta);
  settings.file?.write(`${line}\n`);
  if (!settings.console) return;
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "debug") {
    console.debug(line);
    return;
  }
  console.log(line);
};

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log("debug", message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log("info", message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log("warn", message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log("error", message, meta),
};

export type Logger = typeof logger;
