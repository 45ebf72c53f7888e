import { existsSync, mkdirSync, appendFileSync } from "fs";
import { dirname, isAbsolute, join } from "path";
import { fileURLToPath } from "url";

const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");

type LogLevel = "info" | "warn" | "error" | "debug";

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LOG_COLORS: Record<LogLevel, string> = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
};

const RESET = "\x1b[0m";

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_RANK;
}

function resolveMinLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

// LOG_FILE="" turns file output off; relative paths are resolved from the project root.
function resolveLogFile(): string | null {
  const raw = process.env.LOG_FILE ?? "logs/app.log";
  if (!raw) return null;
  return isAbsolute(raw) ? raw : join(PROJECT_ROOT, raw);
}

const minLevel = resolveMinLevel();
let logFile = resolveLogFile();

function getTimestamp(): string {
  return new Date().toLocaleString("en-CA", {
    timeZone: process.env.TZ ?? "UTC",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  return typeof arg === "object" ? JSON.stringify(arg) : String(arg);
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = getTimestamp();
  const extraArgs =
    args.length > 0 ? " " + args.map(formatArg).join(" ") : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${extraArgs}`;
}

function writeToFile(entry: string): void {
  if (!logFile) return;

  try {
    const dir = dirname(logFile);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    appendFileSync(logFile, entry + "\n", "utf-8");
  } catch (error) {
    console.error(
      `Log file ${logFile} is not writable, continuing on console only: ${error}`,
    );
    logFile = null;
  }
}

function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (LOG_LEVEL_RANK[level] < LOG_LEVEL_RANK[minLevel]) return;

  const entry = formatLogEntry(level, message, ...args);
  const color = LOG_COLORS[level];

  if (level === "error") {
    console.error(`${color}${entry}${RESET}`);
  } else if (level === "warn") {
    console.warn(`${color}${entry}${RESET}`);
  } else {
    console.log(`${color}${entry}${RESET}`);
  }

  writeToFile(entry);
}

export const logger = {
  info: (message: string, ...args: unknown[]) => log("info", message, ...args),
  warn: (message: string, ...args: unknown[]) => log("warn", message, ...args),
  error: (message: string, ...args: unknown[]) =>
    log("error", message, ...args),
  debug: (message: string, ...args: unknown[]) =>
    log("debug", message, ...args),
};
