import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SECRET_PATTERNS: RegExp[] = [
  /sk-ant-[A-Za-z0-9_-]+/g,
  /sk-[A-Za-z0-9_-]{20,}/g,
  /AIza[A-Za-z0-9_-]{20,}/g,
  /(?:x-api-key|authorization)\s*[:=]\s*[A-Za-z0-9._-]{8,}/gi,
  /Bearer\s+[A-Za-z0-9._-]{16,}/g,
];

let currentLevel: LogLevel = "info";
let logFilePath: string | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Route log lines to a file instead of stderr. The interactive terminal owns
 * the screen, so the session switches this on before entering raw mode.
 */
export function setLogFile(filePath: string | null): void {
  if (filePath) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }
  logFilePath = filePath;
}

export function redactSecrets(input: string): string {
  let out = input;
  for (const pattern of SECRET_PATTERNS) {
    out = out.replace(pattern, (match) =>
      match.length <= 4 ? "[REDACTED]" : `[REDACTED:${match.slice(0, 4)}...]`,
    );
  }
  return out;
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return redactSecrets(arg);
  if (arg instanceof Error) return redactSecrets(`${arg.name}: ${arg.message}`);
  try {
    return redactSecrets(JSON.stringify(arg));
  } catch {
    return String(arg);
  }
}

function writeLine(line: string): void {
  if (logFilePath) {
    try {
      fs.appendFileSync(logFilePath, `${line}\n`);
      return;
    } catch (error) {
      process.stderr.write(
        `[logger] cannot write ${logFilePath}: ${error instanceof Error ? error.message : String(error)}\n`,
      );
    }
  }
  process.stderr.write(`${line}\n`);
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function formatLogLine(
  level: LogLevel,
  moduleName: string,
  message: string,
  args: unknown[],
  now: Date = new Date(),
): string {
  const rendered = [redactSecrets(message), ...args.map(formatArg)].join(" ");
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${moduleName}] ${rendered}`;
}

export function createLogger(moduleName: string): Logger {
  const log = (level: LogLevel, message: string, args: unknown[]): void => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;
    writeLine(formatLogLine(level, moduleName, message, args));
  };

  return {
    debug: (message, ...args) => log("debug", message, args),
    info: (message, ...args) => log("info", message, args),
    warn: (message, ...args) => log("warn", message, args),
    error: (message, ...args) => log("error", message, args),
  };
}
