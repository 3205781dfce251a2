import fs from "node:fs";
import path from "node:path";
import { formatWithOptions } from "node:util";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLORS: Record<Exclude<LogLevel, "silent">, (text: string) => string> = {
  debug: pc.dim,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

export type LogOutput = Pick<Console, "debug" | "info" | "warn" | "error">;

export type LoggingOptions = {
  consoleLevel?: LogLevel;
  fileLevel?: LogLevel;
  /** When set, every record at `fileLevel` or above is appended to this file. */
  logFile?: string;
  output?: LogOutput;
  colors?: boolean;
};

type LoggingState = Required<Omit<LoggingOptions, "logFile">> & { logFile?: string };

const state: LoggingState = {
  consoleLevel: "info",
  fileLevel: "debug",
  output: console,
  colors: pc.isColorSupported,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function configureLogging(options: LoggingOptions): void {
  if (options.logFile) {
    fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
  }
  state.consoleLevel = options.consoleLevel ?? state.consoleLevel;
  state.fileLevel = options.fileLevel ?? state.fileLevel;
  state.output = options.output ?? state.output;
  state.colors = options.colors ?? state.colors;
  state.logFile = options.logFile ?? state.logFile;
}

/** Restores the defaults and detaches the log file. */
export function resetLogging(): void {
  state.consoleLevel = "info";
  state.fileLevel = "debug";
  state.output = console;
  state.colors = pc.isColorSupported;
  state.logFile = undefined;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

export function formatRecord(date: Date, level: Exclude<LogLevel, "silent">, scope: string, message: string): string {
  return `${formatTimestamp(date)} ${level.toUpperCase()} [${scope}]: ${message}`;
}

export class Logger {
  constructor(readonly scope: string) {}

  debug(message: string, ...details: unknown[]): void {
    this.write("debug", message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write("info", message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write("warn", message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write("error", message, details);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void {
    const rank = LEVEL_RANK[level];
    const toConsole = rank >= LEVEL_RANK[state.consoleLevel];
    const toFile = state.logFile !== undefined && rank >= LEVEL_RANK[state.fileLevel];
    if (!toConsole && !toFile) {
      return;
    }
    const text = details.length ? formatWithOptions({ colors: false }, message, ...details) : message;
    const line = formatRecord(new Date(), level, this.scope, text);
    if (toConsole) {
      const colorize = state.colors ? LEVEL_COLORS[level] : (s: string) => s;
      state.output[level](colorize(line));
    }
    if (toFile && state.logFile) {
      fs.appendFileSync(state.logFile, `${line}\n`, "utf-8");
    }
  }
}

export function getLogger(scope: string): Logger {
  return new Logger(scope);
}

/**
 * Name of a per-run log file, e.g. `2026-10-18_14-58-00_scene-chunk_studio-pc.log`.
 */
export function createLogFilePath(logDir: string, scriptName: string, host: string, now: Date = new Date()): string {
  const stamp = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}_`
    + `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return path.join(logDir, scriptName, `${stamp}_${scriptName}_${host}.log`);
}

/**
 * Delete the oldest log files in `logDir` until the folder holds at most
 * `maxBytes` of logs. Returns the deleted paths.
 */
export async function enforceMaxFolderSize(logDir: string, maxBytes: number): Promise<string[]> {
  const log = getLogger("logger");
  const entries = await fs.promises.readdir(logDir, { withFileTypes: true });
  const files = await Promise.all(
    entries
      .filter((entry) => entry.isFile() && /\.log/.test(entry.name))
      .map(async (entry) => {
        const filePath = path.join(logDir, entry.name);
        const stat = await fs.promises.stat(filePath);
        return { filePath, size: stat.size, mtimeMs: stat.mtimeMs };
      })
  );
  files.sort((a, b) => a.mtimeMs - b.mtimeMs);

  let total = files.reduce((sum, file) => sum + file.size, 0);
  const deleted: string[] = [];
  for (const file of files) {
    if (total <= maxBytes) {
      break;
    }
    try {
      await fs.promises.unlink(file.filePath);
      log.debug(`Deleted "${file.filePath}"`);
      deleted.push(file.filePath);
      total -= file.size;
    } catch (e) {
      log.error(`Failed to delete "${file.filePath}"`, e);
    }
  }
  return deleted;
}

export type RunLoggingOptions = {
  scriptName: string;
  host: string;
  consoleLevel: LogLevel;
  fileLevel: LogLevel;
  /** File logging is off unless a folder is given. */
  logDir?: string;
  maxFolderBytes?: number;
  now?: Date;
};

/**
 * Configure logging for one run. Returns the log file path when file logging
 * is enabled.
 */
export async function setupLogging(options: RunLoggingOptions): Promise<string | undefined> {
  const logFile = options.logDir
    ? createLogFilePath(options.logDir, options.scriptName, options.host, options.now)
    : undefined;
  configureLogging({
    consoleLevel: options.consoleLevel,
    fileLevel: options.fileLevel,
    logFile,
  });
  if (logFile && options.maxFolderBytes !== undefined) {
    await enforceMaxFolderSize(path.dirname(logFile), options.maxFolderBytes);
  }
  return logFile;
}
