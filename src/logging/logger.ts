import { appendFileSync, mkdirSync } from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level?: LogLevel;
  /** Append every printed line to this file as well. */
  filePath?: string;
  /** Set to false to keep lines off the console (tests, piped output). */
  console?: boolean;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private readonly level: LogLevel;
  private readonly filePath: string | null;
  private readonly toConsole: boolean;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? "info";
    this.filePath = opts.filePath ?? null;
    this.toConsole = opts.console ?? true;
    if (this.filePath) {
      mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.log("error", message, error.stack ?? error.message);
      return;
    }
    this.log("error", message, error);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (levelRank[level] < levelRank[this.level]) return;

    const timestamp = new Date().toISOString();
    const suffix = data === undefined ? "" : ` ${typeof data === "string" ? data : safeJson(data)}`;
    const line = `${timestamp} ${level.toUpperCase()} ${message}${suffix}`;

    if (this.toConsole) {
      if (level === "error" || level === "warn") {
        console.error(line);
      } else {
        console.log(line);
      }
    }
    if (this.filePath) {
      appendFileSync(this.filePath, `${line}\n`, "utf8");
    }
  }
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return '"[unserializable]"';
  }
}
