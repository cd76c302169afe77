import { mkdirSync, createWriteStream, type WriteStream } from "node:fs";
import { resolve } from "node:path";
import type { LogEntry, LogScope } from "./types.js";

type LogLevel = LogEntry["level"];

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function parseLevel(raw: string | undefined): LogLevel | null {
  const level = raw?.toLowerCase().trim();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return level;
  }
  return null;
}

let stdoutLevel: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? "info";

/** Threshold for stdout. The log file always receives every level. */
export function setLogLevel(level: LogLevel): void {
  stdoutLevel = level;
}

export function getLogLevel(): LogLevel {
  return stdoutLevel;
}

// ---------------------------------------------------------------------------
// LogWriter: tees NDJSON lines to a file in logs/
// ---------------------------------------------------------------------------

class LogWriter {
  private stream: WriteStream | null = null;
  private filePath: string | null = null;

  /**
   * Enable file logging. Creates `<projectRoot>/logs/run-<ISO>.ndjson`.
   * Calling it again returns the already open file.
   */
  enable(projectRoot: string): string {
    if (this.stream && this.filePath) return this.filePath;

    const logsDir = resolve(projectRoot, "logs");
    mkdirSync(logsDir, { recursive: true });

    const ts = new Date()
      .toISOString()
      .replace(/:/g, "-")
      .replace(/\.\d+Z$/, "");
    const filePath = resolve(logsDir, `run-${ts}.ndjson`);
    this.filePath = filePath;
    this.stream = createWriteStream(filePath, { flags: "a" });

    return filePath;
  }

  write(line: string): void {
    if (this.stream) {
      this.stream.write(line + "\n");
    }
  }

  close(): void {
    if (this.stream) {
      this.stream.end();
      this.stream = null;
      this.filePath = null;
    }
  }
}

const logWriter = new LogWriter();

/**
 * Enable file logging for all Logger instances.
 * Returns the absolute path to the log file.
 */
export function enableFileLogging(projectRoot: string): string {
  return logWriter.enable(projectRoot);
}

/** Close the log file. */
export function closeFileLogging(): void {
  logWriter.close();
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export class Logger {
  constructor(
    private component: string,
    private scope: LogScope,
    private scenario?: string
  ) {}

  withScenario(scenario: string): Logger {
    return new Logger(this.component, this.scope, scenario);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      component: this.component,
      scope: this.scope,
      scenario: this.scenario,
      message,
      data,
    };
    const line = JSON.stringify(entry);
    if (LEVEL_ORDER[level] >= LEVEL_ORDER[stdoutLevel]) {
      process.stdout.write(line + "\n");
    }
    logWriter.write(line);
  }
}

export function createLogger(component: string, scope: LogScope, scenario?: string): Logger {
  return new Logger(component, scope, scenario);
}

export { parseLevel as parseLogLevel };
