import fs from "node:fs";
import path from "node:path";
import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LoggerOptions {
  minLevel?: LogLevel | "silent";
  /** Plain-text run log appended next to the JSON console output. */
  filePath?: string;
}

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function formatFieldValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? "undefined";
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly options: LoggerOptions;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.options = options;
    if (options.filePath) {
      fs.mkdirSync(path.dirname(path.resolve(options.filePath)), { recursive: true });
    }
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, this.options);
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.minLevel ?? "debug"]) {
      return;
    }

    const ts = new Date().toISOString();
    const payload = {
      ts,
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    if (level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }

    if (this.options.filePath) {
      const details = Object.entries(fields ?? {})
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${formatFieldValue(value)}`)
        .join(" ");
      const text = `${ts} [${level.toUpperCase()}] ${this.context.component} ${msg}${details ? ` ${details}` : ""}\n`;
      fs.appendFileSync(this.options.filePath, text, "utf-8");
    }
  }
}
