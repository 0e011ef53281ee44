/**
 * Structured step logging for a single check.
 *
 * Everything goes to stderr so stdout only ever carries the report.
 */

import { formatDuration } from "./core/utils";

type Level = "INFO" | "WARN" | "ERROR" | "SUCCESS";

export interface LoggerOptions {
  silent?: boolean;
  colors?: boolean;
  stream?: NodeJS.WritableStream;
}

const ANSI = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

type Color = keyof typeof ANSI;

export class Logger {
  readonly runId: string;
  private readonly silent: boolean;
  private readonly colors: boolean;
  private readonly stream: NodeJS.WritableStream;

  constructor(options: LoggerOptions = {}) {
    this.runId = Logger.generateRunId();
    this.silent = options.silent ?? false;
    this.stream = options.stream ?? process.stderr;
    this.colors = options.colors ?? Boolean(process.stderr.isTTY);
  }

  /**
   * Generate unique run ID for tracking
   * Format: RUN-{8 random hex chars}
   */
  static generateRunId(): string {
    return `RUN-${Math.random().toString(16).slice(2, 10).padEnd(8, "0")}`;
  }

  info(step: string, data?: Record<string, unknown>, startTime?: number): void {
    this.write(this.formatHeader(step, "INFO"));
    this.writeData(data);
    this.writeDuration(startTime);
  }

  success(step: string, data?: Record<string, unknown>, startTime?: number): void {
    this.write(this.formatHeader(step, "SUCCESS"));
    this.writeData(data);
    this.writeDuration(startTime);
  }

  warn(step: string, message: string, data?: Record<string, unknown>): void {
    this.write(this.formatHeader(step, "WARN"));
    this.write(`  ${this.paint("yellow", message)}`);
    this.writeData(data);
  }

  /**
   * Log an error with its kind or first stack lines and optional context
   */
  error(step: string, error: Error | string, context?: Record<string, unknown>): void {
    this.write(this.formatHeader(step, "ERROR"));
    const message = error instanceof Error ? error.message : error;
    this.write(`  ${this.paint("red", message)}`);

    if (error instanceof Error && error.stack && error.name !== "CheckError") {
      for (const line of error.stack.split("\n").slice(1, 4)) {
        this.write(`  ${this.paint("dim", line.trim())}`);
      }
    }

    this.writeData(context);
  }

  private write(line: string): void {
    if (this.silent) return;
    this.stream.write(line + "\n");
  }

  private paint(color: Color, text: string): string {
    return this.colors ? `${ANSI[color]}${text}${ANSI.reset}` : text;
  }

  private formatHeader(step: string, level: Level): string {
    const timestamp = new Date().toISOString().replace("T", " ").slice(0, 19);
    const color: Color =
      level === "ERROR"
        ? "red"
        : level === "WARN"
          ? "yellow"
          : level === "SUCCESS"
            ? "green"
            : "cyan";

    return `${this.paint("dim", `[${timestamp}]`)} ${this.paint(color, `[${this.runId}]`)} ${this.paint("bright", step)}`;
  }

  private writeData(data?: Record<string, unknown>): void {
    if (!data) return;
    for (const [key, value] of Object.entries(data)) {
      if (value === undefined) continue;
      this.write(`  ${this.paint("dim", `${key}:`)} ${this.formatValue(value)}`);
    }
  }

  private writeDuration(startTime?: number): void {
    if (startTime === undefined) return;
    this.write(`  ${this.paint("dim", "duration:")} ${this.paint("green", formatDuration(Date.now() - startTime))}`);
  }

  private formatValue(value: unknown): string {
    if (typeof value === "string") {
      return value.length > 100 ? `${value.slice(0, 100)}...` : value;
    }
    if (typeof value === "boolean") {
      return this.paint(value ? "green" : "red", String(value));
    }
    if (Array.isArray(value)) {
      return `[${value.join(", ")}]`;
    }
    if (typeof value === "object" && value !== null) {
      return JSON.stringify(value);
    }
    return String(value);
  }
}
