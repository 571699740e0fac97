/**
 * Logger Utility
 * Handles console output with different log levels, optionally mirrored to a run log file
 */

import { createWriteStream } from "node:fs";
import { once } from "node:events";
import { mkdir } from "fs/promises";
import { join } from "path";
import type { Writable } from "node:stream";
import type { LogLevel } from "../types";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private sink?: Writable,
  ) {
    // A failing file sink is dropped; console output carries on
    sink?.on("error", (error: Error) => {
      this.sink = undefined;
      console.warn(`[WARN] Log file disabled: ${error.message}`);
    });
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(`[DEBUG] ${message}`);
    }
    this.record("debug", message);
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`[INFO] ${message}`);
    }
    this.record("info", message);
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`[WARN] ${message}`);
    }
    this.record("warn", message);
  }

  error(message: string, error?: Error): void {
    console.error(`[ERROR] ${message}`);
    if (error) {
      console.error(error);
    }
    this.record("error", error ? `${message}: ${error.message}` : message);
  }

  /**
   * Flush and close the file sink
   */
  async close(): Promise<void> {
    const sink = this.sink;
    if (!sink) return;
    this.sink = undefined;
    await new Promise<void>((resolve) => sink.end(resolve));
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  // The file keeps every level, the console only what the level allows
  private record(level: LogLevel, message: string): void {
    this.sink?.write(
      `${new Date().toISOString()} [${level.toUpperCase()}] ${message}\n`,
    );
  }
}

/**
 * Timestamped log filename, e.g. 2024-05-01--13-45-09.log
 */
export function logFilename(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}--${time}.log`;
}

/**
 * Create a logger, with a file sink in the given directory when one is set
 *
 * Rejects when the log file cannot be opened.
 */
export async function createLogger(
  level: LogLevel,
  directory: string | null,
): Promise<Logger> {
  if (!directory) {
    return new Logger(level);
  }

  await mkdir(directory, { recursive: true });
  const stream = createWriteStream(join(directory, logFilename()), {
    flags: "a",
  });
  await once(stream, "open");
  return new Logger(level, stream);
}
