/**
 * Unified Log Reporter
 *
 * Provides a consistent logging interface for the planning cycle, the
 * distributor and the discussion monitor. Supports multiple output
 * destinations.
 *
 * @module rolling-planning-core/core
 */

import { appendFileSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

// ============================================================================
// LOG ENTRY TYPES
// ============================================================================

/**
 * Log level for entries
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/**
 * Log entry type identifying the subsystem that produced the event
 */
export type LogEntryType =
  | "cycle"          // Cycle lifecycle (start, end, force completion)
  | "phase"          // Phase transition inside a cycle
  | "distribution"   // Distance matrix and assignment
  | "dispatch"       // Task hand-off to platforms
  | "discussion"     // Session polling and reaping
  | "geometry"       // Numeric primitives
  | "report"         // Report sink
  | "config"         // Configuration
  | "error"          // General error
  | "custom";        // Custom event

/**
 * A single log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  /** Log level */
  level: LogLevel;
  /** Entry type */
  type: LogEntryType;
  /** Human readable message */
  message: string;
  /** Cycle number (if the entry belongs to a cycle) */
  cycleNumber?: number;
  /** Phase name (for phase entries) */
  phase?: string;
  /** Error information (if applicable) */
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

// ============================================================================
// LOG REPORTER INTERFACE
// ============================================================================

/**
 * Log Reporter Interface
 *
 * Implement this interface to create custom log destinations.
 */
export interface LogReporter {
  /** Log an entry */
  log(entry: LogEntry): void;

  debug(type: LogEntryType, message: string, metadata?: Record<string, unknown>): void;

  info(type: LogEntryType, message: string, metadata?: Record<string, unknown>): void;

  warn(type: LogEntryType, message: string, metadata?: Record<string, unknown>): void;

  /** Log an error; the error's code is kept when it carries one */
  error(
    type: LogEntryType,
    error: unknown,
    metadata?: Record<string, unknown>
  ): void;

  /** Log a phase transition of a cycle */
  phase(cycleNumber: number, phase: string, message?: string): void;

  /**
   * Flush any buffered entries (for file-based reporters)
   */
  flush?(): void | Promise<void>;

  /**
   * Close the reporter (cleanup resources)
   */
  close?(): void | Promise<void>;
}

function describeError(error: unknown): NonNullable<LogEntry["error"]> {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return { code, message: error.message, stack: error.stack };
  }
  return { message: typeof error === "string" ? error : String(error) };
}

/**
 * Shared convenience methods; subclasses only decide where entries go.
 */
export abstract class BaseLogReporter implements LogReporter {
  abstract log(entry: LogEntry): void;

  debug(type: LogEntryType, message: string, metadata?: Record<string, unknown>): void {
    this.log({ timestamp: new Date().toISOString(), level: "debug", type, message, metadata });
  }

  info(type: LogEntryType, message: string, metadata?: Record<string, unknown>): void {
    this.log({ timestamp: new Date().toISOString(), level: "info", type, message, metadata });
  }

  warn(type: LogEntryType, message: string, metadata?: Record<string, unknown>): void {
    this.log({ timestamp: new Date().toISOString(), level: "warn", type, message, metadata });
  }

  error(type: LogEntryType, error: unknown, metadata?: Record<string, unknown>): void {
    const described = describeError(error);
    this.log({
      timestamp: new Date().toISOString(),
      level: "error",
      type,
      message: described.message,
      error: described,
      metadata,
    });
  }

  phase(cycleNumber: number, phase: string, message?: string): void {
    this.log({
      timestamp: new Date().toISOString(),
      level: "info",
      type: "phase",
      message: message ?? `Cycle ${cycleNumber} entering ${phase}`,
      cycleNumber,
      phase,
    });
  }
}

// ============================================================================
// CONSOLE LOG REPORTER
// ============================================================================

/**
 * Console Log Reporter Options
 */
export interface ConsoleLogReporterOptions {
  /** Minimum log level to output */
  minLevel?: LogLevel;
  /** Show timestamps */
  showTimestamps?: boolean;
  /** Use colors (ANSI escape codes) */
  useColors?: boolean;
  /** Print metadata as indented JSON under the line */
  showMetadata?: boolean;
  /** Custom prefix for all log lines */
  prefix?: string;
  /** Line sink, console.log by default */
  write?: (line: string) => void;
}

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based log reporter
 */
export class ConsoleLogReporter extends BaseLogReporter {
  private options: Required<ConsoleLogReporterOptions>;

  constructor(options: ConsoleLogReporterOptions = {}) {
    super();
    this.options = {
      minLevel: options.minLevel ?? "info",
      showTimestamps: options.showTimestamps ?? true,
      useColors: options.useColors ?? true,
      showMetadata: options.showMetadata ?? false,
      prefix: options.prefix ?? "[Planner]",
      write: options.write ?? ((line: string) => console.log(line)),
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.options.minLevel];
  }

  private formatTimestamp(timestamp: string): string {
    if (!this.options.showTimestamps) return "";
    const time = timestamp.split("T")[1]?.split(".")[0] || timestamp;
    return `[${time}] `;
  }

  private colorize(text: string, color: string): string {
    if (!this.options.useColors) return text;
    const colors: Record<string, string> = {
      reset: "\x1b[0m",
      red: "\x1b[31m",
      green: "\x1b[32m",
      yellow: "\x1b[33m",
      blue: "\x1b[34m",
      magenta: "\x1b[35m",
      cyan: "\x1b[36m",
      gray: "\x1b[90m",
    };
    return `${colors[color] || ""}${text}${colors.reset}`;
  }

  private getLevelIcon(level: LogLevel): string {
    const icons: Record<LogLevel, string> = {
      trace: "·",
      debug: "-",
      info: "→",
      warn: "!",
      error: "✗",
    };
    return icons[level];
  }

  private getLevelColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      trace: "gray",
      debug: "gray",
      info: "blue",
      warn: "yellow",
      error: "red",
    };
    return colors[level];
  }

  log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    const { prefix, write } = this.options;
    const icon = this.colorize(this.getLevelIcon(entry.level), this.getLevelColor(entry.level));
    let line = `${prefix} ${this.formatTimestamp(entry.timestamp)}${icon} [${entry.type}]`;

    if (entry.cycleNumber !== undefined) {
      line += ` ${this.colorize(`#${entry.cycleNumber}`, "magenta")}`;
    }

    if (entry.level === "error" && entry.error) {
      const code = entry.error.code ? `${entry.error.code}: ` : "";
      line += ` ${this.colorize("ERROR:", "red")} ${code}${entry.error.message}`;
    } else {
      line += ` ${entry.message}`;
    }

    write(line);

    if (this.options.showMetadata && entry.metadata) {
      for (const metaLine of JSON.stringify(entry.metadata, null, 2).split("\n")) {
        write(`${prefix}    ${metaLine}`);
      }
    }
  }
}

// ============================================================================
// FILE LOG REPORTER
// ============================================================================

/**
 * File Log Reporter Options
 */
export interface FileLogReporterOptions {
  /** Log file path */
  filePath: string;
  /** Flush after each write */
  autoFlush?: boolean;
}

/**
 * File-based log reporter (JSONL format)
 */
export class FileLogReporter extends BaseLogReporter {
  private filePath: string;
  private buffer: LogEntry[] = [];
  private autoFlush: boolean;
  private initialized = false;

  constructor(options: FileLogReporterOptions) {
    super();
    this.filePath = options.filePath;
    this.autoFlush = options.autoFlush ?? true;
  }

  private ensureInitialized(): void {
    if (this.initialized) return;

    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(
      this.filePath,
      JSON.stringify({
        type: "header",
        version: "1.0",
        startTime: new Date().toISOString(),
      }) + "\n"
    );

    this.initialized = true;
  }

  log(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.autoFlush) {
      this.flush();
    }
  }

  flush(): void {
    if (this.buffer.length === 0) return;

    this.ensureInitialized();

    const lines = this.buffer.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
    appendFileSync(this.filePath, lines);
    this.buffer = [];
  }

  close(): void {
    this.flush();
    this.ensureInitialized();

    appendFileSync(
      this.filePath,
      JSON.stringify({
        type: "footer",
        endTime: new Date().toISOString(),
      }) + "\n"
    );
  }
}

// ============================================================================
// MEMORY LOG REPORTER
// ============================================================================

/**
 * Keeps entries in memory; used by the demo summary and by tests
 */
export class MemoryLogReporter extends BaseLogReporter {
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// MULTI LOG REPORTER
// ============================================================================

/**
 * Multi-destination log reporter
 *
 * Forwards log entries to multiple reporters.
 */
export class MultiLogReporter extends BaseLogReporter {
  private reporters: LogReporter[];

  constructor(reporters: LogReporter[] = []) {
    super();
    this.reporters = reporters;
  }

  addReporter(reporter: LogReporter): void {
    this.reporters.push(reporter);
  }

  removeReporter(reporter: LogReporter): void {
    const index = this.reporters.indexOf(reporter);
    if (index >= 0) {
      this.reporters.splice(index, 1);
    }
  }

  log(entry: LogEntry): void {
    for (const reporter of this.reporters) {
      reporter.log(entry);
    }
  }

  async flush(): Promise<void> {
    await Promise.all(this.reporters.map((r) => r.flush?.()));
  }

  async close(): Promise<void> {
    await Promise.all(this.reporters.map((r) => r.close?.()));
  }
}

// ============================================================================
// NULL LOG REPORTER
// ============================================================================

/**
 * Null log reporter (no-op)
 *
 * Use when logging is disabled.
 */
export class NullLogReporter extends BaseLogReporter {
  log(_entry: LogEntry): void {}
}

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Create a log reporter based on options
 */
export function createLogReporter(options?: {
  console?: boolean | ConsoleLogReporterOptions;
  file?: string | FileLogReporterOptions;
  reporters?: LogReporter[];
}): LogReporter {
  if (!options) {
    return new NullLogReporter();
  }

  const reporters: LogReporter[] = [];

  if (options.console) {
    const consoleOptions = typeof options.console === "boolean" ? {} : options.console;
    reporters.push(new ConsoleLogReporter(consoleOptions));
  }

  if (options.file) {
    const fileOptions = typeof options.file === "string"
      ? { filePath: options.file }
      : options.file;
    reporters.push(new FileLogReporter(fileOptions));
  }

  if (options.reporters) {
    reporters.push(...options.reporters);
  }

  if (reporters.length === 0) {
    return new NullLogReporter();
  }

  if (reporters.length === 1) {
    return reporters[0];
  }

  return new MultiLogReporter(reporters);
}
