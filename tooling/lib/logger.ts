/**
 * Structured logging for the synthesis pipeline
 * Each pipeline run owns one Logger; entries are kept in memory for the report
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  phase?: string;
  component?: string;
  unit?: string;
  reference?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private context: LogContext = {};
  private timers: Map<string, number> = new Map();
  private shouldLog: boolean;

  constructor(level: LogLevel = "info", shouldLog: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Merge context into every subsequent entry
   */
  pushContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  popContext(keys: (keyof LogContext)[]): void {
    for (const key of keys) {
      delete this.context[key];
    }
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Run `work` with `context` pushed, restoring the previous values afterwards
   */
  withContext<T>(context: LogContext, work: () => T): T {
    const previous = { ...this.context };
    this.pushContext(context);
    try {
      return work();
    } finally {
      this.context = previous;
    }
  }

  startTimer(name: string): void {
    this.timers.set(name, Date.now());
  }

  /**
   * End a timer and log its duration; unknown timers log a warning and return 0
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timers.get(name);
    if (start === undefined) {
      this.warn(`Timer "${name}" not found`);
      return 0;
    }

    const duration = Date.now() - start;
    this.timers.delete(name);
    this.log(level, message, { duration });
    return duration;
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
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };

    this.entries.push(entry);

    if (this.shouldLog) {
      this.consoleLog(level, this.formatLog(entry));
    }
  }

  private buildPrefix(context?: LogContext): string {
    if (!context) return "";

    const parts: string[] = [];
    if (context.phase) parts.push(`[${context.phase}]`);
    if (context.component) parts.push(`<${context.component}>`);
    if (context.unit) parts.push(context.unit);
    if (context.reference) parts.push(context.reference);

    return parts.length > 0 ? parts.join(" ") + ": " : "";
  }

  private formatLog(entry: LogEntry): string {
    let result = this.buildPrefix(entry.context) + entry.message;
    if (entry.data) {
      result += "\n  " + this.formatData(entry.data);
    }
    return result;
  }

  private formatData(data: Record<string, unknown>): string {
    const parts: string[] = [];

    for (const [key, value] of Object.entries(data)) {
      if (key === "duration" && typeof value === "number") {
        parts.push(`${key}: ${value}ms`);
      } else if (Array.isArray(value)) {
        parts.push(`${key}: [${value.length} items]`);
      } else if (typeof value === "object" && value !== null) {
        parts.push(`${key}: ${JSON.stringify(value)}`);
      } else {
        parts.push(`${key}: ${String(value)}`);
      }
    }

    return parts.join(", ");
  }

  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.log(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
        console.error(message);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForPhase(phase: string): LogEntry[] {
    return this.entries.filter((entry) => entry.context?.phase === phase);
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LOG_LEVELS.indexOf(level);
    return this.entries.filter((entry) => LOG_LEVELS.indexOf(entry.level) >= index);
  }

  toJSON(): LogEntry[] {
    return this.getEntries();
  }

  clear(): void {
    this.entries = [];
  }

  getSummary(): {
    totalEntries: number;
    debugCount: number;
    infoCount: number;
    warnCount: number;
    errorCount: number;
  } {
    return {
      totalEntries: this.entries.length,
      debugCount: this.entries.filter((e) => e.level === "debug").length,
      infoCount: this.entries.filter((e) => e.level === "info").length,
      warnCount: this.entries.filter((e) => e.level === "warn").length,
      errorCount: this.entries.filter((e) => e.level === "error").length,
    };
  }
}
