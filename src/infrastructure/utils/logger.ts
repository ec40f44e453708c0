/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";

/**
 * Logging utility for the AI core.
 *
 * Features:
 * - Console output with colored levels
 * - Memory ring buffer with query support
 * - Optional JSON Lines file sink
 * - Category-based logging for subsystem identification
 * - Correlation IDs for tracking related events
 * - Aggregated metrics per category/level
 * - Throttling to prevent log spam
 */

import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Log entry with category and correlation support.
 */
export interface LogEntry {
  /** Unique identifier for this log entry */
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Unix timestamp for sorting/filtering */
  timestampMs: number;
  /** Optional correlation ID to link related events */
  correlationId?: string;
  /** Actor the log relates to, if any */
  agentId?: string;
  /** Turn counter when the log was created */
  tick?: number;
  data?: unknown;
}

export interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  byCategoryAndLevel: Record<LogCategory, Record<LogLevel, number>>;
  startTime: number;
  endTime: number;
  totalCount: number;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  correlationId?: string;
  agentId?: string;
  /** Start time (unix ms) */
  startTime?: number;
  /** End time (unix ms) */
  endTime?: number;
  /** Case-insensitive text search in message */
  messageContains?: string;
  /** Keep only the most recent N matches */
  limit?: number;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  console: boolean;
  maxMemoryLogs: number;
  throttleWindowMs: number;
  maxThrottleCount: number;
  /** Append entries to `<logDir>/ai-<date>.jsonl` on flush */
  toFile: boolean;
  logDir: string;
  writeIntervalMs: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return Object.values(LogLevel).find((level) => level === value);
}

function isLogCategory(value: unknown): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO,
  console: process.env.LOG_CONSOLE !== "false",
  maxMemoryLogs: Number(process.env.LOG_MAX_MEMORY ?? 5000),
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 3),
  toFile: process.env.LOG_TO_FILE === "true",
  logDir: process.env.LOG_DIR
    ? path.resolve(process.env.LOG_DIR)
    : path.join(process.cwd(), "logs"),
  writeIntervalMs: Number(process.env.LOG_WRITE_INTERVAL_MS ?? 5000),
};

function zeroByLevel(): Record<LogLevel, number> {
  return {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 0,
    [LogLevel.WARN]: 0,
    [LogLevel.ERROR]: 0,
  };
}

function byCategory<T>(make: () => T): Record<LogCategory, T> {
  return {
    [LogCategory.AI]: make(),
    [LogCategory.NAVIGATION]: make(),
    [LogCategory.PERCEPTION]: make(),
    [LogCategory.CONFIG]: make(),
    [LogCategory.GENERAL]: make(),
  };
}

function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

/**
 * Logger with a memory ring buffer, optional file sink and analysis support.
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrites: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private lastThrottlePrune = Date.now();
  private writeInterval?: NodeJS.Timeout;
  private writePromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private currentTick = 0;
  private sequence = 0;
  private activeCorrelationId?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();

    if (this.config.toFile) {
      this.writeInterval = setInterval(() => {
        this.scheduleWrite();
      }, this.config.writeIntervalMs);
      this.writeInterval.unref();
    }
  }

  private initMetrics(): LogMetrics {
    const now = Date.now();
    return {
      byLevel: zeroByLevel(),
      byCategory: byCategory(() => 0),
      byCategoryAndLevel: byCategory(zeroByLevel),
      startTime: now,
      endTime: now,
      totalCount: 0,
    };
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    this.pruneThrottleMap(now);
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  /**
   * Drops throttle entries idle for two windows. Runs at most once a window.
   */
  private pruneThrottleMap(now: number): void {
    if (now - this.lastThrottlePrune <= this.config.throttleWindowMs) return;
    this.lastThrottlePrune = now;

    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs * 2) {
        this.throttleMap.delete(key);
      }
    }
  }

  private updateMetrics(entry: LogEntry): void {
    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.byCategoryAndLevel[entry.category][entry.level]++;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.splice(
        0,
        this.memoryBuffer.length - this.config.maxMemoryLogs,
      );
    }
    if (this.config.toFile) {
      this.pendingWrites.push(entry);
    }
    this.updateMetrics(entry);
  }

  private scheduleWrite(): void {
    this.writePromise = this.writePromise.then(() => this.writePending());
  }

  private async writePending(): Promise<void> {
    if (this.pendingWrites.length === 0) return;

    const batch = this.pendingWrites;
    this.pendingWrites = [];
    const filePath = path.join(
      this.config.logDir,
      `ai-${getDateString()}.jsonl`,
    );

    try {
      await fs.promises.mkdir(this.config.logDir, { recursive: true });
      const lines = batch.map((entry) => JSON.stringify(entry)).join("\n");
      await fs.promises.appendFile(filePath, lines + "\n", "utf-8");
    } catch (error) {
      this.pendingWrites = [...batch, ...this.pendingWrites].slice(
        0,
        this.config.maxMemoryLogs,
      );
      console.error("Failed to write logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: batch.length,
        filePath,
      });
    }
  }

  /**
   * Set the current turn counter for log context.
   */
  setTick(tick: number): void {
    this.currentTick = tick;
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.minLevel];
  }

  /**
   * Start a correlation context for related logs.
   * @returns The correlation ID to pass to related operations
   */
  startCorrelation(prefix?: string): string {
    this.sequence++;
    this.activeCorrelationId = `${prefix ?? "corr"}-${this.sequence}`;
    return this.activeCorrelationId;
  }

  endCorrelation(): void {
    this.activeCorrelationId = undefined;
  }

  private createEntry(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { correlationId?: string; agentId?: string; data?: unknown },
  ): LogEntry {
    const now = Date.now();
    this.sequence++;
    return {
      id: `${now}-${this.sequence}`,
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      correlationId: options?.correlationId ?? this.activeCorrelationId,
      agentId: options?.agentId,
      tick: this.currentTick,
      data: options?.data,
    };
  }

  /**
   * Log with explicit category and options.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { correlationId?: string; agentId?: string; data?: unknown },
  ): void {
    if (!this.isLevelEnabled(level)) return;
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const entry = this.createEntry(level, category, message, options);
    this.addToMemory(entry);

    if (!this.config.console) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, options?.data ?? "");
        break;
    }
  }

  private logWithOptionalCategory(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
    } else {
      this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
    }
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Log an actor-specific event.
   */
  agentLog(
    level: LogLevel,
    category: LogCategory,
    agentId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Agent:${agentId}] ${message}`, {
      agentId,
      data,
    });
  }

  getMetrics(): LogMetrics {
    return { ...this.metrics };
  }

  resetMetrics(): void {
    this.metrics = this.initMetrics();
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const {
      levels,
      categories,
      correlationId,
      agentId,
      startTime,
      endTime,
      messageContains,
      limit,
    } = filter;
    const search = messageContains?.toLowerCase();

    const results = this.memoryBuffer.filter(
      (e) =>
        (!levels?.length || levels.includes(e.level)) &&
        (!categories?.length || categories.includes(e.category)) &&
        (!correlationId || e.correlationId === correlationId) &&
        (!agentId || e.agentId === agentId) &&
        (startTime === undefined || e.timestampMs >= startTime) &&
        (endTime === undefined || e.timestampMs <= endTime) &&
        (!search || e.message.toLowerCase().includes(search)),
    );

    return limit ? results.slice(-limit) : results;
  }

  /**
   * Write any pending entries to the file sink.
   */
  async flush(): Promise<void> {
    this.scheduleWrite();
    await this.writePromise;
  }

  /** Distinct messages the throttle currently tracks */
  getThrottledMessageCount(): number {
    return this.throttleMap.size;
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.memoryBuffer.slice(-count);
  }

  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
  }

  destroy(): void {
    if (this.writeInterval) {
      clearInterval(this.writeInterval);
      this.writeInterval = undefined;
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
