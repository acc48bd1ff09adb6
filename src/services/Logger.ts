/**
 * Structured stderr logging with RFC 5424 level names
 */

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  NOTICE = "notice",
  WARNING = "warning",
  ERROR = "error",
  CRITICAL = "critical",
  ALERT = "alert",
  EMERGENCY = "emergency",
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.NOTICE]: 2,
  [LogLevel.WARNING]: 3,
  [LogLevel.ERROR]: 4,
  [LogLevel.CRITICAL]: 5,
  [LogLevel.ALERT]: 6,
  [LogLevel.EMERGENCY]: 7,
};

/**
 * Context information for log entries
 */
export interface LogContext {
  operation?: string;
  service?: string;
  mailbox?: string;
  uid?: number;
  duration?: number;
  timestamp?: Date;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  logger?: string;
  context: LogContext;
  timestamp: Date;
  data?: Record<string, unknown>;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  includeTimestamp: boolean;
  includeContext: boolean;
  maxContextDepth: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.NOTICE,
  includeTimestamp: true,
  includeContext: true,
  maxContextDepth: 3,
};

/**
 * Map the number of -v flags to a minimum level.
 * 0 → notice, 1 → info, 2 or more → debug.
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) return LogLevel.DEBUG;
  if (verbosity === 1) return LogLevel.INFO;
  return LogLevel.NOTICE;
}

export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);

    if (entry.logger) {
      parts.push(`[${entry.logger}]`);
    }

    parts.push(entry.message);

    if (this.config.includeContext) {
      const contextParts: string[] = [];

      if (entry.context.operation) {
        contextParts.push(`op=${entry.context.operation}`);
      }

      if (entry.context.service) {
        contextParts.push(`svc=${entry.context.service}`);
      }

      if (entry.context.mailbox) {
        contextParts.push(`box=${entry.context.mailbox}`);
      }

      if (entry.context.uid !== undefined) {
        contextParts.push(`uid=${entry.context.uid}`);
      }

      if (entry.context.duration !== undefined) {
        contextParts.push(`dur=${entry.context.duration}ms`);
      }

      if (contextParts.length > 0) {
        parts.push(`{${contextParts.join(", ")}}`);
      }
    }

    if (entry.data) {
      const serializedData = this.serializeData(entry.data);
      if (serializedData) {
        parts.push(`data=${serializedData}`);
      }
    }

    return parts.join(" ");
  }

  /**
   * Serialize data for logging with depth control
   */
  private serializeData(data: unknown, depth = 0): string {
    if (depth >= this.config.maxContextDepth) {
      return "[max depth reached]";
    }

    if (data === null || data === undefined) {
      return String(data);
    }

    if (
      typeof data === "string" ||
      typeof data === "number" ||
      typeof data === "boolean"
    ) {
      return String(data);
    }

    if (data instanceof Error) {
      return `Error: ${data.message}`;
    }

    if (data instanceof Date) {
      return data.toISOString();
    }

    if (Array.isArray(data)) {
      if (data.length === 0) return "[]";
      if (data.length > 5) return `[Array(${data.length})]`;
      return `[${data.map(item => this.serializeData(item, depth + 1)).join(", ")}]`;
    }

    if (typeof data === "object") {
      const entries = Object.entries(data);
      if (entries.length === 0) return "{}";
      if (entries.length > 10) return `{Object(${entries.length} keys)}`;

      const pairs = entries.map(
        ([key, value]) => `${key}: ${this.serializeData(value, depth + 1)}`,
      );
      return `{${pairs.join(", ")}}`;
    }

    return String(data);
  }

  private log(
    level: LogLevel,
    message: string,
    context: LogContext = {},
    logger?: string,
    data?: Record<string, unknown>,
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      logger,
      context: {
        ...context,
        timestamp: context.timestamp || new Date(),
      },
      timestamp: new Date(),
      data,
    };

    console.error(this.formatEntry(entry));
  }

  debug(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context, undefined, data);
  }

  info(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context, undefined, data);
  }

  notice(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.NOTICE, message, context, undefined, data);
  }

  warning(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARNING, message, context, undefined, data);
  }

  error(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, undefined, data);
  }

  critical(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.CRITICAL, message, context, undefined, data);
  }

  /**
   * @internal
   */
  _logInternal(
    level: LogLevel,
    message: string,
    context?: LogContext,
    loggerName?: string,
    data?: Record<string, unknown>,
  ): void {
    this.log(level, message, context, loggerName, data);
  }

  child(loggerName: string): ChildLogger {
    return new ChildLogger(this, loggerName);
  }

  startTimer(operation: string, loggerName?: string): PerformanceTimer {
    return new PerformanceTimer(this, operation, loggerName);
  }
}

/**
 * Child logger with a predefined logger name
 */
export class ChildLogger {
  constructor(
    private parent: Logger,
    private loggerName: string,
  ) {}

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    data?: Record<string, unknown>,
  ): void {
    this.parent._logInternal(level, message, context, this.loggerName, data);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.parent.isLevelEnabled(level);
  }

  debug(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  info(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context, data);
  }

  notice(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.NOTICE, message, context, data);
  }

  warning(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARNING, message, context, data);
  }

  error(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, data);
  }

  critical(message: string, context?: LogContext, data?: Record<string, unknown>): void {
    this.log(LogLevel.CRITICAL, message, context, data);
  }

  startTimer(operation: string): PerformanceTimer {
    return this.parent.startTimer(operation, this.loggerName);
  }
}

/**
 * Measures one operation and logs its duration at debug level
 */
export class PerformanceTimer {
  private startTime: Date;

  constructor(
    private logger: Logger,
    private operation: string,
    private loggerName?: string,
  ) {
    this.startTime = new Date();
  }

  /**
   * Returns the elapsed milliseconds
   */
  end(success = true): number {
    const duration = Date.now() - this.startTime.getTime();
    this.logger._logInternal(
      LogLevel.DEBUG,
      `${this.operation} ${success ? "completed" : "failed"} in ${duration}ms`,
      { operation: this.operation, duration },
      this.loggerName,
    );
    return duration;
  }
}

export const logger = new Logger();

export function createLogger(loggerName: string): ChildLogger {
  return logger.child(loggerName);
}
