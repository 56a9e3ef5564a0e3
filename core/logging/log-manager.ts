/**
 * Log levels for the logging system
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Singleton logger for the WKT loader
 */
export class LogManager {
  private static instance: LogManager;
  private logs: LogEntry[] = [];
  private readonly MAX_LOGS = 10000; // Prevent memory issues
  private logLevel: LogLevel = LogLevel.INFO;
  private sourceFilters: Map<string, LogLevel> = new Map();
  private consoleOutput = process.env.NODE_ENV === 'development';

  private constructor() {}

  /**
   * Get the singleton instance
   */
  public static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  /**
   * Add a source-specific log level filter
   */
  public addFilter(source: string, level: LogLevel): void {
    this.sourceFilters.set(source, level);
  }

  public removeFilter(source: string): void {
    this.sourceFilters.delete(source);
  }

  public clearFilters(): void {
    this.sourceFilters.clear();
  }

  public getFilters(): Record<string, LogLevel> {
    return Object.fromEntries(this.sourceFilters);
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  /**
   * Mirror entries to the console
   */
  public setConsoleOutput(enabled: boolean): void {
    this.consoleOutput = enabled;
  }

  private shouldLog(level: LogLevel, source: string): boolean {
    // Source-specific filter wins over the global level
    const threshold = this.sourceFilters.get(source) ?? this.logLevel;
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(threshold);
  }

  /**
   * Stringify details, cutting off circular references and deep nesting
   */
  private safeStringify(details: Record<string, unknown>, indent: number = 2): string {
    const MAX_DEPTH = 3;
    const MAX_ARRAY_LENGTH = 10;
    const TRUNCATE_LENGTH = 100;
    const seen = new WeakSet<object>();

    const simplify = (value: unknown, depth: number): unknown => {
      if (typeof value === 'string') {
        return value.length > TRUNCATE_LENGTH ? value.slice(0, TRUNCATE_LENGTH) + '...' : value;
      }
      if (typeof value === 'function') {
        return '[Omitted]';
      }
      if (typeof value !== 'object' || value === null) {
        return value;
      }
      if (value instanceof Error) {
        return {
          name: value.name,
          message: value.message,
          stack: value.stack?.split('\n').slice(0, 3).join('\n')
        };
      }
      if (seen.has(value)) {
        return '[Circular]';
      }
      if (depth >= MAX_DEPTH) {
        return `[${value.constructor?.name ?? 'Object'}]`;
      }
      seen.add(value);

      if (Array.isArray(value)) {
        const items = value.slice(0, MAX_ARRAY_LENGTH).map(item => simplify(item, depth + 1));
        if (value.length > MAX_ARRAY_LENGTH) {
          items.push(`...${value.length - MAX_ARRAY_LENGTH} more items`);
        }
        return items;
      }
      if (value instanceof Map) {
        return `[Map(${value.size})]`;
      }
      if (value instanceof Set) {
        return `[Set(${value.size})]`;
      }

      const simplified: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        if (!key.startsWith('_')) {
          simplified[key] = simplify(entry, depth + 1);
        }
      }
      return simplified;
    };

    return JSON.stringify(simplify(details, 0), null, indent);
  }

  private formatLogEntry(entry: LogEntry): string {
    let dataStr = '';
    if (entry.details) {
      try {
        dataStr = '\n' + this.safeStringify(entry.details);
      } catch (error) {
        dataStr = `\n[Error stringifying details: ${error instanceof Error ? error.message : String(error)}]`;
      }
    }
    return `[${entry.timestamp}] [${entry.level}] [${entry.source}] ${entry.message}${dataStr}`;
  }

  public debug(source: string, message: string, details?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG, source)) {
      this.log(LogLevel.DEBUG, source, message, details);
    }
  }

  public info(source: string, message: string, details?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO, source)) {
      this.log(LogLevel.INFO, source, message, details);
    }
  }

  public warn(source: string, message: string, details?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN, source)) {
      this.log(LogLevel.WARN, source, message, details);
    }
  }

  public error(source: string, message: string, details?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR, source)) {
      this.log(LogLevel.ERROR, source, message, details);
    }
  }

  /**
   * Get all logs
   */
  public getLogs(): LogEntry[] {
    return [...this.logs];
  }

  public clearLogs(): void {
    this.logs = [];
  }

  /**
   * All buffered entries as text, one block per entry
   */
  public exportLogs(): string {
    return this.logs.map(entry => this.formatLogEntry(entry)).join('\n');
  }

  private log(level: LogLevel, source: string, message: string, details?: Record<string, unknown>): void {
    // Drop internal properties
    const sanitizedDetails = details
      ? Object.fromEntries(Object.entries(details).filter(([key]) => !key.startsWith('_')))
      : undefined;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      source,
      message,
      details: sanitizedDetails
    };

    this.logs.push(entry);
    if (this.logs.length > this.MAX_LOGS) {
      this.logs.shift();
    }

    if (this.consoleOutput) {
      const consoleMessage = `[${entry.timestamp}] [${level}] [${source}] ${message}`;
      switch (level) {
        case LogLevel.DEBUG:
          console.debug(consoleMessage, sanitizedDetails ?? '');
          break;
        case LogLevel.INFO:
          console.info(consoleMessage, sanitizedDetails ?? '');
          break;
        case LogLevel.WARN:
          console.warn(consoleMessage, sanitizedDetails ?? '');
          break;
        case LogLevel.ERROR:
          console.error(consoleMessage, sanitizedDetails ?? '');
          break;
      }
    }
  }
}
