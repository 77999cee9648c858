/**
 * Buffer Logger implementation
 * For testing - stores events in memory without output
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  getEventLevel,
  shouldLog,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

/**
 * Buffer-based logger for testing
 * Child loggers write into their parent's buffer.
 */
export class BufferLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private readonly events: LogEvent[];
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}, sharedEvents: LogEvent[] = []) {
    this.minLevel = options.minLevel ?? 'debug'; // Capture all by default for testing
    this.options = {
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
    this.events = sharedEvents;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new BufferLogger(this.options, this.events);
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  /**
   * Messages of the events of one type, in order
   */
  getMessages(eventType: LogEventType): string[] {
    return this.getEventsByType(eventType).map((e) => e.message);
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    this.events.push({
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    });
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged = { ...this.context, ...metadata };
    // Redact any string values in metadata
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }
    return merged;
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }
}

/**
 * Create a buffer logger for testing
 */
export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
