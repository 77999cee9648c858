/**
 * Console Logger implementation
 * Structured logging with event types and metadata
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
 * Console-based logger implementation.
 * Children share the parent's event list so the run summary sees every event.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private readonly events: LogEvent[];
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}, sharedEvents: LogEvent[] = []) {
    this.minLevel = options.minLevel ?? 'info';
    this.events = sharedEvents;
    this.options = {
      includeTimestamp: true,
      jsonOutput: false,
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
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
    const childLogger = new ConsoleLogger({ ...this.options, minLevel: this.minLevel }, this.events);
    childLogger.setContext({ ...this.context, ...additionalContext });
    return childLogger;
  }

  /**
   * Every event is kept for the run summary; only those at or above the
   * minimum level are printed
   */
  private log(level: LogLevel, eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    };

    this.events.push(event);
    if (shouldLog(level, this.minLevel)) {
      this.output(event);
    }
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged: LogMetadata = { ...this.context, ...metadata };
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

  private output(event: LogEvent): void {
    if (this.options.jsonOutput) {
      // stderr keeps stdout free for the JSON run summary
      console.error(JSON.stringify(event));
    } else {
      this.outputPretty(event);
    }
  }

  private outputPretty(event: LogEvent): void {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(getLevelIndicator(event.level));

    if (!['debug', 'info', 'warn', 'error'].includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { step, resourceType, resourceId } = event.metadata;
    const metaParts: string[] = [];
    if (step) metaParts.push(`step=${step}`);
    if (resourceType) metaParts.push(`type=${resourceType}`);
    if (resourceId) metaParts.push(`id=${resourceId}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    const line = parts.join(' ');

    if (event.level === 'error') {
      console.error(line);
    } else if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function getLevelIndicator(level: LogLevel): string {
  switch (level) {
    case 'debug':
      return '🔍';
    case 'info':
      return 'ℹ️';
    case 'warn':
      return '⚠️';
    case 'error':
      return '❌';
  }
}

export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
