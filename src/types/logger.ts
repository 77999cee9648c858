/**
 * Logger interface
 * Structured logging with event types and metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for a sandbox run
 */
export type LogEventType =
  // Run lifecycle
  | 'run_started'
  | 'run_completed'
  | 'run_aborted'
  | 'run_failed'
  // Pipeline steps
  | 'step_started'
  | 'step_completed'
  // Remote resources
  | 'resource_created'
  | 'resource_exists'
  | 'resource_deleted'
  | 'resource_skipped'
  // Safety checks
  | 'guard_checked'
  // User interaction
  | 'prompt_shown'
  | 'prompt_answered'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

export type SandboxAction = 'create' | 'delete';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Unique identifier for this run */
  runId?: string;
  /** Action being performed */
  action?: SandboxAction;
  /** AWS region */
  region?: string;
  /** Pipeline step (identity, role, network, cluster, addons, teardown) */
  step?: string;
  /** Kind of remote resource the event concerns */
  resourceType?: string;
  /** Id or name of the remote resource */
  resourceId?: string;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
  /** Patterns to redact from log output */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations write to the console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; the level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Merge metadata into every subsequent log line
   */
  setContext(context: Partial<LogMetadata>): void;

  /**
   * All events logged so far (for diagnostics and the run summary)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  const order: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };
  return order[a] - order[b];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Level an event type is logged at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'run_failed':
      return 'error';
    case 'warn':
    case 'run_aborted':
      return 'warn';
    case 'debug':
    case 'guard_checked':
    case 'prompt_shown':
    case 'prompt_answered':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Secret patterns redacted from log output
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // AWS access key ids
  /(?:AKIA|ABIA|ACCA|ASIA)[A-Z0-9]{16}/g,
  // AWS secret access keys and session tokens in key=value form
  /(?:aws_secret_access_key|aws_session_token|secretAccessKey|sessionToken)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
  // Generic secrets in env vars
  /(?:password|secret|token|credential)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Reset lastIndex for stateful regexes
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      // Keep the first few characters for debugging, redact the rest
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
