/**
 * Logging module - structured logging implementations
 */

export { ConsoleLogger, createConsoleLogger } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';

// Run summary
export type { RunOutcome, SummaryResource, RunSummary, RunSummaryContext } from './run-summary';
export { RunSummaryBuilder, formatRunSummary, formatDuration } from './run-summary';
