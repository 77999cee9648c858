/**
 * Run Summary
 * Collects what a run created and deleted and renders it for the operator
 */

import { Clock } from '../types/clock';
import { LogEvent, SandboxAction } from '../types/logger';

export type RunOutcome = 'created' | 'deleted' | 'aborted' | 'failed';

export interface SummaryResource {
  resourceType: string;
  resourceId: string;
}

export interface RunSummary {
  schemaVersion: '1.0.0';
  runId: string;
  action: SandboxAction | null;
  region: string;
  dryRun: boolean;
  outcome: RunOutcome;
  success: boolean;
  clusterName?: string;
  /** Start time (ISO 8601) */
  startedAt: string;
  /** End time (ISO 8601) */
  endedAt: string;
  durationMs: number;
  created: SummaryResource[];
  deleted: SummaryResource[];
  /** Final error if failed */
  error?: string;
}

export interface RunSummaryContext {
  runId: string;
  region: string;
  dryRun: boolean;
}

export class RunSummaryBuilder {
  private readonly startedAt: Date;
  private action: SandboxAction | null = null;
  private region: string;
  private clusterName: string | undefined;
  private readonly created: SummaryResource[] = [];
  private readonly deleted: SummaryResource[] = [];

  constructor(
    private readonly context: RunSummaryContext,
    private readonly clock: Clock
  ) {
    this.startedAt = clock.now();
    this.region = context.region;
  }

  setRegion(region: string): void {
    this.region = region;
  }

  setAction(action: SandboxAction): void {
    this.action = action;
  }

  setClusterName(clusterName: string): void {
    this.clusterName = clusterName;
  }

  recordCreated(resourceType: string, resourceId: string): void {
    this.created.push({ resourceType, resourceId });
  }

  recordDeleted(resourceType: string, resourceId: string): void {
    this.deleted.push({ resourceType, resourceId });
  }

  /**
   * Pick up created and deleted resources from the run's log events,
   * so a failed run still reports what it left behind
   */
  recordEvents(events: LogEvent[]): void {
    for (const event of events) {
      const { resourceType, resourceId } = event.metadata;
      if (typeof resourceType !== 'string' || typeof resourceId !== 'string') {
        continue;
      }
      if (event.eventType === 'resource_created') {
        this.recordCreated(resourceType, resourceId);
      } else if (event.eventType === 'resource_deleted') {
        this.recordDeleted(resourceType, resourceId);
      }
    }
  }

  build(outcome: RunOutcome, error?: string): RunSummary {
    const endedAt = this.clock.now();
    return {
      schemaVersion: '1.0.0',
      runId: this.context.runId,
      action: this.action,
      region: this.region,
      dryRun: this.context.dryRun,
      outcome,
      success: outcome !== 'failed',
      clusterName: this.clusterName,
      startedAt: this.startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: endedAt.getTime() - this.startedAt.getTime(),
      created: [...this.created],
      deleted: [...this.deleted],
      error,
    };
  }
}

/**
 * Format run summary as plain text for the terminal
 */
export function formatRunSummary(summary: RunSummary): string {
  const status: Record<RunOutcome, string> = {
    created: '✅ Created',
    deleted: '✅ Deleted',
    aborted: '⏹️  Aborted',
    failed: '❌ Failed',
  };

  const lines: string[] = [
    '',
    `Run ${summary.runId}${summary.dryRun ? ' (dry run)' : ''}`,
    `Status: ${status[summary.outcome]}`,
  ];
  if (summary.clusterName) {
    lines.push(`Cluster: ${summary.clusterName}`);
  }
  lines.push(`Region: ${summary.region}`);
  lines.push(`Duration: ${formatDuration(summary.durationMs)}`);

  if (summary.created.length > 0) {
    lines.push('', 'Created:');
    for (const r of summary.created) {
      lines.push(`  - ${r.resourceType} ${r.resourceId}`);
    }
  }

  if (summary.deleted.length > 0) {
    lines.push('', 'Deleted:');
    for (const r of summary.deleted) {
      lines.push(`  - ${r.resourceType} ${r.resourceId}`);
    }
  }

  if (summary.error) {
    lines.push('', `Error: ${summary.error}`);
  }

  return lines.join('\n');
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}
