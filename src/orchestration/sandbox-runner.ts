/**
 * Sandbox Runner
 * Runs one create or delete from a resolved configuration and reports the outcome
 */

import { CloudGateway } from '../types/cloud-gateway';
import { EffectiveConfig, summarizeConfigForLogging } from '../types/effective-config';
import { ExitCode } from '../types/exit-codes';
import { SandboxAction } from '../types/logger';
import { getExitCodeForError } from '../core/errors';
import { selectAction, executeSandboxAction, SandboxRunResult } from '../commands/run-sandbox';
import { RunOutcome, RunSummary, RunSummaryBuilder } from '../logging/run-summary';
import { SandboxDependencies, createCommandContext } from './sandbox-factory';

export interface SandboxRunReport {
  summary: RunSummary;
  exitCode: ExitCode;
  /** Absent when the run failed */
  result?: SandboxRunResult;
  /** Gateway the run connected to, if it got that far */
  gateway?: CloudGateway;
  error?: unknown;
}

function outcomeOf(run: SandboxRunResult): RunOutcome {
  if (run.action === 'create') {
    return 'created';
  }
  if (run.result === null || run.result.outcome === 'aborted') {
    return 'aborted';
  }
  return 'deleted';
}

function clusterNameOf(run: SandboxRunResult): string | undefined {
  return run.result?.clusterName;
}

/**
 * Run the sandbox flow; failures are reported, never thrown
 */
export async function runSandbox(config: EffectiveConfig, deps: SandboxDependencies): Promise<SandboxRunReport> {
  const summary = new RunSummaryBuilder(
    { runId: config.runId, region: config.aws.region, dryRun: config.dryRun },
    deps.clock
  );
  let gateway: CloudGateway | undefined;
  const ctx = createCommandContext(config, {
    ...deps,
    connect: (region) => {
      summary.setRegion(region);
      gateway = deps.connect(region);
      return gateway;
    },
  });
  const { logger } = ctx;

  const firstEvent = logger.getEvents().length;
  logger.event('run_started', `Run ${config.runId} started`, { dryRun: config.dryRun });
  logger.debug('Effective configuration', { config: summarizeConfigForLogging(config) });

  let action: SandboxAction | undefined;
  try {
    action = await selectAction(ctx);
    summary.setAction(action);
    logger.setContext({ action });

    const result = await executeSandboxAction(ctx, action);
    const outcome = outcomeOf(result);
    const clusterName = clusterNameOf(result);
    if (clusterName) {
      summary.setClusterName(clusterName);
    }
    summary.recordEvents(logger.getEvents().slice(firstEvent));

    if (outcome === 'aborted') {
      logger.event('run_aborted', clusterName ? `Deletion of ${clusterName} aborted` : 'Nothing to delete');
    } else {
      logger.event('run_completed', `Run ${config.runId} completed`);
    }
    return { summary: summary.build(outcome), exitCode: ExitCode.SUCCESS, result, gateway };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.event('run_failed', message, { action });
    summary.recordEvents(logger.getEvents().slice(firstEvent));
    return { summary: summary.build('failed', message), exitCode: getExitCodeForError(error), gateway, error };
  }
}
