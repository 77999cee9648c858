/**
 * Top-level sandbox flow
 * Asks which action to perform and hands over to the matching command
 */

import { ProvisionResult } from '../core/provisioner';
import { DeprovisionResult } from '../core/deprovisioner';
import { SandboxAction } from '../types/logger';
import { CommandContext, ask } from './command-context';
import { executeCreateCluster } from './create-cluster';
import { executeDeleteCluster } from './delete-cluster';

export const ACTION_QUESTION = 'What action do you want to perform?';

export type SandboxRunResult =
  | { action: 'create'; result: ProvisionResult }
  | { action: 'delete'; result: DeprovisionResult | null };

export async function selectAction(ctx: CommandContext): Promise<SandboxAction> {
  if (ctx.config.action) {
    return ctx.config.action;
  }
  return ask(ctx.logger, ACTION_QUESTION, () =>
    ctx.prompter.select<SandboxAction>({
      message: ACTION_QUESTION,
      choices: [
        { name: 'Create Cluster', value: 'create' },
        { name: 'Delete Cluster', value: 'delete' },
      ],
    })
  );
}

export async function executeSandboxAction(ctx: CommandContext, action: SandboxAction): Promise<SandboxRunResult> {
  if (action === 'create') {
    return { action, result: await executeCreateCluster(ctx) };
  }
  return { action, result: await executeDeleteCluster(ctx) };
}
