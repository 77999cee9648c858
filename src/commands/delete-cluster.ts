/**
 * Delete-cluster command
 * Picks the cluster, then lets the Deprovisioner ask the safety questions
 */

import { Deprovisioner, DeprovisionResult, TeardownDecisions } from '../core/deprovisioner';
import { SandboxError, fromGatewayFailure } from '../core/errors';
import { CommandContext, ask, isUnset, openGateway } from './command-context';

export const SELECT_CLUSTER_QUESTION = 'Select the cluster to delete:';
export const FOREIGN_CLUSTER_QUESTION =
  'This cluster does not appear to be created by this tool. Are you sure you want to delete it? Danger!!';

export function cascadeQuestion(clusterName: string, vpcId: string): string {
  return `Cluster ${clusterName} runs in its own VPC ${vpcId}. Delete the VPC and everything in it too?`;
}

/**
 * Teardown decisions backed by operator prompts
 */
export function createPromptTeardownDecisions(ctx: CommandContext): TeardownDecisions {
  const { config, logger, prompter } = ctx;
  return {
    confirmForeignDeletion: () =>
      ask(logger, FOREIGN_CLUSTER_QUESTION, () =>
        prompter.confirm({ message: FOREIGN_CLUSTER_QUESTION, default: false })
      ),
    confirmCascade: async (clusterName, vpcId) => {
      if (!isUnset(config, 'cascadeNetwork')) {
        return config.teardown.cascadeNetwork;
      }
      const question = cascadeQuestion(clusterName, vpcId);
      return ask(logger, question, () =>
        prompter.confirm({ message: question, default: config.teardown.cascadeNetwork })
      );
    },
  };
}

/**
 * Run the delete flow end to end; null when the region has no clusters
 */
export async function executeDeleteCluster(ctx: CommandContext): Promise<DeprovisionResult | null> {
  const { config, logger, prompter } = ctx;
  const gateway = await openGateway(ctx);

  let clusters: string[];
  try {
    clusters = await gateway.listClusters();
  } catch (error) {
    throw fromGatewayFailure('TEARDOWN', error, { operation: 'listClusters' });
  }

  if (clusters.length === 0) {
    logger.info('No clusters found', { region: gateway.region });
    return null;
  }

  let clusterName = config.teardown.clusterName;
  if (clusterName === undefined) {
    clusterName = await ask(logger, SELECT_CLUSTER_QUESTION, () =>
      prompter.select({
        message: SELECT_CLUSTER_QUESTION,
        choices: clusters.map((name) => ({ name, value: name })),
      })
    );
  } else if (!clusters.includes(clusterName)) {
    throw new SandboxError('CONFIGURATION', `Cluster ${clusterName} was not found in ${gateway.region}`, {
      operation: 'listClusters',
      resourceId: clusterName,
    });
  }

  const deprovisioner = new Deprovisioner({
    gateway,
    logger,
    wait: config.wait,
    progress: ctx.progress,
  });
  return deprovisioner.deprovision(clusterName, createPromptTeardownDecisions(ctx));
}
