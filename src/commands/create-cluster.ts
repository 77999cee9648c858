/**
 * Create-cluster command
 * Collects the run parameters from config and prompts, then runs the Provisioner
 */

import { NetworkSelector, Provisioner, ProvisionResult } from '../core/provisioner';
import { CLUSTER_NAME_PREFIX, CORE_ADDONS, TAG_NAME, toSandboxClusterName } from '../core/constants';
import { fetchLatestVersion } from '../core/version-resolver';
import { SandboxError } from '../core/errors';
import { Prompter } from '../types/prompter';
import { Logger } from '../types/logger';
import { CommandContext, ask, isUnset, openGateway } from './command-context';

export const CLUSTER_NAME_QUESTION = `Enter the name of the EKS cluster (it will be prefixed with '${CLUSTER_NAME_PREFIX}'):`;
export const VERSION_QUESTION = 'Enter the Kubernetes version:';
export const AUTO_MODE_QUESTION = 'Enable EKS Auto Mode (managed compute, storage and load balancing)?';
export const ADDONS_QUESTION = `Install the core add-ons (${CORE_ADDONS.join(', ')})?`;
export const REUSE_NETWORK_QUESTION = 'Do you want to use an existing VPC?';
export const VPC_QUESTION = 'Select the VPC:';
export const SUBNETS_QUESTION = 'Select at least two subnets in different availability zones:';
export const SECURITY_GROUPS_QUESTION = 'Select the security groups:';

function nameTagSuffix(tags: Record<string, string>): string {
  const name = tags[TAG_NAME];
  return name ? ` (${name})` : '';
}

/**
 * Network selection backed by operator prompts
 */
export function createPromptNetworkSelector(prompter: Prompter, logger: Logger): NetworkSelector {
  return {
    selectVpc: (vpcs) =>
      ask(logger, VPC_QUESTION, () =>
        prompter.select({
          message: VPC_QUESTION,
          choices: vpcs.map((vpc) => ({
            name: `${vpc.vpcId}${nameTagSuffix(vpc.tags)}`,
            value: vpc.vpcId,
            description: vpc.isDefault ? `${vpc.cidrBlock}, default VPC` : vpc.cidrBlock,
          })),
        })
      ),
    selectSubnets: (subnets) =>
      ask(logger, SUBNETS_QUESTION, () =>
        prompter.multiSelect({
          message: SUBNETS_QUESTION,
          choices: subnets.map((subnet) => ({
            name: `${subnet.subnetId}${nameTagSuffix(subnet.tags)}`,
            value: subnet.subnetId,
            description: `${subnet.availabilityZone}, ${subnet.cidrBlock}`,
          })),
        })
      ),
    selectSecurityGroups: (groups) =>
      ask(logger, SECURITY_GROUPS_QUESTION, () =>
        prompter.multiSelect({
          message: SECURITY_GROUPS_QUESTION,
          choices: groups.map((group) => ({
            name: group.groupId,
            value: group.groupId,
            description: group.groupName,
          })),
        })
      ),
  };
}

function validateClusterName(input: string): boolean | string {
  return input.trim().length > 0 || 'Cluster name cannot be empty';
}

/**
 * Run the create flow end to end
 */
export async function executeCreateCluster(ctx: CommandContext): Promise<ProvisionResult> {
  const { config, logger, prompter } = ctx;
  const gateway = await openGateway(ctx);

  const typedName =
    config.cluster.name ??
    (await ask(logger, CLUSTER_NAME_QUESTION, () =>
      prompter.input({ message: CLUSTER_NAME_QUESTION, validate: validateClusterName })
    ));
  if (typedName.trim().length === 0) {
    throw new SandboxError('CONFIGURATION', 'Cluster name cannot be empty', { operation: 'input' });
  }
  const clusterName = toSandboxClusterName(typedName.trim());

  let kubernetesVersion = config.cluster.kubernetesVersion;
  if (!kubernetesVersion) {
    const latest = await fetchLatestVersion(gateway, config.cluster.versionOrdering);
    logger.debug(`Latest available Kubernetes version is ${latest}`, { step: 'version' });
    kubernetesVersion = await ask(logger, VERSION_QUESTION, () =>
      prompter.input({ message: VERSION_QUESTION, default: latest })
    );
  }

  const autoMode = isUnset(config, 'autoMode')
    ? await ask(logger, AUTO_MODE_QUESTION, () =>
        prompter.confirm({ message: AUTO_MODE_QUESTION, default: config.cluster.autoMode })
      )
    : config.cluster.autoMode;

  const installAddons = isUnset(config, 'installAddons')
    ? await ask(logger, ADDONS_QUESTION, () =>
        prompter.confirm({ message: ADDONS_QUESTION, default: config.cluster.installAddons })
      )
    : config.cluster.installAddons;

  const reuseNetwork = isUnset(config, 'reuseNetwork')
    ? await ask(logger, REUSE_NETWORK_QUESTION, () =>
        prompter.confirm({ message: REUSE_NETWORK_QUESTION, default: config.cluster.reuseNetwork })
      )
    : config.cluster.reuseNetwork;

  if (reuseNetwork && config.cluster.ingressCidr) {
    logger.warn(`Ignoring ingress CIDR ${config.cluster.ingressCidr}: it only applies to a new security group`);
  }

  logger.info(`Creating cluster ${clusterName} (Kubernetes ${kubernetesVersion}) in ${gateway.region}`, {
    resourceType: 'cluster',
    resourceId: clusterName,
  });

  const provisioner = new Provisioner({
    gateway,
    logger,
    clock: ctx.clock,
    wait: config.wait,
    progress: ctx.progress,
  });

  return provisioner.provision({
    clusterName,
    kubernetesVersion,
    autoMode,
    installAddons,
    network: reuseNetwork
      ? { mode: 'reuse', selector: createPromptNetworkSelector(prompter, logger) }
      : { mode: 'create' },
    ingressCidr: reuseNetwork ? undefined : config.cluster.ingressCidr,
  });
}
