/**
 * Deprovisioner
 * Decides whether a cluster may be deleted and whether its VPC goes with it,
 * then runs the deletion.
 */

import { CloudGateway, TaggedResourceRef } from '../types/cloud-gateway';
import { WaitConfig } from '../types/effective-config';
import { Logger } from '../types/logger';
import { ProgressTracker, silentProgress } from '../types/progress';
import { TAG_VPC_ID } from './constants';
import { SandboxError, fromGatewayFailure } from './errors';
import { NetworkTeardown, NetworkTeardownReport } from './network-teardown';
import { TagGuard } from './tag-guard';

/**
 * Operator decisions taken during a deletion
 */
export interface TeardownDecisions {
  /** Asked when the cluster lacks the provenance tag; false aborts the run */
  confirmForeignDeletion(clusterName: string): Promise<boolean>;
  /** Asked when the cluster owns an isolated VPC */
  confirmCascade(clusterName: string, vpcId: string): Promise<boolean>;
}

export interface DeprovisionResult {
  clusterName: string;
  outcome: 'aborted' | 'deleted';
  createdByTool: boolean;
  isolatedHosting: boolean;
  networkDeleted: boolean;
  vpcId?: string;
  teardown?: NetworkTeardownReport;
}

export interface DeprovisionerDependencies {
  gateway: CloudGateway;
  logger: Logger;
  wait: WaitConfig;
  progress?: ProgressTracker;
}

export class Deprovisioner {
  private readonly gateway: CloudGateway;
  private readonly logger: Logger;
  private readonly wait: WaitConfig;
  private readonly progress: ProgressTracker;
  private readonly guard: TagGuard;
  private readonly networkTeardown: NetworkTeardown;

  constructor(deps: DeprovisionerDependencies) {
    this.gateway = deps.gateway;
    this.logger = deps.logger;
    this.wait = deps.wait;
    this.progress = deps.progress ?? silentProgress;
    this.guard = new TagGuard(deps.gateway, deps.logger);
    this.networkTeardown = new NetworkTeardown({ gateway: deps.gateway, logger: deps.logger });
  }

  async deprovision(clusterName: string, decisions: TeardownDecisions): Promise<DeprovisionResult> {
    const cluster: TaggedResourceRef = { kind: 'cluster', name: clusterName };

    const createdByTool = await this.readTags(clusterName, () => this.guard.isCreatedByTool(cluster));
    if (!createdByTool) {
      const proceed = await decisions.confirmForeignDeletion(clusterName);
      if (!proceed) {
        this.logger.info(`Deletion of ${clusterName} cancelled by the operator`, {
          resourceType: 'cluster',
          resourceId: clusterName,
        });
        return {
          clusterName,
          outcome: 'aborted',
          createdByTool,
          isolatedHosting: false,
          networkDeleted: false,
        };
      }
    }

    const isolatedHosting = await this.readTags(clusterName, () => this.guard.isIsolatedHosting(cluster));
    let vpcId: string | undefined;
    let cascade = false;
    if (isolatedHosting) {
      vpcId = await this.readTags(clusterName, () => this.guard.getTagValue(cluster, TAG_VPC_ID));
      if (!vpcId) {
        throw new SandboxError(
          'TEARDOWN',
          `Cluster ${clusterName} is tagged as isolated hosting but has no ${TAG_VPC_ID} tag`,
          { operation: 'getTags', resourceId: clusterName }
        );
      }
      cascade = await decisions.confirmCascade(clusterName, vpcId);
    }

    try {
      await this.gateway.deleteCluster(clusterName);
    } catch (error) {
      throw fromGatewayFailure('TEARDOWN', error, { operation: 'deleteCluster', resourceId: clusterName });
    }
    this.logger.event('resource_deleted', `Deleted cluster ${clusterName}`, {
      resourceType: 'cluster',
      resourceId: clusterName,
    });

    if (!cascade || !vpcId) {
      return { clusterName, outcome: 'deleted', createdByTool, isolatedHosting, networkDeleted: false, vpcId };
    }

    if (this.wait.enabled) {
      try {
        await this.progress.track(
          `Waiting for cluster ${clusterName} to be deleted`,
          () => this.gateway.waitForClusterDeleted(clusterName, this.wait.timeoutSeconds),
          `Cluster ${clusterName} deleted`
        );
      } catch (error) {
        throw fromGatewayFailure('TEARDOWN', error, { operation: 'waitForClusterDeleted', resourceId: clusterName });
      }
    }

    const teardown = await this.networkTeardown.teardown(vpcId);
    return {
      clusterName,
      outcome: 'deleted',
      createdByTool,
      isolatedHosting,
      networkDeleted: true,
      vpcId,
      teardown,
    };
  }

  private async readTags<T>(clusterName: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw fromGatewayFailure('TEARDOWN', error, { operation: 'getTags', resourceId: clusterName });
    }
  }
}
