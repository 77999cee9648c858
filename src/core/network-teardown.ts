/**
 * Network Teardown
 * Deletes a VPC and its dependents in the only order AWS accepts:
 * interfaces, gateways, subnets, route tables, security groups, then the VPC.
 */

import { CloudGateway } from '../types/cloud-gateway';
import { Logger } from '../types/logger';
import { DEFAULT_SECURITY_GROUP_NAME, TAG_CREATED_BY, TOOL_TAG_VALUE } from './constants';
import { fromGatewayFailure } from './errors';

export interface NetworkTeardownReport {
  vpcId: string;
  deletedNetworkInterfaces: string[];
  deletedInternetGateways: string[];
  deletedSubnets: string[];
  deletedRouteTables: string[];
  deletedSecurityGroups: string[];
  /** Main route tables and default security groups left for the VPC deletion */
  skipped: string[];
}

export interface NetworkTeardownDependencies {
  gateway: CloudGateway;
  logger: Logger;
}

export class NetworkTeardown {
  private readonly gateway: CloudGateway;
  private readonly logger: Logger;

  constructor(deps: NetworkTeardownDependencies) {
    this.gateway = deps.gateway;
    this.logger = deps.logger.child({ step: 'teardown' });
  }

  async teardown(vpcId: string): Promise<NetworkTeardownReport> {
    const report: NetworkTeardownReport = {
      vpcId,
      deletedNetworkInterfaces: [],
      deletedInternetGateways: [],
      deletedSubnets: [],
      deletedRouteTables: [],
      deletedSecurityGroups: [],
      skipped: [],
    };

    const vpc = await this.guarded('describeVpc', vpcId, () => this.gateway.describeVpc(vpcId));
    if (vpc.tags[TAG_CREATED_BY] !== TOOL_TAG_VALUE) {
      this.logger.warn(`VPC ${vpcId} is not tagged ${TAG_CREATED_BY}=${TOOL_TAG_VALUE}; deleting it as requested`, {
        resourceType: 'vpc',
        resourceId: vpcId,
      });
    }

    await this.deleteNetworkInterfaces(vpcId, report);
    await this.deleteInternetGateways(vpcId, report);
    await this.deleteSubnets(vpcId, report);
    await this.deleteRouteTables(vpcId, report);
    await this.deleteSecurityGroups(vpcId, report);

    await this.guarded('deleteVpc', vpcId, () => this.gateway.deleteVpc(vpcId));
    this.deleted('vpc', vpcId);

    return report;
  }

  private async deleteNetworkInterfaces(vpcId: string, report: NetworkTeardownReport): Promise<void> {
    const interfaces = await this.guarded('listNetworkInterfaces', vpcId, () =>
      this.gateway.listNetworkInterfaces(vpcId)
    );
    for (const eni of interfaces) {
      const attachmentId = eni.attachmentId;
      if (attachmentId) {
        await this.guarded('detachNetworkInterface', eni.networkInterfaceId, () =>
          this.gateway.detachNetworkInterface(attachmentId, true)
        );
      }
      await this.guarded('deleteNetworkInterface', eni.networkInterfaceId, () =>
        this.gateway.deleteNetworkInterface(eni.networkInterfaceId)
      );
      report.deletedNetworkInterfaces.push(eni.networkInterfaceId);
      this.deleted('network-interface', eni.networkInterfaceId);
    }
  }

  private async deleteInternetGateways(vpcId: string, report: NetworkTeardownReport): Promise<void> {
    const gateways = await this.guarded('listInternetGateways', vpcId, () =>
      this.gateway.listInternetGateways(vpcId)
    );
    for (const igwId of gateways) {
      await this.guarded('detachInternetGateway', igwId, () => this.gateway.detachInternetGateway(igwId, vpcId));
      await this.guarded('deleteInternetGateway', igwId, () => this.gateway.deleteInternetGateway(igwId));
      report.deletedInternetGateways.push(igwId);
      this.deleted('internet-gateway', igwId);
    }
  }

  private async deleteSubnets(vpcId: string, report: NetworkTeardownReport): Promise<void> {
    const subnets = await this.guarded('listSubnets', vpcId, () => this.gateway.listSubnets(vpcId));
    for (const subnet of subnets) {
      await this.guarded('deleteSubnet', subnet.subnetId, () => this.gateway.deleteSubnet(subnet.subnetId));
      report.deletedSubnets.push(subnet.subnetId);
      this.deleted('subnet', subnet.subnetId);
    }
  }

  private async deleteRouteTables(vpcId: string, report: NetworkTeardownReport): Promise<void> {
    const tableIds = await this.guarded('listRouteTables', vpcId, () => this.gateway.listRouteTables(vpcId));
    for (const tableId of tableIds) {
      const table = await this.guarded('describeRouteTable', tableId, () => this.gateway.describeRouteTable(tableId));
      if (table.isMain) {
        report.skipped.push(tableId);
        this.logger.event('resource_skipped', `Skipping main route table ${tableId}`, {
          resourceType: 'route-table',
          resourceId: tableId,
        });
        continue;
      }
      await this.guarded('deleteRouteTable', tableId, () => this.gateway.deleteRouteTable(tableId));
      report.deletedRouteTables.push(tableId);
      this.deleted('route-table', tableId);
    }
  }

  private async deleteSecurityGroups(vpcId: string, report: NetworkTeardownReport): Promise<void> {
    const groups = await this.guarded('listSecurityGroups', vpcId, () => this.gateway.listSecurityGroups(vpcId));
    for (const { groupId } of groups) {
      const group = await this.guarded('describeSecurityGroup', groupId, () =>
        this.gateway.describeSecurityGroup(groupId)
      );
      if (group.groupName === DEFAULT_SECURITY_GROUP_NAME) {
        report.skipped.push(groupId);
        this.logger.event('resource_skipped', `Skipping default security group ${groupId}`, {
          resourceType: 'security-group',
          resourceId: groupId,
        });
        continue;
      }
      await this.guarded('deleteSecurityGroup', groupId, () => this.gateway.deleteSecurityGroup(groupId));
      report.deletedSecurityGroups.push(groupId);
      this.deleted('security-group', groupId);
    }
  }

  /**
   * Run one teardown call; any failure ends the teardown
   */
  private async guarded<T>(operation: string, resourceId: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw fromGatewayFailure('TEARDOWN', error, { operation, resourceId });
    }
  }

  private deleted(resourceType: string, resourceId: string): void {
    this.logger.event('resource_deleted', `Deleted ${resourceType} ${resourceId}`, { resourceType, resourceId });
  }
}
