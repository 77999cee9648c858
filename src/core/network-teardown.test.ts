import { describe, it, expect, beforeEach } from 'vitest';
import { NetworkTeardown } from './network-teardown';
import { MemoryCloudGateway } from '../gateway/memory-cloud-gateway';
import { BufferLogger } from '../logging/buffer-logger';
import { SandboxError } from './errors';

interface SandboxNetwork {
  vpcId: string;
  subnetIds: string[];
  igwId: string;
  routeTableId: string;
  groupId: string;
}

const TOOL_TAGS = { CreatedBy: 'EKS-Sandbox-Tool' };

async function buildNetwork(gateway: MemoryCloudGateway, tags = TOOL_TAGS): Promise<SandboxNetwork> {
  const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags });
  const subnetIds = [
    await gateway.createSubnet({ vpcId, cidrBlock: '10.0.1.0/24', availabilityZone: 'eu-west-2a', tags }),
    await gateway.createSubnet({ vpcId, cidrBlock: '10.0.2.0/24', availabilityZone: 'eu-west-2b', tags }),
  ];
  const igwId = await gateway.createInternetGateway(tags);
  await gateway.attachInternetGateway(igwId, vpcId);
  const routeTableId = await gateway.createRouteTable(vpcId, tags);
  await gateway.createRoute({ routeTableId, destinationCidrBlock: '0.0.0.0/0', gatewayId: igwId });
  for (const subnetId of subnetIds) {
    await gateway.associateRouteTable(routeTableId, subnetId);
  }
  const groupId = await gateway.createSecurityGroup({
    vpcId,
    groupName: 'EKS-SG',
    description: 'EKS Security Group',
    tags,
  });
  gateway.clearCalls();
  return { vpcId, subnetIds, igwId, routeTableId, groupId };
}

describe('NetworkTeardown', () => {
  let gateway: MemoryCloudGateway;
  let logger: BufferLogger;
  let teardown: NetworkTeardown;

  beforeEach(() => {
    gateway = new MemoryCloudGateway();
    logger = new BufferLogger();
    teardown = new NetworkTeardown({ gateway, logger });
  });

  it('should delete every resource in the VPC', async () => {
    const network = await buildNetwork(gateway);

    await teardown.teardown(network.vpcId);

    expect(gateway.hasVpc(network.vpcId)).toBe(false);
    expect(gateway.countResources()).toBe(0);
  });

  it('should follow the dependency order', async () => {
    const network = await buildNetwork(gateway);
    gateway.seedNetworkInterface({ vpcId: network.vpcId, subnetId: network.subnetIds[0], attached: true });

    await teardown.teardown(network.vpcId);

    expect(gateway.getOperations()).toEqual([
      'describeVpc',
      'listNetworkInterfaces',
      'detachNetworkInterface',
      'deleteNetworkInterface',
      'listInternetGateways',
      'detachInternetGateway',
      'deleteInternetGateway',
      'listSubnets',
      'deleteSubnet',
      'deleteSubnet',
      'listRouteTables',
      'describeRouteTable',
      'describeRouteTable',
      'deleteRouteTable',
      'listSecurityGroups',
      'describeSecurityGroup',
      'describeSecurityGroup',
      'deleteSecurityGroup',
      'deleteVpc',
    ]);
  });

  it('should remove every network interface before any subnet or gateway deletion', async () => {
    const network = await buildNetwork(gateway);
    gateway.seedNetworkInterface({ vpcId: network.vpcId, subnetId: network.subnetIds[0], attached: true });
    gateway.seedNetworkInterface({ vpcId: network.vpcId, subnetId: network.subnetIds[1], attached: false });

    await teardown.teardown(network.vpcId);

    const operations = gateway.getOperations();
    const lastInterfaceCall = Math.max(
      operations.lastIndexOf('detachNetworkInterface'),
      operations.lastIndexOf('deleteNetworkInterface')
    );
    const firstDependentDelete = Math.min(
      operations.indexOf('deleteSubnet'),
      operations.indexOf('deleteInternetGateway')
    );
    expect(lastInterfaceCall).toBeLessThan(firstDependentDelete);
  });

  it('should only detach interfaces that are attached', async () => {
    const network = await buildNetwork(gateway);
    gateway.seedNetworkInterface({ vpcId: network.vpcId, attached: false });

    const report = await teardown.teardown(network.vpcId);

    expect(gateway.getOperations()).not.toContain('detachNetworkInterface');
    expect(report.deletedNetworkInterfaces).toHaveLength(1);
  });

  it('should never delete the main route table or the default security group', async () => {
    const network = await buildNetwork(gateway);
    const [mainTableId] = await gateway.listRouteTables(network.vpcId);
    const defaultGroup = (await gateway.listSecurityGroups(network.vpcId)).find((g) => g.groupName === 'default');
    gateway.clearCalls();

    const report = await teardown.teardown(network.vpcId);

    const deleteTargets = gateway
      .getCalls()
      .filter((call) => call.operation === 'deleteRouteTable' || call.operation === 'deleteSecurityGroup')
      .map((call) => call.target);
    expect(deleteTargets).toEqual([network.routeTableId, network.groupId]);
    expect(report.skipped).toEqual([mainTableId, defaultGroup?.groupId]);
    expect(logger.getMessages('resource_skipped')).toEqual([
      `Skipping main route table ${mainTableId}`,
      `Skipping default security group ${defaultGroup?.groupId}`,
    ]);
  });

  it('should return a report of deleted resources', async () => {
    const network = await buildNetwork(gateway);

    const report = await teardown.teardown(network.vpcId);

    expect(report).toMatchObject({
      vpcId: network.vpcId,
      deletedNetworkInterfaces: [],
      deletedInternetGateways: [network.igwId],
      deletedSubnets: network.subnetIds,
      deletedRouteTables: [network.routeTableId],
      deletedSecurityGroups: [network.groupId],
    });
  });

  it('should fail with a teardown error when the VPC does not exist', async () => {
    const error = await teardown.teardown('vpc-missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SandboxError);
    expect(error).toMatchObject({ code: 'TEARDOWN', operation: 'describeVpc', resourceId: 'vpc-missing' });
    expect(gateway.getOperations()).toEqual(['describeVpc']);
  });

  it('should warn when the VPC lacks the provenance tag', async () => {
    const network = await buildNetwork(gateway, { CreatedBy: 'someone-else' });

    await teardown.teardown(network.vpcId);

    const warnings = logger.getEventsByLevel('warn').map((e) => e.message);
    expect(warnings).toEqual([
      `VPC ${network.vpcId} is not tagged CreatedBy=EKS-Sandbox-Tool; deleting it as requested`,
    ]);
  });

  it('should abort the remaining steps on the first failure', async () => {
    const network = await buildNetwork(gateway);
    gateway.failOn('deleteSubnet', 'DEPENDENCY_VIOLATION', { target: network.subnetIds[1] });

    await expect(teardown.teardown(network.vpcId)).rejects.toMatchObject({
      code: 'TEARDOWN',
      operation: 'deleteSubnet',
      resourceId: network.subnetIds[1],
    });

    const operations = gateway.getOperations();
    expect(operations[operations.length - 1]).toBe('deleteSubnet');
    expect(operations).not.toContain('listRouteTables');
    expect(gateway.hasVpc(network.vpcId)).toBe(true);
  });

  it('should tag delete events with the teardown step', async () => {
    const network = await buildNetwork(gateway);

    await teardown.teardown(network.vpcId);

    const deletions = logger.getEventsByType('resource_deleted');
    expect(deletions.map((e) => e.metadata.resourceType)).toEqual([
      'internet-gateway',
      'subnet',
      'subnet',
      'route-table',
      'security-group',
      'vpc',
    ]);
    expect(deletions.every((e) => e.metadata.step === 'teardown')).toBe(true);
  });
});
