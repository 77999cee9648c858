import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCloudGateway } from './memory-cloud-gateway';
import { CloudGatewayError } from '../types/cloud-gateway';

describe('MemoryCloudGateway', () => {
  let gateway: MemoryCloudGateway;

  beforeEach(() => {
    gateway = new MemoryCloudGateway();
  });

  describe('createVpc', () => {
    it('should assign sequential ids per resource kind', async () => {
      const first = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const second = await gateway.createVpc({ cidrBlock: '10.1.0.0/16', tags: {} });

      expect(first).toBe('vpc-00000001');
      expect(second).toBe('vpc-00000002');
    });

    it('should add a main route table and a default security group', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });

      const tables = await gateway.listRouteTables(vpcId);
      const groups = await gateway.listSecurityGroups(vpcId);

      expect(tables).toEqual(['rtb-00000001']);
      await expect(gateway.describeRouteTable('rtb-00000001')).resolves.toMatchObject({ isMain: true });
      expect(groups).toEqual([{ groupId: 'sg-00000001', groupName: 'default', vpcId }]);
    });
  });

  describe('deleteVpc', () => {
    it('should refuse while subnets remain', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      await gateway.createSubnet({ vpcId, cidrBlock: '10.0.1.0/24', availabilityZone: 'eu-west-2a', tags: {} });

      await expect(gateway.deleteVpc(vpcId)).rejects.toMatchObject({
        code: 'DEPENDENCY_VIOLATION',
        operation: 'deleteVpc',
        resourceId: vpcId,
      });
    });

    it('should remove the main route table and default group with the VPC', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });

      await gateway.deleteVpc(vpcId);

      expect(gateway.hasVpc(vpcId)).toBe(false);
      expect(gateway.countResources()).toBe(0);
    });
  });

  describe('dependency rules', () => {
    it('should refuse to delete an attached internet gateway', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const igwId = await gateway.createInternetGateway({});
      await gateway.attachInternetGateway(igwId, vpcId);

      await expect(gateway.deleteInternetGateway(igwId)).rejects.toMatchObject({ code: 'DEPENDENCY_VIOLATION' });

      await gateway.detachInternetGateway(igwId, vpcId);
      await gateway.deleteInternetGateway(igwId);
      expect(await gateway.listInternetGateways(vpcId)).toEqual([]);
    });

    it('should refuse to delete a subnet with network interfaces', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const subnetId = await gateway.createSubnet({
        vpcId,
        cidrBlock: '10.0.1.0/24',
        availabilityZone: 'eu-west-2a',
        tags: {},
      });
      gateway.seedNetworkInterface({ vpcId, subnetId });

      await expect(gateway.deleteSubnet(subnetId)).rejects.toMatchObject({ code: 'DEPENDENCY_VIOLATION' });
    });

    it('should refuse to delete an attached network interface', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const eniId = gateway.seedNetworkInterface({ vpcId, attached: true });
      const [summary] = await gateway.listNetworkInterfaces(vpcId);

      await expect(gateway.deleteNetworkInterface(eniId)).rejects.toMatchObject({ code: 'REQUEST_FAILED' });

      await gateway.detachNetworkInterface(summary.attachmentId ?? '', true);
      await gateway.deleteNetworkInterface(eniId);
      expect(await gateway.listNetworkInterfaces(vpcId)).toEqual([]);
    });

    it('should refuse to delete the main route table', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const [mainTableId] = await gateway.listRouteTables(vpcId);

      await expect(gateway.deleteRouteTable(mainTableId)).rejects.toMatchObject({ code: 'DEPENDENCY_VIOLATION' });
    });

    it('should drop route table associations when the subnet is deleted', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const subnetId = await gateway.createSubnet({
        vpcId,
        cidrBlock: '10.0.1.0/24',
        availabilityZone: 'eu-west-2a',
        tags: {},
      });
      const tableId = await gateway.createRouteTable(vpcId, {});
      await gateway.associateRouteTable(tableId, subnetId);

      await gateway.deleteSubnet(subnetId);

      await expect(gateway.describeRouteTable(tableId)).resolves.toMatchObject({ associatedSubnetIds: [] });
      await gateway.deleteRouteTable(tableId);
    });

    it('should refuse to delete the default security group', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const [defaultGroup] = await gateway.listSecurityGroups(vpcId);

      await expect(gateway.deleteSecurityGroup(defaultGroup.groupId)).rejects.toBeInstanceOf(CloudGatewayError);
    });

    it('should reject a duplicate security group name in the same VPC', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const input = { vpcId, groupName: 'EKS-SG', description: 'EKS Security Group', tags: {} };
      await gateway.createSecurityGroup(input);

      await expect(gateway.createSecurityGroup(input)).rejects.toMatchObject({ code: 'ALREADY_EXISTS' });
    });
  });

  describe('roles', () => {
    it('should reject a role that already exists', async () => {
      gateway.seedRole('EKSClusterRole');

      await expect(
        gateway.createRole({ roleName: 'EKSClusterRole', assumeRolePolicyDocument: '{}' })
      ).rejects.toMatchObject({ code: 'ALREADY_EXISTS', resourceId: 'EKSClusterRole' });
    });

    it('should fail to attach a policy to a missing role', async () => {
      await expect(gateway.attachRolePolicy('missing', 'arn:aws:iam::aws:policy/Example')).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });
  });

  describe('clusters', () => {
    async function createCluster(): Promise<void> {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      const subnetId = await gateway.createSubnet({
        vpcId,
        cidrBlock: '10.0.1.0/24',
        availabilityZone: 'eu-west-2a',
        tags: {},
      });
      gateway.seedRole('EKSClusterRole');
      await gateway.createCluster({
        name: 'Sandbox-demo',
        version: '1.31',
        roleArn: 'arn:aws:iam::123456789012:role/EKSClusterRole',
        subnetIds: [subnetId],
        securityGroupIds: [],
        tags: { CreatedBy: 'EKS-Sandbox-Tool' },
        autoMode: true,
      });
    }

    it('should start clusters in CREATING state', async () => {
      await createCluster();

      await expect(gateway.describeCluster('Sandbox-demo')).resolves.toEqual({
        name: 'Sandbox-demo',
        version: '1.31',
        status: 'CREATING',
        tags: { CreatedBy: 'EKS-Sandbox-Tool' },
      });
    });

    it('should reject add-ons until the cluster is active', async () => {
      await createCluster();

      await expect(gateway.createAddon('Sandbox-demo', 'coredns')).rejects.toMatchObject({ code: 'REQUEST_FAILED' });

      await gateway.waitForClusterActive('Sandbox-demo', 60);
      await gateway.createAddon('Sandbox-demo', 'coredns');
      expect(gateway.getAddons('Sandbox-demo')).toEqual(['coredns']);
    });

    it('should remove a deleted cluster once the wait completes', async () => {
      await createCluster();

      await gateway.deleteCluster('Sandbox-demo');
      expect(gateway.getClusterStatus('Sandbox-demo')).toBe('DELETING');

      await gateway.waitForClusterDeleted('Sandbox-demo', 60);
      expect(gateway.hasCluster('Sandbox-demo')).toBe(false);
    });

    it('should report a missing cluster as NOT_FOUND', async () => {
      await expect(gateway.describeCluster('absent')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        resourceId: 'absent',
      });
    });

    it('should hand out a copy of the cluster spec', async () => {
      await createCluster();

      const spec = gateway.getClusterSpec('Sandbox-demo');
      if (!spec) throw new Error('cluster missing');
      spec.tags.HostingVPC = 'Isolated';
      spec.subnetIds.push('subnet-extra');

      expect(gateway.getClusterSpec('Sandbox-demo')?.tags).toEqual({ CreatedBy: 'EKS-Sandbox-Tool' });
      await expect(gateway.getTags({ kind: 'cluster', name: 'Sandbox-demo' })).resolves.toEqual({
        CreatedBy: 'EKS-Sandbox-Tool',
      });
      expect(gateway.getClusterSpec('Sandbox-demo')?.subnetIds).toHaveLength(1);
    });

    it('should return cluster tags through getTags', async () => {
      gateway.seedCluster({ name: 'external', tags: { team: 'data' } });

      await expect(gateway.getTags({ kind: 'cluster', name: 'external' })).resolves.toEqual({ team: 'data' });
    });
  });

  describe('getTags', () => {
    it('should return an empty set for unknown EC2 ids', async () => {
      await expect(gateway.getTags({ kind: 'ec2', id: 'vpc-unknown' })).resolves.toEqual({});
    });
  });

  describe('failure injection', () => {
    it('should fail every call to the operation until cleared', async () => {
      gateway.failOn('listVpcs');

      await expect(gateway.listVpcs()).rejects.toMatchObject({ code: 'REQUEST_FAILED', operation: 'listVpcs' });
      await expect(gateway.listVpcs()).rejects.toMatchObject({ code: 'REQUEST_FAILED' });

      gateway.clearFailures();
      await expect(gateway.listVpcs()).resolves.toEqual([]);
    });

    it('should fail a targeted call once', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      gateway.failOn('describeVpc', 'NOT_FOUND', { target: vpcId });

      await expect(gateway.describeVpc(vpcId)).rejects.toMatchObject({ code: 'NOT_FOUND', resourceId: vpcId });
      await expect(gateway.describeVpc(vpcId)).resolves.toMatchObject({ vpcId });
    });
  });

  describe('call recording', () => {
    it('should record operations and targets in order', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: {} });
      await gateway.listSubnets(vpcId);

      expect(gateway.getCalls()).toEqual([
        { operation: 'createVpc' },
        { operation: 'listSubnets', target: vpcId },
      ]);
    });

    it('should record failed calls too', async () => {
      await gateway.deleteVpc('vpc-missing').catch(() => undefined);

      expect(gateway.getOperations()).toEqual(['deleteVpc']);
    });
  });
});
