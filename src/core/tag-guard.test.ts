import { describe, it, expect, beforeEach } from 'vitest';
import { TagGuard } from './tag-guard';
import { MemoryCloudGateway } from '../gateway/memory-cloud-gateway';
import { BufferLogger } from '../logging/buffer-logger';

describe('TagGuard', () => {
  let gateway: MemoryCloudGateway;
  let logger: BufferLogger;
  let guard: TagGuard;

  beforeEach(() => {
    gateway = new MemoryCloudGateway();
    logger = new BufferLogger();
    guard = new TagGuard(gateway, logger);
  });

  describe('isCreatedByTool', () => {
    it('should be true for a cluster carrying the provenance tag', async () => {
      gateway.seedCluster({ name: 'Sandbox-demo', tags: { CreatedBy: 'EKS-Sandbox-Tool' } });

      await expect(guard.isCreatedByTool({ kind: 'cluster', name: 'Sandbox-demo' })).resolves.toBe(true);
    });

    it('should be false when the tag is missing', async () => {
      gateway.seedCluster({ name: 'external', tags: {} });

      await expect(guard.isCreatedByTool({ kind: 'cluster', name: 'external' })).resolves.toBe(false);
    });

    it('should be false when the tag has another value', async () => {
      gateway.seedCluster({ name: 'other', tags: { CreatedBy: 'someone-else' } });

      await expect(guard.isCreatedByTool({ kind: 'cluster', name: 'other' })).resolves.toBe(false);
    });

    it('should check EC2 resources through their tags', async () => {
      const vpcId = await gateway.createVpc({ cidrBlock: '10.0.0.0/16', tags: { CreatedBy: 'EKS-Sandbox-Tool' } });

      await expect(guard.isCreatedByTool({ kind: 'ec2', id: vpcId })).resolves.toBe(true);
    });
  });

  describe('isIsolatedHosting', () => {
    it('should be true only for HostingVPC=isolated', async () => {
      gateway.seedCluster({ name: 'isolated', tags: { HostingVPC: 'isolated' } });
      gateway.seedCluster({ name: 'shared', tags: { HostingVPC: 'shared' } });

      await expect(guard.isIsolatedHosting({ kind: 'cluster', name: 'isolated' })).resolves.toBe(true);
      await expect(guard.isIsolatedHosting({ kind: 'cluster', name: 'shared' })).resolves.toBe(false);
    });
  });

  describe('getTagValue', () => {
    it('should return the tag value', async () => {
      gateway.seedCluster({ name: 'Sandbox-demo', tags: { VpcId: 'vpc-00000007' } });

      await expect(guard.getTagValue({ kind: 'cluster', name: 'Sandbox-demo' }, 'VpcId')).resolves.toBe(
        'vpc-00000007'
      );
    });

    it('should return undefined for a missing tag', async () => {
      gateway.seedCluster({ name: 'Sandbox-demo', tags: {} });

      await expect(guard.getTagValue({ kind: 'cluster', name: 'Sandbox-demo' }, 'VpcId')).resolves.toBeUndefined();
    });
  });

  it('should only read tags', async () => {
    gateway.seedCluster({ name: 'Sandbox-demo', tags: { CreatedBy: 'EKS-Sandbox-Tool' } });

    await guard.isCreatedByTool({ kind: 'cluster', name: 'Sandbox-demo' });
    await guard.isIsolatedHosting({ kind: 'cluster', name: 'Sandbox-demo' });

    expect(gateway.getOperations()).toEqual(['getTags', 'getTags']);
  });

  it('should log each check', async () => {
    gateway.seedCluster({ name: 'Sandbox-demo', tags: { CreatedBy: 'EKS-Sandbox-Tool' } });

    await guard.isCreatedByTool({ kind: 'cluster', name: 'Sandbox-demo' });

    const [event] = logger.getEventsByType('guard_checked');
    expect(event.message).toBe('Tag CreatedBy=EKS-Sandbox-Tool present on cluster Sandbox-demo');
    expect(event.metadata).toMatchObject({ resourceType: 'cluster', resourceId: 'Sandbox-demo', matched: true });
  });

  it('should propagate gateway failures', async () => {
    await expect(guard.isCreatedByTool({ kind: 'cluster', name: 'absent' })).rejects.toMatchObject({
      code: 'NOT_FOUND',
    });
  });
});
