import { describe, it, expect, beforeEach } from 'vitest';
import {
  executeDeleteCluster,
  SELECT_CLUSTER_QUESTION,
  FOREIGN_CLUSTER_QUESTION,
  cascadeQuestion,
} from './delete-cluster';
import { CommandContext, REGION_QUESTION } from './command-context';
import { resolveConfig, CliFlags } from '../config/resolve-config';
import { Provisioner } from '../core/provisioner';
import { MemoryCloudGateway } from '../gateway/memory-cloud-gateway';
import { BufferLogger } from '../logging/buffer-logger';
import { MockClock } from '../types/clock';
import { silentProgress } from '../types/progress';
import { ScriptedPrompter, ScriptEntry } from '../../tests/utils/scripted-prompter';

describe('executeDeleteCluster', () => {
  let gateway: MemoryCloudGateway;
  let logger: BufferLogger;
  let clock: MockClock;

  beforeEach(() => {
    gateway = new MemoryCloudGateway();
    logger = new BufferLogger();
    clock = new MockClock();
  });

  function context(flags: CliFlags, script: ScriptEntry[] = []): { ctx: CommandContext; prompter: ScriptedPrompter } {
    const prompter = new ScriptedPrompter(script);
    const config = resolveConfig(flags, { env: {}, homeDirectory: '/home/tester', readFile: () => null, clock });
    return { ctx: { config, connect: () => gateway, logger, clock, prompter, progress: silentProgress }, prompter };
  }

  async function provisionSandbox(): Promise<string> {
    const result = await new Provisioner({
      gateway,
      logger: new BufferLogger(),
      clock,
      wait: { enabled: true, timeoutSeconds: 600 },
    }).provision({
      clusterName: 'Sandbox-demo',
      kubernetesVersion: '1.31',
      autoMode: true,
      installAddons: false,
      network: { mode: 'create' },
    });
    gateway.clearCalls();
    return result.network.vpcId;
  }

  it('should report an empty region without choosing a cluster', async () => {
    const { ctx, prompter } = context({});

    const result = await executeDeleteCluster(ctx);

    expect(result).toBeNull();
    expect(prompter.asked).toEqual([REGION_QUESTION]);
    expect(logger.getEventsByLevel('info').map((e) => e.message)).toEqual(['No clusters found']);
    expect(gateway.getOperations()).toEqual(['listClusters']);
  });

  it('should delete the selected sandbox and its VPC', async () => {
    const vpcId = await provisionSandbox();
    const { ctx, prompter } = context({}, [{ question: SELECT_CLUSTER_QUESTION, answer: 'Sandbox-demo' }]);

    const result = await executeDeleteCluster(ctx);

    expect(prompter.asked).toEqual([REGION_QUESTION, SELECT_CLUSTER_QUESTION, cascadeQuestion('Sandbox-demo', vpcId)]);
    expect(result).toMatchObject({ outcome: 'deleted', networkDeleted: true, vpcId });
    expect(gateway.hasCluster('Sandbox-demo')).toBe(false);
    expect(gateway.hasVpc(vpcId)).toBe(false);
  });

  it('should keep the VPC when the operator declines the cascade', async () => {
    const vpcId = await provisionSandbox();
    const { ctx } = context({ clusterName: 'Sandbox-demo' }, [
      { question: cascadeQuestion('Sandbox-demo', vpcId), answer: false },
    ]);

    const result = await executeDeleteCluster(ctx);

    expect(result).toMatchObject({ outcome: 'deleted', networkDeleted: false });
    expect(gateway.hasVpc(vpcId)).toBe(true);
  });

  it('should take the cascade choice from the flag without asking', async () => {
    const vpcId = await provisionSandbox();
    const { ctx, prompter } = context({ region: 'eu-west-2', clusterName: 'Sandbox-demo', cascadeNetwork: false });

    await executeDeleteCluster(ctx);

    expect(prompter.asked).toEqual([]);
    expect(gateway.hasVpc(vpcId)).toBe(true);
    expect(gateway.getClusterStatus('Sandbox-demo')).toBe('DELETING');
  });

  it('should reject a named cluster that does not exist', async () => {
    await provisionSandbox();
    const { ctx } = context({ clusterName: 'Sandbox-missing' });

    await expect(executeDeleteCluster(ctx)).rejects.toMatchObject({
      code: 'CONFIGURATION',
      message: 'Cluster Sandbox-missing was not found in eu-west-2',
    });
    expect(gateway.getOperations()).toEqual(['listClusters']);
  });

  it('should default the danger confirmation to no', async () => {
    gateway.seedCluster({ name: 'production' });
    const { ctx, prompter } = context({ clusterName: 'production' });

    const result = await executeDeleteCluster(ctx);

    expect(prompter.asked).toEqual([REGION_QUESTION, FOREIGN_CLUSTER_QUESTION]);
    expect(result).toMatchObject({ outcome: 'aborted', createdByTool: false });
    expect(gateway.getClusterStatus('production')).toBe('ACTIVE');
    expect(gateway.getOperations()).not.toContain('deleteCluster');
  });

  it('should delete a foreign cluster once the operator confirms', async () => {
    gateway.seedCluster({ name: 'production' });
    const { ctx } = context({ clusterName: 'production' }, [{ question: FOREIGN_CLUSTER_QUESTION, answer: true }]);

    const result = await executeDeleteCluster(ctx);

    expect(result).toMatchObject({ outcome: 'deleted', createdByTool: false });
    expect(gateway.getClusterStatus('production')).toBe('DELETING');
  });

  it('should list clusters in the region the operator types', async () => {
    const prompter = new ScriptedPrompter([{ question: REGION_QUESTION, answer: 'ap-south-1' }]);
    const config = resolveConfig({}, { env: {}, homeDirectory: '/home/tester', readFile: () => null, clock });
    const regions: string[] = [];
    const connect = (region: string): MemoryCloudGateway => {
      regions.push(region);
      return new MemoryCloudGateway({ region });
    };

    const result = await executeDeleteCluster({ config, connect, logger, clock, prompter, progress: silentProgress });

    expect(result).toBeNull();
    expect(prompter.asked).toEqual([REGION_QUESTION]);
    expect(regions).toEqual(['ap-south-1']);
    expect(gateway.getOperations()).toEqual([]);
  });

  it('should wrap a failed listing as a teardown error', async () => {
    gateway.failOn('listClusters', 'REQUEST_FAILED');
    const { ctx } = context({});

    await expect(executeDeleteCluster(ctx)).rejects.toMatchObject({ code: 'TEARDOWN', operation: 'listClusters' });
  });
});
