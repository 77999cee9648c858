import { describe, it, expect } from 'vitest';
import { toCliFlags } from './cli-flags';
import { parseArgs } from './arg-parser';
import { DEFAULT_ARGS } from './types';

describe('toCliFlags', () => {
  it('should leave unset arguments undefined', () => {
    expect(toCliFlags(DEFAULT_ARGS)).toEqual({
      action: undefined,
      region: undefined,
      profile: undefined,
      name: undefined,
      clusterName: undefined,
      kubernetesVersion: undefined,
      autoMode: undefined,
      installAddons: undefined,
      reuseNetwork: undefined,
      cascadeNetwork: undefined,
      ingressCidr: undefined,
      numericVersions: undefined,
      wait: undefined,
      dryRun: false,
      noInteractive: false,
      verbose: false,
      debug: false,
      jsonOutput: false,
    });
  });

  it('should carry explicit switches, including the negative ones', () => {
    const parsed = parseArgs([
      'node',
      'eks-sandbox',
      'delete',
      '--cluster',
      'Sandbox-demo',
      '--no-cascade',
      '--no-wait',
      '--no-addons',
      '--new-network',
      '--numeric-versions',
    ]);
    if (!parsed.args) throw new Error(parsed.error);

    expect(toCliFlags(parsed.args)).toMatchObject({
      action: 'delete',
      clusterName: 'Sandbox-demo',
      cascadeNetwork: false,
      wait: false,
      installAddons: false,
      reuseNetwork: false,
      numericVersions: true,
    });
  });
});
