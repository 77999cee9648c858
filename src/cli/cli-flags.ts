/**
 * Bridge from parsed arguments to configuration flags
 */

import type { CliFlags } from '../config/resolve-config';
import type { ParsedArgs } from './types';

/**
 * Map parsed arguments onto config flags; unset arguments stay undefined
 */
export function toCliFlags(args: ParsedArgs): CliFlags {
  return {
    action: args.action ?? undefined,
    region: args.region ?? undefined,
    profile: args.profile ?? undefined,
    name: args.name ?? undefined,
    clusterName: args.cluster ?? undefined,
    kubernetesVersion: args.kubernetesVersion ?? undefined,
    autoMode: args.autoMode ?? undefined,
    installAddons: args.addons ?? undefined,
    reuseNetwork: args.reuseNetwork ?? undefined,
    cascadeNetwork: args.cascade ?? undefined,
    ingressCidr: args.allowIngress ?? undefined,
    numericVersions: args.numericVersions || undefined,
    wait: args.wait ?? undefined,
    dryRun: args.dryRun,
    noInteractive: args.noInteractive,
    verbose: args.verbose,
    debug: args.debug,
    jsonOutput: args.jsonOutput,
  };
}
