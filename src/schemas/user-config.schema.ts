/**
 * Schema for the user config file
 * Read from ~/.config/eks-sandbox/config.json; every key is optional
 */

import type { VersionOrdering } from '../types/effective-config';

export interface UserConfig {
  /** AWS region */
  region?: string;

  /** Shared-credentials profile */
  profile?: string;

  /**
   * Kubernetes version for new clusters; the latest available version when unset
   */
  kubernetesVersion?: string;

  autoMode?: boolean;

  installAddons?: boolean;

  /** Reuse an existing VPC by default */
  reuseNetwork?: boolean;

  /** Default answer when asked whether to delete an isolated VPC with its cluster */
  cascadeNetwork?: boolean;

  /** CIDR opened on new security groups */
  ingressCidr?: string;

  versionOrdering?: VersionOrdering;

  /** Wait for cluster state changes before add-ons and VPC teardown */
  waitForCluster?: boolean;

  clusterWaitTimeoutSeconds?: number;
}

/**
 * Example of a valid user config
 */
export const exampleUserConfig: UserConfig = {
  region: 'eu-west-1',
  profile: 'sandbox',
  autoMode: true,
  installAddons: true,
  reuseNetwork: false,
  cascadeNetwork: true,
  versionOrdering: 'numeric',
  waitForCluster: true,
  clusterWaitTimeoutSeconds: 1200,
};
