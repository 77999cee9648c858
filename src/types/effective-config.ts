/**
 * EffectiveConfig type
 * Centralized configuration object passed through the system
 */

import { SandboxAction } from './logger';

/**
 * How the "latest" Kubernetes version is picked from the available list
 */
export type VersionOrdering = 'lexicographic' | 'numeric';

/**
 * AWS connection settings
 */
export interface AwsConfig {
  /** Region every call is issued against */
  region: string;
  /** Shared-credentials profile; the default chain is used when unset */
  profile?: string;
}

/**
 * Cluster creation settings
 * Values left undefined are asked for interactively.
 */
export interface ClusterConfig {
  /** Cluster name as typed by the operator, before the sandbox prefix */
  name?: string;
  /** Kubernetes version; defaults to the resolved latest version */
  kubernetesVersion?: string;
  /** Enable managed compute, storage and load balancing */
  autoMode: boolean;
  /** Install the core add-ons after the cluster is created */
  installAddons: boolean;
  /** Reuse an existing VPC instead of creating a new one */
  reuseNetwork: boolean;
  /** CIDR opened for all inbound traffic on a newly created security group */
  ingressCidr?: string;
  /** Ordering used to pick the latest version */
  versionOrdering: VersionOrdering;
}

/**
 * Cluster deletion settings
 */
export interface TeardownConfig {
  /** Name of the cluster to delete; asked for when undefined */
  clusterName?: string;
  /** Default answer for cascading the deletion to an isolated VPC */
  cascadeNetwork: boolean;
}

/**
 * Waiting on asynchronous cluster state changes
 */
export interface WaitConfig {
  /** Wait for the cluster to be active before add-ons and deleted before VPC teardown */
  enabled: boolean;
  /** Upper bound for each wait */
  timeoutSeconds: number;
}

export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  jsonOutput: boolean;
}

export interface InteractivityConfig {
  /** Whether interactive prompts are enabled */
  interactive: boolean;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'cli' | 'env' | 'user' | 'default';

/**
 * The complete effective configuration for a run
 */
export interface EffectiveConfig {
  schemaVersion: '1.0.0';

  /** Unique identifier for this run */
  runId: string;

  /** When the configuration was resolved (ISO 8601) */
  resolvedAt: string;

  /** Action to perform; asked for when null */
  action: SandboxAction | null;

  aws: AwsConfig;
  cluster: ClusterConfig;
  teardown: TeardownConfig;
  wait: WaitConfig;
  verbosity: VerbosityConfig;
  interactivity: InteractivityConfig;

  /** Run against the in-memory gateway instead of AWS */
  dryRun: boolean;

  /** Where each resolved value came from */
  sources: Partial<Record<string, ConfigSource>>;
}

export const DEFAULT_REGION = 'eu-west-2';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  aws: {
    region: DEFAULT_REGION,
  },
  cluster: {
    autoMode: true,
    installAddons: true,
    reuseNetwork: false,
    versionOrdering: 'lexicographic',
  },
  teardown: {
    cascadeNetwork: true,
  },
  wait: {
    enabled: true,
    timeoutSeconds: 1800,
  },
  verbosity: {
    verbose: false,
    debug: false,
    jsonOutput: false,
  },
  interactivity: {
    interactive: true,
  },
} as const satisfies {
  aws: AwsConfig;
  cluster: Omit<ClusterConfig, 'name' | 'kubernetesVersion' | 'ingressCidr'>;
  teardown: Omit<TeardownConfig, 'clusterName'>;
  wait: WaitConfig;
  verbosity: VerbosityConfig;
  interactivity: InteractivityConfig;
};

/**
 * Copy of the config safe to log (drops per-value source tracking)
 */
export function summarizeConfigForLogging(config: EffectiveConfig): Record<string, unknown> {
  return {
    runId: config.runId,
    action: config.action,
    region: config.aws.region,
    profile: config.aws.profile,
    cluster: { ...config.cluster },
    teardown: { ...config.teardown },
    wait: { ...config.wait },
    interactive: config.interactivity.interactive,
    dryRun: config.dryRun,
  };
}
