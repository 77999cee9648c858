/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > environment > user config > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import {
  EffectiveConfig,
  DEFAULT_CONFIG,
  ConfigSource,
  VersionOrdering,
} from '../types/effective-config';
import { SandboxAction } from '../types/logger';
import { Clock, SystemClock } from '../types/clock';
import { UserConfig } from '../schemas/user-config.schema';
import { parseUserConfig, validateEffectiveConfig } from '../schemas/validators';
import { SandboxError } from '../core/errors';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  action?: SandboxAction;
  region?: string;
  profile?: string;
  name?: string;
  clusterName?: string;
  kubernetesVersion?: string;
  autoMode?: boolean;
  installAddons?: boolean;
  reuseNetwork?: boolean;
  cascadeNetwork?: boolean;
  ingressCidr?: string;
  numericVersions?: boolean;
  wait?: boolean;
  dryRun?: boolean;
  noInteractive?: boolean;
  verbose?: boolean;
  debug?: boolean;
  jsonOutput?: boolean;
}

export interface ResolveConfigOptions {
  /** Environment variables (defaults to process.env) */
  env?: Record<string, string | undefined>;
  /** Home directory holding .config/eks-sandbox (defaults to os.homedir()) */
  homeDirectory?: string;
  /** Reads a file; returns null when it does not exist */
  readFile?: (path: string) => string | null;
  clock?: Clock;
}

/**
 * Path of the user config file under a home directory
 */
export function getUserConfigPath(homeDirectory: string): string {
  return join(homeDirectory, '.config', 'eks-sandbox', 'config.json');
}

function readFileIfExists(path: string): string | null {
  if (!existsSync(path)) {
    return null;
  }
  return readFileSync(path, 'utf-8');
}

/**
 * Load and validate the user config file.
 * A missing file is no config; an unreadable or invalid one is a configuration error.
 */
export function loadUserConfig(
  path: string,
  readFile: (path: string) => string | null = readFileIfExists
): UserConfig | null {
  let content: string | null;
  try {
    content = readFile(path);
  } catch (error) {
    throw new SandboxError('CONFIGURATION', `Cannot read config file ${path}: ${errorMessage(error)}`, {
      operation: 'loadUserConfig',
      cause: error,
    });
  }
  if (content === null) {
    return null;
  }

  const parsed = parseUserConfig(content);
  if (!parsed.success || !parsed.data) {
    throw new SandboxError(
      'CONFIGURATION',
      `Invalid config file ${path}: ${(parsed.errors ?? []).join('; ')}`,
      { operation: 'loadUserConfig' }
    );
  }
  return parsed.data;
}

/**
 * Generate a unique run ID from the resolution time
 */
export function generateRunId(now: Date): string {
  return now.toISOString().replace(/[:.]/g, '-').replace('T', '_').slice(0, 19);
}

/**
 * Resolve configuration from all sources with explicit precedence
 * CLI flags > environment > user config > defaults
 */
export function resolveConfig(cliFlags: CliFlags, options: ResolveConfigOptions = {}): EffectiveConfig {
  const env = options.env ?? process.env;
  const clock = options.clock ?? new SystemClock();
  const now = clock.now();

  const userConfigPath = getUserConfigPath(options.homeDirectory ?? homedir());
  const userConfig = loadUserConfig(userConfigPath, options.readFile);

  // Track sources for debugging
  const sources: Partial<Record<string, ConfigSource>> = {};

  function resolveValue<T>(key: string, cli: T | undefined, fromEnv: T | undefined, user: T | undefined, defaultVal: T): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (fromEnv !== undefined) {
      sources[key] = 'env';
      return fromEnv;
    }
    if (user !== undefined) {
      sources[key] = 'user';
      return user;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  // Empty variables count as unset
  const envRegion = nonEmpty(env.AWS_REGION) ?? nonEmpty(env.AWS_DEFAULT_REGION);
  const envProfile = nonEmpty(env.AWS_PROFILE);

  const versionOrdering = resolveValue<VersionOrdering>(
    'versionOrdering',
    cliFlags.numericVersions ? 'numeric' : undefined,
    undefined,
    userConfig?.versionOrdering,
    DEFAULT_CONFIG.cluster.versionOrdering
  );

  const config: EffectiveConfig = {
    schemaVersion: '1.0.0',
    runId: generateRunId(now),
    resolvedAt: now.toISOString(),
    action: cliFlags.action ?? null,

    aws: {
      region: resolveValue('region', cliFlags.region, envRegion, userConfig?.region, DEFAULT_CONFIG.aws.region),
      profile: resolveValue<string | undefined>('profile', cliFlags.profile, envProfile, userConfig?.profile, undefined),
    },

    cluster: {
      name: cliFlags.name,
      kubernetesVersion: resolveValue<string | undefined>(
        'kubernetesVersion',
        cliFlags.kubernetesVersion,
        undefined,
        userConfig?.kubernetesVersion,
        undefined
      ),
      autoMode: resolveValue(
        'autoMode',
        cliFlags.autoMode,
        undefined,
        userConfig?.autoMode,
        DEFAULT_CONFIG.cluster.autoMode
      ),
      installAddons: resolveValue(
        'installAddons',
        cliFlags.installAddons,
        undefined,
        userConfig?.installAddons,
        DEFAULT_CONFIG.cluster.installAddons
      ),
      reuseNetwork: resolveValue(
        'reuseNetwork',
        cliFlags.reuseNetwork,
        undefined,
        userConfig?.reuseNetwork,
        DEFAULT_CONFIG.cluster.reuseNetwork
      ),
      ingressCidr: resolveValue<string | undefined>(
        'ingressCidr',
        cliFlags.ingressCidr,
        undefined,
        userConfig?.ingressCidr,
        undefined
      ),
      versionOrdering,
    },

    teardown: {
      clusterName: cliFlags.clusterName,
      cascadeNetwork: resolveValue(
        'cascadeNetwork',
        cliFlags.cascadeNetwork,
        undefined,
        userConfig?.cascadeNetwork,
        DEFAULT_CONFIG.teardown.cascadeNetwork
      ),
    },

    wait: {
      enabled: resolveValue('wait', cliFlags.wait, undefined, userConfig?.waitForCluster, DEFAULT_CONFIG.wait.enabled),
      timeoutSeconds: resolveValue(
        'waitTimeoutSeconds',
        undefined,
        undefined,
        userConfig?.clusterWaitTimeoutSeconds,
        DEFAULT_CONFIG.wait.timeoutSeconds
      ),
    },

    verbosity: {
      verbose: cliFlags.verbose ?? DEFAULT_CONFIG.verbosity.verbose,
      debug: cliFlags.debug ?? DEFAULT_CONFIG.verbosity.debug,
      jsonOutput: cliFlags.jsonOutput ?? DEFAULT_CONFIG.verbosity.jsonOutput,
    },

    interactivity: {
      interactive: !(cliFlags.noInteractive ?? false),
    },

    dryRun: cliFlags.dryRun ?? false,

    sources,
  };

  // Flags are not schema-checked on parse; catch a bad --allow-ingress here
  const validation = validateEffectiveConfig(config);
  if (!validation.success) {
    throw new SandboxError('CONFIGURATION', `Invalid configuration: ${(validation.errors ?? []).join('; ')}`, {
      operation: 'resolveConfig',
    });
  }

  return config;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
