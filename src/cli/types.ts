/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

import type { SandboxAction } from '../types/logger';

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Positional action; asked for interactively when null */
  action: SandboxAction | null;

  /** AWS region */
  region: string | null;

  /** Shared-credentials profile */
  profile: string | null;

  /** Cluster name for create, before the sandbox prefix */
  name: string | null;

  /** Cluster to delete */
  cluster: string | null;

  /** Kubernetes version for create */
  kubernetesVersion: string | null;

  /** --auto-mode / --no-auto-mode; null when neither was given */
  autoMode: boolean | null;

  /** --addons / --no-addons */
  addons: boolean | null;

  /** --reuse-network (true) / --new-network (false) */
  reuseNetwork: boolean | null;

  /** --cascade / --no-cascade */
  cascade: boolean | null;

  /** CIDR opened on the new security group */
  allowIngress: string | null;

  /** Pick the latest version by numeric comparison */
  numericVersions: boolean;

  /** --no-wait sets this to false */
  wait: boolean | null;

  /** Run against the in-memory gateway */
  dryRun: boolean;

  /** Disable interactive prompts; use defaults or fail */
  noInteractive: boolean;

  /** Enable verbose output with more progress details */
  verbose: boolean;

  /** Enable debug mode with full diagnostics */
  debug: boolean;

  /** JSON log lines and a JSON run summary */
  jsonOutput: boolean;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  action: null,
  region: null,
  profile: null,
  name: null,
  cluster: null,
  kubernetesVersion: null,
  autoMode: null,
  addons: null,
  reuseNetwork: null,
  cascade: null,
  allowIngress: null,
  numericVersions: false,
  wait: null,
  dryRun: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  jsonOutput: false,
  help: false,
  version: false,
};

/** Result of parsing arguments */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
