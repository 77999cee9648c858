/**
 * Core module - sandbox lifecycle logic
 * Talks to AWS only through the CloudGateway interface
 * and must not import from ui/ or prompt directly.
 */

// Constants and naming
export {
  TAG_CREATED_BY,
  TOOL_TAG_VALUE,
  TAG_HOSTING_VPC,
  ISOLATED_HOSTING_VALUE,
  TAG_VPC_ID,
  TAG_NAME,
  CLUSTER_NAME_PREFIX,
  CLUSTER_ROLE_NAME,
  CORE_ADDONS,
  buildRoleArn,
  toSandboxClusterName,
} from './constants';

// Errors
export type { SandboxErrorCode, SandboxErrorOptions } from './errors';
export {
  SandboxError,
  isSandboxError,
  fromGatewayFailure,
  fromPrompterError,
  getExitCodeForError,
} from './errors';

// Tag guard
export { TagGuard, describeResource } from './tag-guard';

// Version resolver
export { compareVersionsNumerically, resolveLatestVersion, fetchLatestVersion } from './version-resolver';

// Provisioner
export type {
  NetworkSelector,
  NetworkPlan,
  ProvisionRequest,
  ProvisionedNetwork,
  CreatedResource,
  ProvisionResult,
  ProvisionerDependencies,
} from './provisioner';
export { Provisioner, validateSubnetSelection, validateSecurityGroupSelection } from './provisioner';

// Deprovisioner
export type { NetworkTeardownReport, NetworkTeardownDependencies } from './network-teardown';
export { NetworkTeardown } from './network-teardown';
export type { TeardownDecisions, DeprovisionResult, DeprovisionerDependencies } from './deprovisioner';
export { Deprovisioner } from './deprovisioner';
