/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for typed error handling
export type { Result, Ok, Err } from './result';
export { ok, err } from './result';

// Exit codes
export { ExitCode, getExitCodeDescription } from './exit-codes';

// Prompter interface
export type {
  Prompter,
  SelectChoice,
  ConfirmOptions,
  InputOptions,
  SelectOptions,
  MultiSelectOptions,
  PrompterError,
  PrompterErrorCode,
} from './prompter';
export { createPrompterError } from './prompter';

// Clock interface
export type { Clock } from './clock';
export { SystemClock, MockClock, formatDate } from './clock';

// Logger interface
export type {
  Logger,
  LogLevel,
  LogEventType,
  SandboxAction,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from './logger';
export {
  compareLogLevels,
  shouldLog,
  getEventLevel,
  DEFAULT_REDACT_PATTERNS,
  redactSecrets,
} from './logger';

// Cloud gateway interface
export type {
  CloudGateway,
  CloudGatewayErrorCode,
  ResourceTags,
  CallerIdentity,
  CreateRoleInput,
  CreateVpcInput,
  CreateSubnetInput,
  CreateRouteInput,
  CreateSecurityGroupInput,
  VpcSummary,
  SubnetSummary,
  RouteTableSummary,
  SecurityGroupSummary,
  NetworkInterfaceSummary,
  ClusterSpec,
  ClusterDescription,
  TaggedResourceRef,
} from './cloud-gateway';
export { CloudGatewayError, isCloudGatewayError } from './cloud-gateway';

// Effective config types
export type {
  EffectiveConfig,
  AwsConfig,
  ClusterConfig,
  TeardownConfig,
  WaitConfig,
  VerbosityConfig,
  InteractivityConfig,
  VersionOrdering,
  ConfigSource,
} from './effective-config';
export { DEFAULT_CONFIG, DEFAULT_REGION, summarizeConfigForLogging } from './effective-config';

// Progress tracking
export type { ProgressTracker } from './progress';
export { silentProgress } from './progress';
