/**
 * Sandbox Factory
 * Creates command contexts with real or in-memory dependencies
 */

import { CloudGateway, Clock, EffectiveConfig, Logger, LogLevel, ProgressTracker, Prompter, SystemClock } from '../types';
import { silentProgress } from '../types/progress';
import { MockClock } from '../types/clock';
import { AwsCloudGateway } from '../gateway/aws-cloud-gateway';
import { MemoryCloudGateway } from '../gateway/memory-cloud-gateway';
import { createConsoleLogger } from '../logging/console-logger';
import { createBufferLogger, BufferLogger } from '../logging/buffer-logger';
import { createInquirerPrompter } from '../ui/inquirer-prompter';
import { createSpinnerService } from '../ui/spinner-service';
import { CommandContext } from '../commands/command-context';

/**
 * Everything a command needs besides the configuration
 */
export interface SandboxDependencies {
  /** Open the gateway once the run's region is known */
  connect(region: string): CloudGateway;
  logger: Logger;
  prompter: Prompter;
  progress: ProgressTracker;
  clock: Clock;
}

/**
 * Options for creating real dependencies
 */
export interface SandboxFactoryOptions {
  /** Whether stdout is a terminal; prompts and spinners need one */
  isTTY?: boolean;
  /** Stream the spinners write to (default: process.stderr) */
  stream?: NodeJS.WritableStream;
}

/**
 * Options for creating in-memory dependencies (for testing)
 */
export interface MockSandboxFactoryOptions {
  /** Prompter answering the run's questions */
  prompter: Prompter;
  /** Gateway every region connects to; a fresh in-memory account per region by default */
  gateway?: MemoryCloudGateway;
  clock?: Clock;
}

export interface MockSandboxDependencies extends SandboxDependencies {
  connect(region: string): MemoryCloudGateway;
  logger: BufferLogger;
}

/**
 * Minimum log level for the verbosity settings
 */
export function getMinLogLevel(config: EffectiveConfig): LogLevel {
  if (config.verbosity.debug) return 'debug';
  if (config.verbosity.verbose) return 'info';
  return 'warn';
}

/**
 * Gateway for the run: AWS, or an in-memory account for a dry run
 */
export function createGateway(config: EffectiveConfig, region: string = config.aws.region): CloudGateway {
  if (config.dryRun) {
    return new MemoryCloudGateway({ region });
  }
  return new AwsCloudGateway({ region, profile: config.aws.profile });
}

/**
 * Create dependencies with real implementations
 */
export function createRealDependencies(
  config: EffectiveConfig,
  options: SandboxFactoryOptions = {}
): SandboxDependencies {
  const isTTY = options.isTTY ?? Boolean(process.stdout.isTTY);

  const logger = createConsoleLogger({
    minLevel: getMinLogLevel(config),
    jsonOutput: config.verbosity.jsonOutput,
  });

  const prompter = createInquirerPrompter({
    interactive: config.interactivity.interactive,
    isTTY,
  });

  const progress = createSpinnerService({
    isTTY,
    quiet: config.verbosity.jsonOutput,
    stream: options.stream ?? process.stderr,
  });

  return {
    connect: (region) => createGateway(config, region),
    logger,
    prompter,
    progress,
    clock: new SystemClock(),
  };
}

/**
 * Create dependencies with in-memory implementations (for testing)
 */
export function createMockDependencies(options: MockSandboxFactoryOptions): MockSandboxDependencies {
  return {
    connect: (region) => options.gateway ?? new MemoryCloudGateway({ region }),
    logger: createBufferLogger(),
    prompter: options.prompter,
    progress: silentProgress,
    clock: options.clock ?? new MockClock(),
  };
}

/**
 * Bind the dependencies to a resolved configuration
 */
export function createCommandContext(config: EffectiveConfig, deps: SandboxDependencies): CommandContext {
  return {
    config,
    connect: (region) => deps.connect(region),
    logger: deps.logger.child({ runId: config.runId }),
    clock: deps.clock,
    prompter: deps.prompter,
    progress: deps.progress,
  };
}
