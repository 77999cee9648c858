/**
 * Orchestration module - wires gateway, logging, ui and commands together
 */

export type {
  SandboxDependencies,
  SandboxFactoryOptions,
  MockSandboxFactoryOptions,
  MockSandboxDependencies,
} from './sandbox-factory';
export {
  getMinLogLevel,
  createGateway,
  createRealDependencies,
  createMockDependencies,
  createCommandContext,
} from './sandbox-factory';

export type { SandboxRunReport } from './sandbox-runner';
export { runSandbox } from './sandbox-runner';
