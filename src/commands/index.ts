/**
 * Commands module - operator-facing flows
 */

export type { CommandContext } from './command-context';
export { ask, isUnset, openGateway, REGION_QUESTION } from './command-context';
export { executeCreateCluster, createPromptNetworkSelector } from './create-cluster';
export { executeDeleteCluster, createPromptTeardownDecisions } from './delete-cluster';
export type { SandboxRunResult } from './run-sandbox';
export { selectAction, executeSandboxAction, ACTION_QUESTION } from './run-sandbox';
