/**
 * Gateway module - CloudGateway implementations
 */

export { AwsCloudGateway, classifyAwsError } from './aws-cloud-gateway';
export type { AwsCloudGatewayOptions } from './aws-cloud-gateway';
export {
  MemoryCloudGateway,
  DEFAULT_MEMORY_ACCOUNT_ID,
  DEFAULT_MEMORY_CLUSTER_VERSIONS,
} from './memory-cloud-gateway';
export type { GatewayCall, GatewayOperation, MemoryCloudGatewayOptions } from './memory-cloud-gateway';
