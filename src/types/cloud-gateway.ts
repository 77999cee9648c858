/**
 * CloudGateway interface
 * Request/response capability over the network, identity and cluster APIs.
 * Callers hold no account state of their own: everything they know about the
 * account comes back through these calls.
 */

export type ResourceTags = Record<string, string>;

export interface CallerIdentity {
  accountId: string;
  arn: string;
}

export interface CreateRoleInput {
  roleName: string;
  /** JSON trust policy document */
  assumeRolePolicyDocument: string;
}

export interface CreateVpcInput {
  cidrBlock: string;
  tags: ResourceTags;
}

export interface CreateSubnetInput {
  vpcId: string;
  cidrBlock: string;
  /** Full zone name, e.g. eu-west-2a */
  availabilityZone: string;
  tags: ResourceTags;
}

export interface CreateRouteInput {
  routeTableId: string;
  destinationCidrBlock: string;
  gatewayId: string;
}

export interface CreateSecurityGroupInput {
  vpcId: string;
  groupName: string;
  description: string;
  tags: ResourceTags;
}

export interface VpcSummary {
  vpcId: string;
  cidrBlock: string;
  isDefault: boolean;
  tags: ResourceTags;
}

export interface SubnetSummary {
  subnetId: string;
  vpcId: string;
  cidrBlock: string;
  availabilityZone: string;
  tags: ResourceTags;
}

export interface RouteTableSummary {
  routeTableId: string;
  vpcId: string;
  /** True when one of the table's associations marks it as the VPC main table */
  isMain: boolean;
  associatedSubnetIds: string[];
}

export interface SecurityGroupSummary {
  groupId: string;
  groupName: string;
  vpcId: string;
}

export interface NetworkInterfaceSummary {
  networkInterfaceId: string;
  /** Present while the interface is attached to an instance or service */
  attachmentId?: string;
  subnetId?: string;
  description?: string;
}

export interface ClusterSpec {
  name: string;
  version: string;
  roleArn: string;
  subnetIds: string[];
  securityGroupIds: string[];
  tags: ResourceTags;
  /** Enables managed compute, block storage and load balancing in the create call */
  autoMode: boolean;
}

export interface ClusterDescription {
  name: string;
  version?: string;
  status?: string;
  tags: ResourceTags;
}

/**
 * Reference to a taggable remote resource
 */
export type TaggedResourceRef =
  | { kind: 'cluster'; name: string }
  | { kind: 'ec2'; id: string };

/**
 * Interface for the cloud provider
 * Implementations can be real (AWS SDK) or in-memory (tests, dry runs)
 */
export interface CloudGateway {
  /** Region every call is issued against */
  readonly region: string;

  // Identity
  getCallerIdentity(): Promise<CallerIdentity>;
  createRole(input: CreateRoleInput): Promise<void>;
  attachRolePolicy(roleName: string, policyArn: string): Promise<void>;

  // VPC
  createVpc(input: CreateVpcInput): Promise<string>;
  describeVpc(vpcId: string): Promise<VpcSummary>;
  listVpcs(): Promise<VpcSummary[]>;
  deleteVpc(vpcId: string): Promise<void>;

  // Subnets
  createSubnet(input: CreateSubnetInput): Promise<string>;
  enableSubnetPublicIp(subnetId: string): Promise<void>;
  listSubnets(vpcId: string): Promise<SubnetSummary[]>;
  deleteSubnet(subnetId: string): Promise<void>;

  // Internet gateways
  createInternetGateway(tags: ResourceTags): Promise<string>;
  attachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void>;
  listInternetGateways(vpcId: string): Promise<string[]>;
  detachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void>;
  deleteInternetGateway(internetGatewayId: string): Promise<void>;

  // Route tables
  createRouteTable(vpcId: string, tags: ResourceTags): Promise<string>;
  createRoute(input: CreateRouteInput): Promise<void>;
  associateRouteTable(routeTableId: string, subnetId: string): Promise<string>;
  listRouteTables(vpcId: string): Promise<string[]>;
  describeRouteTable(routeTableId: string): Promise<RouteTableSummary>;
  deleteRouteTable(routeTableId: string): Promise<void>;

  // Security groups
  createSecurityGroup(input: CreateSecurityGroupInput): Promise<string>;
  authorizeSecurityGroupIngress(groupId: string, cidrIp: string): Promise<void>;
  listSecurityGroups(vpcId: string): Promise<SecurityGroupSummary[]>;
  describeSecurityGroup(groupId: string): Promise<SecurityGroupSummary>;
  deleteSecurityGroup(groupId: string): Promise<void>;

  // Network interfaces
  listNetworkInterfaces(vpcId: string): Promise<NetworkInterfaceSummary[]>;
  detachNetworkInterface(attachmentId: string, force: boolean): Promise<void>;
  deleteNetworkInterface(networkInterfaceId: string): Promise<void>;

  // Tags
  getTags(resource: TaggedResourceRef): Promise<ResourceTags>;

  // Clusters
  createCluster(spec: ClusterSpec): Promise<void>;
  describeCluster(name: string): Promise<ClusterDescription>;
  listClusters(): Promise<string[]>;
  deleteCluster(name: string): Promise<void>;
  listClusterVersions(): Promise<string[]>;
  createAddon(clusterName: string, addonName: string): Promise<void>;
  waitForClusterActive(name: string, timeoutSeconds: number): Promise<void>;
  waitForClusterDeleted(name: string, timeoutSeconds: number): Promise<void>;
}

export type CloudGatewayErrorCode =
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'DEPENDENCY_VIOLATION'
  | 'REQUEST_FAILED';

/**
 * Failure reported by a CloudGateway call
 */
export class CloudGatewayError extends Error {
  readonly code: CloudGatewayErrorCode;
  readonly operation: string;
  readonly resourceId?: string;

  constructor(
    code: CloudGatewayErrorCode,
    operation: string,
    message: string,
    options: { resourceId?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CloudGatewayError';
    this.code = code;
    this.operation = operation;
    this.resourceId = options.resourceId;
  }
}

export function isCloudGatewayError(error: unknown): error is CloudGatewayError {
  return error instanceof CloudGatewayError;
}
