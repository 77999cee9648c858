/**
 * AWS CloudGateway implementation
 * Issues one SDK v3 command per gateway call; errors are normalized to
 * CloudGatewayError so callers never see SDK exception types.
 */

import {
  EC2Client,
  AssociateRouteTableCommand,
  AttachInternetGatewayCommand,
  AuthorizeSecurityGroupIngressCommand,
  CreateInternetGatewayCommand,
  CreateRouteCommand,
  CreateRouteTableCommand,
  CreateSecurityGroupCommand,
  CreateSubnetCommand,
  CreateVpcCommand,
  DeleteInternetGatewayCommand,
  DeleteNetworkInterfaceCommand,
  DeleteRouteTableCommand,
  DeleteSecurityGroupCommand,
  DeleteSubnetCommand,
  DeleteVpcCommand,
  DescribeInternetGatewaysCommand,
  DescribeNetworkInterfacesCommand,
  DescribeRouteTablesCommand,
  DescribeSecurityGroupsCommand,
  DescribeSubnetsCommand,
  DescribeTagsCommand,
  DescribeVpcsCommand,
  DetachInternetGatewayCommand,
  DetachNetworkInterfaceCommand,
  ModifySubnetAttributeCommand,
  type ResourceType,
  type RouteTable,
  type SecurityGroup,
  type Tag,
  type TagSpecification,
  type Vpc,
} from '@aws-sdk/client-ec2';
import {
  EKSClient,
  CreateAddonCommand,
  CreateClusterCommand,
  DeleteClusterCommand,
  DescribeClusterCommand,
  DescribeClusterVersionsCommand,
  ListClustersCommand,
  waitUntilClusterActive,
  waitUntilClusterDeleted,
  type CreateClusterCommandInput,
} from '@aws-sdk/client-eks';
import { IAMClient, AttachRolePolicyCommand, CreateRoleCommand } from '@aws-sdk/client-iam';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { fromIni } from '@aws-sdk/credential-providers';
import {
  CallerIdentity,
  ClusterDescription,
  ClusterSpec,
  CloudGateway,
  CloudGatewayError,
  CloudGatewayErrorCode,
  CreateRoleInput,
  CreateRouteInput,
  CreateSecurityGroupInput,
  CreateSubnetInput,
  CreateVpcInput,
  NetworkInterfaceSummary,
  ResourceTags,
  RouteTableSummary,
  SecurityGroupSummary,
  SubnetSummary,
  TaggedResourceRef,
  VpcSummary,
} from '../types/cloud-gateway';

export interface AwsCloudGatewayOptions {
  region: string;
  /** Shared-credentials profile; the SDK default chain is used when unset */
  profile?: string;
}

const ALREADY_EXISTS_ERRORS = new Set([
  'EntityAlreadyExistsException',
  'EntityAlreadyExists',
  'InvalidGroup.Duplicate',
]);

const NOT_FOUND_ERRORS = new Set(['ResourceNotFoundException', 'NoSuchEntityException', 'NoSuchEntity']);

/**
 * Map an SDK exception name to a gateway error code
 */
export function classifyAwsError(error: unknown): CloudGatewayErrorCode {
  const name = error instanceof Error ? error.name : '';
  if (ALREADY_EXISTS_ERRORS.has(name)) return 'ALREADY_EXISTS';
  if (name === 'DependencyViolation') return 'DEPENDENCY_VIOLATION';
  if (NOT_FOUND_ERRORS.has(name) || name.endsWith('.NotFound')) return 'NOT_FOUND';
  return 'REQUEST_FAILED';
}

function toAwsTags(tags: ResourceTags): Tag[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}

function fromAwsTags(tags: Tag[] | undefined): ResourceTags {
  const result: ResourceTags = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      result[tag.Key] = tag.Value ?? '';
    }
  }
  return result;
}

function tagSpecification(resourceType: ResourceType, tags: ResourceTags): TagSpecification[] {
  return [{ ResourceType: resourceType, Tags: toAwsTags(tags) }];
}

function vpcFilter(vpcId: string, name = 'vpc-id') {
  return [{ Name: name, Values: [vpcId] }];
}

/**
 * Read a required field from an SDK response
 */
function required<T>(value: T | undefined, operation: string, field: string): T {
  if (value === undefined) {
    throw new CloudGatewayError('REQUEST_FAILED', operation, `${operation} response is missing ${field}`);
  }
  return value;
}

/**
 * CloudGateway backed by the EC2, EKS, IAM and STS SDK clients
 */
export class AwsCloudGateway implements CloudGateway {
  readonly region: string;
  private readonly ec2: EC2Client;
  private readonly eks: EKSClient;
  private readonly iam: IAMClient;
  private readonly sts: STSClient;

  constructor(options: AwsCloudGatewayOptions) {
    this.region = options.region;
    const clientConfig = {
      region: options.region,
      credentials: options.profile ? fromIni({ profile: options.profile }) : undefined,
    };
    this.ec2 = new EC2Client(clientConfig);
    this.eks = new EKSClient(clientConfig);
    this.iam = new IAMClient(clientConfig);
    this.sts = new STSClient(clientConfig);
  }

  // ========================================
  // Identity
  // ========================================

  async getCallerIdentity(): Promise<CallerIdentity> {
    return this.call('getCallerIdentity', undefined, async () => {
      const response = await this.sts.send(new GetCallerIdentityCommand({}));
      return {
        accountId: required(response.Account, 'getCallerIdentity', 'Account'),
        arn: required(response.Arn, 'getCallerIdentity', 'Arn'),
      };
    });
  }

  async createRole(input: CreateRoleInput): Promise<void> {
    await this.call('createRole', input.roleName, () =>
      this.iam.send(
        new CreateRoleCommand({
          RoleName: input.roleName,
          AssumeRolePolicyDocument: input.assumeRolePolicyDocument,
        })
      )
    );
  }

  async attachRolePolicy(roleName: string, policyArn: string): Promise<void> {
    await this.call('attachRolePolicy', roleName, () =>
      this.iam.send(new AttachRolePolicyCommand({ RoleName: roleName, PolicyArn: policyArn }))
    );
  }

  // ========================================
  // VPC
  // ========================================

  async createVpc(input: CreateVpcInput): Promise<string> {
    return this.call('createVpc', undefined, async () => {
      const response = await this.ec2.send(
        new CreateVpcCommand({
          CidrBlock: input.cidrBlock,
          TagSpecifications: tagSpecification('vpc', input.tags),
        })
      );
      return required(response.Vpc?.VpcId, 'createVpc', 'Vpc.VpcId');
    });
  }

  async describeVpc(vpcId: string): Promise<VpcSummary> {
    return this.call('describeVpc', vpcId, async () => {
      const response = await this.ec2.send(new DescribeVpcsCommand({ VpcIds: [vpcId] }));
      const vpc = response.Vpcs?.[0];
      if (!vpc) {
        throw new CloudGatewayError('NOT_FOUND', 'describeVpc', `The vpc ID '${vpcId}' does not exist`, {
          resourceId: vpcId,
        });
      }
      return this.toVpcSummary(vpc);
    });
  }

  async listVpcs(): Promise<VpcSummary[]> {
    return this.call('listVpcs', undefined, async () => {
      const response = await this.ec2.send(new DescribeVpcsCommand({}));
      return (response.Vpcs ?? []).map((vpc) => this.toVpcSummary(vpc));
    });
  }

  async deleteVpc(vpcId: string): Promise<void> {
    await this.call('deleteVpc', vpcId, () => this.ec2.send(new DeleteVpcCommand({ VpcId: vpcId })));
  }

  // ========================================
  // Subnets
  // ========================================

  async createSubnet(input: CreateSubnetInput): Promise<string> {
    return this.call('createSubnet', input.vpcId, async () => {
      const response = await this.ec2.send(
        new CreateSubnetCommand({
          VpcId: input.vpcId,
          CidrBlock: input.cidrBlock,
          AvailabilityZone: input.availabilityZone,
          TagSpecifications: tagSpecification('subnet', input.tags),
        })
      );
      return required(response.Subnet?.SubnetId, 'createSubnet', 'Subnet.SubnetId');
    });
  }

  async enableSubnetPublicIp(subnetId: string): Promise<void> {
    await this.call('enableSubnetPublicIp', subnetId, () =>
      this.ec2.send(
        new ModifySubnetAttributeCommand({
          SubnetId: subnetId,
          MapPublicIpOnLaunch: { Value: true },
        })
      )
    );
  }

  async listSubnets(vpcId: string): Promise<SubnetSummary[]> {
    return this.call('listSubnets', vpcId, async () => {
      const response = await this.ec2.send(new DescribeSubnetsCommand({ Filters: vpcFilter(vpcId) }));
      return (response.Subnets ?? []).map((subnet) => ({
        subnetId: required(subnet.SubnetId, 'listSubnets', 'SubnetId'),
        vpcId: subnet.VpcId ?? vpcId,
        cidrBlock: subnet.CidrBlock ?? '',
        availabilityZone: subnet.AvailabilityZone ?? '',
        tags: fromAwsTags(subnet.Tags),
      }));
    });
  }

  async deleteSubnet(subnetId: string): Promise<void> {
    await this.call('deleteSubnet', subnetId, () =>
      this.ec2.send(new DeleteSubnetCommand({ SubnetId: subnetId }))
    );
  }

  // ========================================
  // Internet gateways
  // ========================================

  async createInternetGateway(tags: ResourceTags): Promise<string> {
    return this.call('createInternetGateway', undefined, async () => {
      const response = await this.ec2.send(
        new CreateInternetGatewayCommand({
          TagSpecifications: tagSpecification('internet-gateway', tags),
        })
      );
      return required(
        response.InternetGateway?.InternetGatewayId,
        'createInternetGateway',
        'InternetGateway.InternetGatewayId'
      );
    });
  }

  async attachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void> {
    await this.call('attachInternetGateway', internetGatewayId, () =>
      this.ec2.send(new AttachInternetGatewayCommand({ InternetGatewayId: internetGatewayId, VpcId: vpcId }))
    );
  }

  async listInternetGateways(vpcId: string): Promise<string[]> {
    return this.call('listInternetGateways', vpcId, async () => {
      const response = await this.ec2.send(
        new DescribeInternetGatewaysCommand({ Filters: vpcFilter(vpcId, 'attachment.vpc-id') })
      );
      return (response.InternetGateways ?? []).flatMap((igw) =>
        igw.InternetGatewayId ? [igw.InternetGatewayId] : []
      );
    });
  }

  async detachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void> {
    await this.call('detachInternetGateway', internetGatewayId, () =>
      this.ec2.send(new DetachInternetGatewayCommand({ InternetGatewayId: internetGatewayId, VpcId: vpcId }))
    );
  }

  async deleteInternetGateway(internetGatewayId: string): Promise<void> {
    await this.call('deleteInternetGateway', internetGatewayId, () =>
      this.ec2.send(new DeleteInternetGatewayCommand({ InternetGatewayId: internetGatewayId }))
    );
  }

  // ========================================
  // Route tables
  // ========================================

  async createRouteTable(vpcId: string, tags: ResourceTags): Promise<string> {
    return this.call('createRouteTable', vpcId, async () => {
      const response = await this.ec2.send(
        new CreateRouteTableCommand({
          VpcId: vpcId,
          TagSpecifications: tagSpecification('route-table', tags),
        })
      );
      return required(response.RouteTable?.RouteTableId, 'createRouteTable', 'RouteTable.RouteTableId');
    });
  }

  async createRoute(input: CreateRouteInput): Promise<void> {
    await this.call('createRoute', input.routeTableId, () =>
      this.ec2.send(
        new CreateRouteCommand({
          RouteTableId: input.routeTableId,
          DestinationCidrBlock: input.destinationCidrBlock,
          GatewayId: input.gatewayId,
        })
      )
    );
  }

  async associateRouteTable(routeTableId: string, subnetId: string): Promise<string> {
    return this.call('associateRouteTable', routeTableId, async () => {
      const response = await this.ec2.send(
        new AssociateRouteTableCommand({ RouteTableId: routeTableId, SubnetId: subnetId })
      );
      return required(response.AssociationId, 'associateRouteTable', 'AssociationId');
    });
  }

  async listRouteTables(vpcId: string): Promise<string[]> {
    return this.call('listRouteTables', vpcId, async () => {
      const response = await this.ec2.send(new DescribeRouteTablesCommand({ Filters: vpcFilter(vpcId) }));
      return (response.RouteTables ?? []).flatMap((table) => (table.RouteTableId ? [table.RouteTableId] : []));
    });
  }

  async describeRouteTable(routeTableId: string): Promise<RouteTableSummary> {
    return this.call('describeRouteTable', routeTableId, async () => {
      const response = await this.ec2.send(new DescribeRouteTablesCommand({ RouteTableIds: [routeTableId] }));
      const table = response.RouteTables?.[0];
      if (!table) {
        throw new CloudGatewayError(
          'NOT_FOUND',
          'describeRouteTable',
          `The routeTable ID '${routeTableId}' does not exist`,
          { resourceId: routeTableId }
        );
      }
      return this.toRouteTableSummary(table, routeTableId);
    });
  }

  async deleteRouteTable(routeTableId: string): Promise<void> {
    await this.call('deleteRouteTable', routeTableId, () =>
      this.ec2.send(new DeleteRouteTableCommand({ RouteTableId: routeTableId }))
    );
  }

  // ========================================
  // Security groups
  // ========================================

  async createSecurityGroup(input: CreateSecurityGroupInput): Promise<string> {
    return this.call('createSecurityGroup', input.vpcId, async () => {
      const response = await this.ec2.send(
        new CreateSecurityGroupCommand({
          GroupName: input.groupName,
          Description: input.description,
          VpcId: input.vpcId,
          TagSpecifications: tagSpecification('security-group', input.tags),
        })
      );
      return required(response.GroupId, 'createSecurityGroup', 'GroupId');
    });
  }

  async authorizeSecurityGroupIngress(groupId: string, cidrIp: string): Promise<void> {
    await this.call('authorizeSecurityGroupIngress', groupId, () =>
      this.ec2.send(
        new AuthorizeSecurityGroupIngressCommand({
          GroupId: groupId,
          IpPermissions: [{ IpProtocol: '-1', IpRanges: [{ CidrIp: cidrIp }] }],
        })
      )
    );
  }

  async listSecurityGroups(vpcId: string): Promise<SecurityGroupSummary[]> {
    return this.call('listSecurityGroups', vpcId, async () => {
      const response = await this.ec2.send(new DescribeSecurityGroupsCommand({ Filters: vpcFilter(vpcId) }));
      return (response.SecurityGroups ?? []).map((group) => this.toSecurityGroupSummary(group, 'listSecurityGroups'));
    });
  }

  async describeSecurityGroup(groupId: string): Promise<SecurityGroupSummary> {
    return this.call('describeSecurityGroup', groupId, async () => {
      const response = await this.ec2.send(new DescribeSecurityGroupsCommand({ GroupIds: [groupId] }));
      const group = response.SecurityGroups?.[0];
      if (!group) {
        throw new CloudGatewayError(
          'NOT_FOUND',
          'describeSecurityGroup',
          `The security group '${groupId}' does not exist`,
          { resourceId: groupId }
        );
      }
      return this.toSecurityGroupSummary(group, 'describeSecurityGroup');
    });
  }

  async deleteSecurityGroup(groupId: string): Promise<void> {
    await this.call('deleteSecurityGroup', groupId, () =>
      this.ec2.send(new DeleteSecurityGroupCommand({ GroupId: groupId }))
    );
  }

  // ========================================
  // Network interfaces
  // ========================================

  async listNetworkInterfaces(vpcId: string): Promise<NetworkInterfaceSummary[]> {
    return this.call('listNetworkInterfaces', vpcId, async () => {
      const response = await this.ec2.send(new DescribeNetworkInterfacesCommand({ Filters: vpcFilter(vpcId) }));
      return (response.NetworkInterfaces ?? []).map((eni) => ({
        networkInterfaceId: required(eni.NetworkInterfaceId, 'listNetworkInterfaces', 'NetworkInterfaceId'),
        attachmentId: eni.Attachment?.AttachmentId,
        subnetId: eni.SubnetId,
        description: eni.Description,
      }));
    });
  }

  async detachNetworkInterface(attachmentId: string, force: boolean): Promise<void> {
    await this.call('detachNetworkInterface', attachmentId, () =>
      this.ec2.send(new DetachNetworkInterfaceCommand({ AttachmentId: attachmentId, Force: force }))
    );
  }

  async deleteNetworkInterface(networkInterfaceId: string): Promise<void> {
    await this.call('deleteNetworkInterface', networkInterfaceId, () =>
      this.ec2.send(new DeleteNetworkInterfaceCommand({ NetworkInterfaceId: networkInterfaceId }))
    );
  }

  // ========================================
  // Tags
  // ========================================

  async getTags(resource: TaggedResourceRef): Promise<ResourceTags> {
    if (resource.kind === 'cluster') {
      const cluster = await this.describeCluster(resource.name);
      return cluster.tags;
    }

    return this.call('getTags', resource.id, async () => {
      const response = await this.ec2.send(
        new DescribeTagsCommand({ Filters: [{ Name: 'resource-id', Values: [resource.id] }] })
      );
      const tags: ResourceTags = {};
      for (const tag of response.Tags ?? []) {
        if (tag.Key !== undefined) {
          tags[tag.Key] = tag.Value ?? '';
        }
      }
      return tags;
    });
  }

  // ========================================
  // Clusters
  // ========================================

  async createCluster(spec: ClusterSpec): Promise<void> {
    const input: CreateClusterCommandInput = {
      name: spec.name,
      version: spec.version,
      roleArn: spec.roleArn,
      resourcesVpcConfig: {
        subnetIds: spec.subnetIds,
        securityGroupIds: spec.securityGroupIds,
      },
      tags: spec.tags,
      accessConfig: {
        authenticationMode: 'API_AND_CONFIG_MAP',
        bootstrapClusterCreatorAdminPermissions: true,
      },
    };
    if (spec.autoMode) {
      input.computeConfig = { enabled: true };
      input.kubernetesNetworkConfig = { elasticLoadBalancing: { enabled: true } };
      input.storageConfig = { blockStorage: { enabled: true } };
    }

    await this.call('createCluster', spec.name, () => this.eks.send(new CreateClusterCommand(input)));
  }

  async describeCluster(name: string): Promise<ClusterDescription> {
    return this.call('describeCluster', name, async () => {
      const response = await this.eks.send(new DescribeClusterCommand({ name }));
      const cluster = response.cluster;
      return {
        name,
        version: cluster?.version,
        status: cluster?.status,
        tags: { ...(cluster?.tags ?? {}) },
      };
    });
  }

  async listClusters(): Promise<string[]> {
    return this.call('listClusters', undefined, async () => {
      const names: string[] = [];
      let nextToken: string | undefined;
      do {
        const response = await this.eks.send(new ListClustersCommand({ nextToken }));
        names.push(...(response.clusters ?? []));
        nextToken = response.nextToken;
      } while (nextToken);
      return names;
    });
  }

  async deleteCluster(name: string): Promise<void> {
    await this.call('deleteCluster', name, () => this.eks.send(new DeleteClusterCommand({ name })));
  }

  async listClusterVersions(): Promise<string[]> {
    return this.call('listClusterVersions', undefined, async () => {
      const versions: string[] = [];
      let nextToken: string | undefined;
      do {
        const response = await this.eks.send(
          new DescribeClusterVersionsCommand({ includeAll: true, nextToken })
        );
        for (const info of response.clusterVersions ?? []) {
          if (info.clusterVersion) {
            versions.push(info.clusterVersion);
          }
        }
        nextToken = response.nextToken;
      } while (nextToken);
      return versions;
    });
  }

  async createAddon(clusterName: string, addonName: string): Promise<void> {
    await this.call('createAddon', clusterName, () =>
      this.eks.send(new CreateAddonCommand({ clusterName, addonName }))
    );
  }

  async waitForClusterActive(name: string, timeoutSeconds: number): Promise<void> {
    await this.call('waitForClusterActive', name, () =>
      waitUntilClusterActive({ client: this.eks, maxWaitTime: timeoutSeconds }, { name })
    );
  }

  async waitForClusterDeleted(name: string, timeoutSeconds: number): Promise<void> {
    await this.call('waitForClusterDeleted', name, () =>
      waitUntilClusterDeleted({ client: this.eks, maxWaitTime: timeoutSeconds }, { name })
    );
  }

  // ========================================
  // Internals
  // ========================================

  /**
   * Run one SDK call, normalizing any failure
   */
  private async call<T>(operation: string, resourceId: string | undefined, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CloudGatewayError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CloudGatewayError(classifyAwsError(error), operation, `${operation} failed: ${message}`, {
        resourceId,
        cause: error,
      });
    }
  }

  private toVpcSummary(vpc: Vpc): VpcSummary {
    return {
      vpcId: required(vpc.VpcId, 'describeVpc', 'VpcId'),
      cidrBlock: vpc.CidrBlock ?? '',
      isDefault: vpc.IsDefault ?? false,
      tags: fromAwsTags(vpc.Tags),
    };
  }

  private toRouteTableSummary(table: RouteTable, routeTableId: string): RouteTableSummary {
    const associations = table.Associations ?? [];
    return {
      routeTableId: table.RouteTableId ?? routeTableId,
      vpcId: table.VpcId ?? '',
      isMain: associations.some((association) => association.Main === true),
      associatedSubnetIds: associations.flatMap((association) =>
        association.SubnetId ? [association.SubnetId] : []
      ),
    };
  }

  private toSecurityGroupSummary(group: SecurityGroup, operation: string): SecurityGroupSummary {
    return {
      groupId: required(group.GroupId, operation, 'GroupId'),
      groupName: group.GroupName ?? '',
      vpcId: group.VpcId ?? '',
    };
  }
}
