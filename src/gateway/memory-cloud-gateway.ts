/**
 * In-memory CloudGateway implementation
 * Models the VPC, IAM and EKS resources the sandbox touches, with the same
 * dependency rules AWS enforces on delete. Used by tests and dry runs.
 */

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

export type GatewayOperation = Exclude<keyof CloudGateway, 'region'>;

/**
 * A call issued against the gateway
 */
export interface GatewayCall {
  operation: GatewayOperation;
  /** Primary resource id or name the call targets, when it has one */
  target?: string;
}

export interface MemoryCloudGatewayOptions {
  region?: string;
  accountId?: string;
  /** Versions returned by listClusterVersions */
  clusterVersions?: string[];
}

export const DEFAULT_MEMORY_ACCOUNT_ID = '123456789012';
export const DEFAULT_MEMORY_CLUSTER_VERSIONS = ['1.30', '1.31', '1.32'];

interface VpcRecord {
  id: string;
  cidrBlock: string;
  tags: ResourceTags;
}

interface SubnetRecord {
  id: string;
  vpcId: string;
  cidrBlock: string;
  availabilityZone: string;
  mapPublicIpOnLaunch: boolean;
  tags: ResourceTags;
}

interface InternetGatewayRecord {
  id: string;
  attachedVpcId?: string;
  tags: ResourceTags;
}

interface RouteTableRecord {
  id: string;
  vpcId: string;
  isMain: boolean;
  /** association id -> subnet id */
  associations: Map<string, string>;
  routes: Array<{ destinationCidrBlock: string; gatewayId: string }>;
  tags: ResourceTags;
}

interface SecurityGroupRecord {
  id: string;
  vpcId: string;
  groupName: string;
  description: string;
  ingressCidrs: string[];
  tags: ResourceTags;
}

interface NetworkInterfaceRecord {
  id: string;
  vpcId: string;
  subnetId?: string;
  attachmentId?: string;
  description?: string;
}

interface RoleRecord {
  name: string;
  assumeRolePolicyDocument: string;
  policyArns: Set<string>;
}

interface ClusterRecord {
  spec: ClusterSpec;
  status: 'CREATING' | 'ACTIVE' | 'DELETING';
  addons: Set<string>;
}

interface InjectedFailure {
  code: CloudGatewayErrorCode;
  message: string;
  target?: string;
}

/**
 * In-memory implementation of CloudGateway
 */
export class MemoryCloudGateway implements CloudGateway {
  readonly region: string;
  private readonly accountId: string;
  private clusterVersions: string[];

  private readonly vpcs = new Map<string, VpcRecord>();
  private readonly subnets = new Map<string, SubnetRecord>();
  private readonly internetGateways = new Map<string, InternetGatewayRecord>();
  private readonly routeTables = new Map<string, RouteTableRecord>();
  private readonly securityGroups = new Map<string, SecurityGroupRecord>();
  private readonly networkInterfaces = new Map<string, NetworkInterfaceRecord>();
  private readonly roles = new Map<string, RoleRecord>();
  private readonly clusters = new Map<string, ClusterRecord>();

  private readonly sequences = new Map<string, number>();
  private readonly calls: GatewayCall[] = [];
  private readonly failures = new Map<GatewayOperation, InjectedFailure>();

  constructor(options: MemoryCloudGatewayOptions = {}) {
    this.region = options.region ?? 'eu-west-2';
    this.accountId = options.accountId ?? DEFAULT_MEMORY_ACCOUNT_ID;
    this.clusterVersions = [...(options.clusterVersions ?? DEFAULT_MEMORY_CLUSTER_VERSIONS)];
  }

  // ========================================
  // Test helpers
  // ========================================

  /**
   * Calls issued so far, in order
   */
  getCalls(): GatewayCall[] {
    return [...this.calls];
  }

  /**
   * Operation names of the calls issued so far, in order
   */
  getOperations(): GatewayOperation[] {
    return this.calls.map((call) => call.operation);
  }

  clearCalls(): void {
    this.calls.length = 0;
  }

  /**
   * Make the next matching call fail. Without a target every call to the
   * operation fails until cleared.
   */
  failOn(
    operation: GatewayOperation,
    code: CloudGatewayErrorCode = 'REQUEST_FAILED',
    options: { target?: string; message?: string } = {}
  ): void {
    this.failures.set(operation, {
      code,
      message: options.message ?? `Injected failure for ${operation}`,
      target: options.target,
    });
  }

  clearFailures(): void {
    this.failures.clear();
  }

  setClusterVersions(versions: string[]): void {
    this.clusterVersions = [...versions];
  }

  /**
   * Add a network interface, as a managed service would
   */
  seedNetworkInterface(input: {
    vpcId: string;
    subnetId?: string;
    attached?: boolean;
    description?: string;
  }): string {
    const id = this.nextId('eni');
    this.networkInterfaces.set(id, {
      id,
      vpcId: input.vpcId,
      subnetId: input.subnetId,
      attachmentId: input.attached ? this.nextId('eni-attach') : undefined,
      description: input.description,
    });
    return id;
  }

  /**
   * Add a cluster that was not created through this gateway
   */
  seedCluster(spec: Partial<ClusterSpec> & { name: string }, status: ClusterRecord['status'] = 'ACTIVE'): void {
    this.clusters.set(spec.name, {
      spec: {
        version: '1.31',
        roleArn: `arn:aws:iam::${this.accountId}:role/external`,
        subnetIds: [],
        securityGroupIds: [],
        tags: {},
        autoMode: false,
        ...spec,
      },
      status,
      addons: new Set(),
    });
  }

  /**
   * Add a role that was not created through this gateway
   */
  seedRole(roleName: string): void {
    this.roles.set(roleName, {
      name: roleName,
      assumeRolePolicyDocument: '{}',
      policyArns: new Set(),
    });
  }

  hasVpc(vpcId: string): boolean {
    return this.vpcs.has(vpcId);
  }

  hasCluster(name: string): boolean {
    return this.clusters.has(name);
  }

  getClusterSpec(name: string): ClusterSpec | undefined {
    const spec = this.clusters.get(name)?.spec;
    if (!spec) {
      return undefined;
    }
    return {
      ...spec,
      subnetIds: [...spec.subnetIds],
      securityGroupIds: [...spec.securityGroupIds],
      tags: { ...spec.tags },
    };
  }

  getClusterStatus(name: string): ClusterRecord['status'] | undefined {
    return this.clusters.get(name)?.status;
  }

  getAddons(clusterName: string): string[] {
    return [...(this.clusters.get(clusterName)?.addons ?? [])];
  }

  getRolePolicies(roleName: string): string[] {
    return [...(this.roles.get(roleName)?.policyArns ?? [])];
  }

  getSubnetPublicIp(subnetId: string): boolean | undefined {
    return this.subnets.get(subnetId)?.mapPublicIpOnLaunch;
  }

  getRoutes(routeTableId: string): Array<{ destinationCidrBlock: string; gatewayId: string }> {
    return [...(this.routeTables.get(routeTableId)?.routes ?? [])];
  }

  getIngressCidrs(groupId: string): string[] {
    return [...(this.securityGroups.get(groupId)?.ingressCidrs ?? [])];
  }

  getInternetGatewayAttachment(internetGatewayId: string): string | undefined {
    return this.internetGateways.get(internetGatewayId)?.attachedVpcId;
  }

  /**
   * Number of resources of every kind still present (roles excluded)
   */
  countResources(): number {
    return (
      this.vpcs.size +
      this.subnets.size +
      this.internetGateways.size +
      this.routeTables.size +
      this.securityGroups.size +
      this.networkInterfaces.size +
      this.clusters.size
    );
  }

  // ========================================
  // Identity
  // ========================================

  async getCallerIdentity(): Promise<CallerIdentity> {
    this.begin('getCallerIdentity');
    return {
      accountId: this.accountId,
      arn: `arn:aws:iam::${this.accountId}:user/sandbox-operator`,
    };
  }

  async createRole(input: CreateRoleInput): Promise<void> {
    this.begin('createRole', input.roleName);
    if (this.roles.has(input.roleName)) {
      throw this.fail('ALREADY_EXISTS', 'createRole', `Role with name ${input.roleName} already exists`, input.roleName);
    }
    this.roles.set(input.roleName, {
      name: input.roleName,
      assumeRolePolicyDocument: input.assumeRolePolicyDocument,
      policyArns: new Set(),
    });
  }

  async attachRolePolicy(roleName: string, policyArn: string): Promise<void> {
    this.begin('attachRolePolicy', roleName);
    this.requireRole(roleName, 'attachRolePolicy').policyArns.add(policyArn);
  }

  // ========================================
  // VPC
  // ========================================

  async createVpc(input: CreateVpcInput): Promise<string> {
    this.begin('createVpc');
    const id = this.nextId('vpc');
    this.vpcs.set(id, { id, cidrBlock: input.cidrBlock, tags: { ...input.tags } });

    // Every VPC comes with a main route table and a default security group
    const mainTableId = this.nextId('rtb');
    this.routeTables.set(mainTableId, {
      id: mainTableId,
      vpcId: id,
      isMain: true,
      associations: new Map(),
      routes: [],
      tags: {},
    });
    const defaultGroupId = this.nextId('sg');
    this.securityGroups.set(defaultGroupId, {
      id: defaultGroupId,
      vpcId: id,
      groupName: 'default',
      description: 'default VPC security group',
      ingressCidrs: [],
      tags: {},
    });
    return id;
  }

  async describeVpc(vpcId: string): Promise<VpcSummary> {
    this.begin('describeVpc', vpcId);
    return this.toVpcSummary(this.requireVpc(vpcId, 'describeVpc'));
  }

  async listVpcs(): Promise<VpcSummary[]> {
    this.begin('listVpcs');
    return [...this.vpcs.values()].map((vpc) => this.toVpcSummary(vpc));
  }

  async deleteVpc(vpcId: string): Promise<void> {
    this.begin('deleteVpc', vpcId);
    this.requireVpc(vpcId, 'deleteVpc');

    const blocking =
      this.subnetsIn(vpcId).length > 0 ||
      this.networkInterfacesIn(vpcId).length > 0 ||
      [...this.internetGateways.values()].some((igw) => igw.attachedVpcId === vpcId) ||
      this.routeTablesIn(vpcId).some((table) => !table.isMain) ||
      this.securityGroupsIn(vpcId).some((group) => group.groupName !== 'default');
    if (blocking) {
      throw this.fail(
        'DEPENDENCY_VIOLATION',
        'deleteVpc',
        `The vpc '${vpcId}' has dependencies and cannot be deleted.`,
        vpcId
      );
    }

    for (const table of this.routeTablesIn(vpcId)) {
      this.routeTables.delete(table.id);
    }
    for (const group of this.securityGroupsIn(vpcId)) {
      this.securityGroups.delete(group.id);
    }
    this.vpcs.delete(vpcId);
  }

  // ========================================
  // Subnets
  // ========================================

  async createSubnet(input: CreateSubnetInput): Promise<string> {
    this.begin('createSubnet', input.vpcId);
    this.requireVpc(input.vpcId, 'createSubnet');
    const id = this.nextId('subnet');
    this.subnets.set(id, {
      id,
      vpcId: input.vpcId,
      cidrBlock: input.cidrBlock,
      availabilityZone: input.availabilityZone,
      mapPublicIpOnLaunch: false,
      tags: { ...input.tags },
    });
    return id;
  }

  async enableSubnetPublicIp(subnetId: string): Promise<void> {
    this.begin('enableSubnetPublicIp', subnetId);
    this.requireSubnet(subnetId, 'enableSubnetPublicIp').mapPublicIpOnLaunch = true;
  }

  async listSubnets(vpcId: string): Promise<SubnetSummary[]> {
    this.begin('listSubnets', vpcId);
    return this.subnetsIn(vpcId).map((subnet) => ({
      subnetId: subnet.id,
      vpcId: subnet.vpcId,
      cidrBlock: subnet.cidrBlock,
      availabilityZone: subnet.availabilityZone,
      tags: { ...subnet.tags },
    }));
  }

  async deleteSubnet(subnetId: string): Promise<void> {
    this.begin('deleteSubnet', subnetId);
    this.requireSubnet(subnetId, 'deleteSubnet');
    if ([...this.networkInterfaces.values()].some((eni) => eni.subnetId === subnetId)) {
      throw this.fail(
        'DEPENDENCY_VIOLATION',
        'deleteSubnet',
        `The subnet '${subnetId}' has dependencies and cannot be deleted.`,
        subnetId
      );
    }
    for (const table of this.routeTables.values()) {
      for (const [associationId, associatedSubnetId] of table.associations) {
        if (associatedSubnetId === subnetId) {
          table.associations.delete(associationId);
        }
      }
    }
    this.subnets.delete(subnetId);
  }

  // ========================================
  // Internet gateways
  // ========================================

  async createInternetGateway(tags: ResourceTags): Promise<string> {
    this.begin('createInternetGateway');
    const id = this.nextId('igw');
    this.internetGateways.set(id, { id, tags: { ...tags } });
    return id;
  }

  async attachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void> {
    this.begin('attachInternetGateway', internetGatewayId);
    const igw = this.requireInternetGateway(internetGatewayId, 'attachInternetGateway');
    this.requireVpc(vpcId, 'attachInternetGateway');
    if (igw.attachedVpcId !== undefined) {
      throw this.fail(
        'REQUEST_FAILED',
        'attachInternetGateway',
        `resource ${internetGatewayId} is already attached to network ${igw.attachedVpcId}`,
        internetGatewayId
      );
    }
    igw.attachedVpcId = vpcId;
  }

  async listInternetGateways(vpcId: string): Promise<string[]> {
    this.begin('listInternetGateways', vpcId);
    return [...this.internetGateways.values()]
      .filter((igw) => igw.attachedVpcId === vpcId)
      .map((igw) => igw.id);
  }

  async detachInternetGateway(internetGatewayId: string, vpcId: string): Promise<void> {
    this.begin('detachInternetGateway', internetGatewayId);
    const igw = this.requireInternetGateway(internetGatewayId, 'detachInternetGateway');
    if (igw.attachedVpcId !== vpcId) {
      throw this.fail(
        'NOT_FOUND',
        'detachInternetGateway',
        `resource ${internetGatewayId} is not attached to network ${vpcId}`,
        internetGatewayId
      );
    }
    igw.attachedVpcId = undefined;
  }

  async deleteInternetGateway(internetGatewayId: string): Promise<void> {
    this.begin('deleteInternetGateway', internetGatewayId);
    const igw = this.requireInternetGateway(internetGatewayId, 'deleteInternetGateway');
    if (igw.attachedVpcId !== undefined) {
      throw this.fail(
        'DEPENDENCY_VIOLATION',
        'deleteInternetGateway',
        `The internetGateway '${internetGatewayId}' has dependencies and cannot be deleted.`,
        internetGatewayId
      );
    }
    this.internetGateways.delete(internetGatewayId);
  }

  // ========================================
  // Route tables
  // ========================================

  async createRouteTable(vpcId: string, tags: ResourceTags): Promise<string> {
    this.begin('createRouteTable', vpcId);
    this.requireVpc(vpcId, 'createRouteTable');
    const id = this.nextId('rtb');
    this.routeTables.set(id, {
      id,
      vpcId,
      isMain: false,
      associations: new Map(),
      routes: [],
      tags: { ...tags },
    });
    return id;
  }

  async createRoute(input: CreateRouteInput): Promise<void> {
    this.begin('createRoute', input.routeTableId);
    const table = this.requireRouteTable(input.routeTableId, 'createRoute');
    this.requireInternetGateway(input.gatewayId, 'createRoute');
    table.routes.push({
      destinationCidrBlock: input.destinationCidrBlock,
      gatewayId: input.gatewayId,
    });
  }

  async associateRouteTable(routeTableId: string, subnetId: string): Promise<string> {
    this.begin('associateRouteTable', routeTableId);
    const table = this.requireRouteTable(routeTableId, 'associateRouteTable');
    this.requireSubnet(subnetId, 'associateRouteTable');
    const associationId = this.nextId('rtbassoc');
    table.associations.set(associationId, subnetId);
    return associationId;
  }

  async listRouteTables(vpcId: string): Promise<string[]> {
    this.begin('listRouteTables', vpcId);
    return this.routeTablesIn(vpcId).map((table) => table.id);
  }

  async describeRouteTable(routeTableId: string): Promise<RouteTableSummary> {
    this.begin('describeRouteTable', routeTableId);
    const table = this.requireRouteTable(routeTableId, 'describeRouteTable');
    return {
      routeTableId: table.id,
      vpcId: table.vpcId,
      isMain: table.isMain,
      associatedSubnetIds: [...table.associations.values()],
    };
  }

  async deleteRouteTable(routeTableId: string): Promise<void> {
    this.begin('deleteRouteTable', routeTableId);
    const table = this.requireRouteTable(routeTableId, 'deleteRouteTable');
    if (table.isMain || table.associations.size > 0) {
      throw this.fail(
        'DEPENDENCY_VIOLATION',
        'deleteRouteTable',
        `The routeTable '${routeTableId}' has dependencies and cannot be deleted.`,
        routeTableId
      );
    }
    this.routeTables.delete(routeTableId);
  }

  // ========================================
  // Security groups
  // ========================================

  async createSecurityGroup(input: CreateSecurityGroupInput): Promise<string> {
    this.begin('createSecurityGroup', input.vpcId);
    this.requireVpc(input.vpcId, 'createSecurityGroup');
    if (this.securityGroupsIn(input.vpcId).some((group) => group.groupName === input.groupName)) {
      throw this.fail(
        'ALREADY_EXISTS',
        'createSecurityGroup',
        `The security group '${input.groupName}' already exists for VPC '${input.vpcId}'`,
        input.groupName
      );
    }
    const id = this.nextId('sg');
    this.securityGroups.set(id, {
      id,
      vpcId: input.vpcId,
      groupName: input.groupName,
      description: input.description,
      ingressCidrs: [],
      tags: { ...input.tags },
    });
    return id;
  }

  async authorizeSecurityGroupIngress(groupId: string, cidrIp: string): Promise<void> {
    this.begin('authorizeSecurityGroupIngress', groupId);
    this.requireSecurityGroup(groupId, 'authorizeSecurityGroupIngress').ingressCidrs.push(cidrIp);
  }

  async listSecurityGroups(vpcId: string): Promise<SecurityGroupSummary[]> {
    this.begin('listSecurityGroups', vpcId);
    return this.securityGroupsIn(vpcId).map((group) => this.toSecurityGroupSummary(group));
  }

  async describeSecurityGroup(groupId: string): Promise<SecurityGroupSummary> {
    this.begin('describeSecurityGroup', groupId);
    return this.toSecurityGroupSummary(this.requireSecurityGroup(groupId, 'describeSecurityGroup'));
  }

  async deleteSecurityGroup(groupId: string): Promise<void> {
    this.begin('deleteSecurityGroup', groupId);
    const group = this.requireSecurityGroup(groupId, 'deleteSecurityGroup');
    if (group.groupName === 'default') {
      throw this.fail(
        'REQUEST_FAILED',
        'deleteSecurityGroup',
        `the specified group: "${groupId}" name: "default" cannot be deleted by a user`,
        groupId
      );
    }
    this.securityGroups.delete(groupId);
  }

  // ========================================
  // Network interfaces
  // ========================================

  async listNetworkInterfaces(vpcId: string): Promise<NetworkInterfaceSummary[]> {
    this.begin('listNetworkInterfaces', vpcId);
    return this.networkInterfacesIn(vpcId).map((eni) => ({
      networkInterfaceId: eni.id,
      attachmentId: eni.attachmentId,
      subnetId: eni.subnetId,
      description: eni.description,
    }));
  }

  async detachNetworkInterface(attachmentId: string, _force: boolean): Promise<void> {
    this.begin('detachNetworkInterface', attachmentId);
    const eni = [...this.networkInterfaces.values()].find((candidate) => candidate.attachmentId === attachmentId);
    if (!eni) {
      throw this.fail(
        'NOT_FOUND',
        'detachNetworkInterface',
        `The attachment ID '${attachmentId}' does not exist`,
        attachmentId
      );
    }
    eni.attachmentId = undefined;
  }

  async deleteNetworkInterface(networkInterfaceId: string): Promise<void> {
    this.begin('deleteNetworkInterface', networkInterfaceId);
    const eni = this.networkInterfaces.get(networkInterfaceId);
    if (!eni) {
      throw this.fail(
        'NOT_FOUND',
        'deleteNetworkInterface',
        `The networkInterface ID '${networkInterfaceId}' does not exist`,
        networkInterfaceId
      );
    }
    if (eni.attachmentId !== undefined) {
      throw this.fail(
        'REQUEST_FAILED',
        'deleteNetworkInterface',
        `Network interface '${networkInterfaceId}' is currently in use.`,
        networkInterfaceId
      );
    }
    this.networkInterfaces.delete(networkInterfaceId);
  }

  // ========================================
  // Tags
  // ========================================

  async getTags(resource: TaggedResourceRef): Promise<ResourceTags> {
    if (resource.kind === 'cluster') {
      this.begin('getTags', resource.name);
      const cluster = this.requireCluster(resource.name, 'getTags');
      return { ...cluster.spec.tags };
    }

    this.begin('getTags', resource.id);
    const tagged =
      this.vpcs.get(resource.id) ??
      this.subnets.get(resource.id) ??
      this.internetGateways.get(resource.id) ??
      this.routeTables.get(resource.id) ??
      this.securityGroups.get(resource.id);
    // Unknown ids describe to an empty tag set
    return { ...(tagged?.tags ?? {}) };
  }

  // ========================================
  // Clusters
  // ========================================

  async createCluster(spec: ClusterSpec): Promise<void> {
    this.begin('createCluster', spec.name);
    if (this.clusters.has(spec.name)) {
      throw this.fail('ALREADY_EXISTS', 'createCluster', `Cluster already exists with name: ${spec.name}`, spec.name);
    }
    const roleName = spec.roleArn.split('/').pop() ?? '';
    this.requireRole(roleName, 'createCluster');
    for (const subnetId of spec.subnetIds) {
      this.requireSubnet(subnetId, 'createCluster');
    }
    for (const groupId of spec.securityGroupIds) {
      this.requireSecurityGroup(groupId, 'createCluster');
    }
    this.clusters.set(spec.name, {
      spec: {
        ...spec,
        subnetIds: [...spec.subnetIds],
        securityGroupIds: [...spec.securityGroupIds],
        tags: { ...spec.tags },
      },
      status: 'CREATING',
      addons: new Set(),
    });
  }

  async describeCluster(name: string): Promise<ClusterDescription> {
    this.begin('describeCluster', name);
    const cluster = this.requireCluster(name, 'describeCluster');
    return {
      name,
      version: cluster.spec.version,
      status: cluster.status,
      tags: { ...cluster.spec.tags },
    };
  }

  async listClusters(): Promise<string[]> {
    this.begin('listClusters');
    return [...this.clusters.keys()];
  }

  async deleteCluster(name: string): Promise<void> {
    this.begin('deleteCluster', name);
    this.requireCluster(name, 'deleteCluster').status = 'DELETING';
  }

  async listClusterVersions(): Promise<string[]> {
    this.begin('listClusterVersions');
    return [...this.clusterVersions];
  }

  async createAddon(clusterName: string, addonName: string): Promise<void> {
    this.begin('createAddon', clusterName);
    const cluster = this.requireCluster(clusterName, 'createAddon');
    if (cluster.status !== 'ACTIVE') {
      throw this.fail(
        'REQUEST_FAILED',
        'createAddon',
        `Cluster ${clusterName} is in ${cluster.status} state`,
        clusterName
      );
    }
    if (cluster.addons.has(addonName)) {
      throw this.fail('ALREADY_EXISTS', 'createAddon', `Addon ${addonName} already exists`, clusterName);
    }
    cluster.addons.add(addonName);
  }

  async waitForClusterActive(name: string, _timeoutSeconds: number): Promise<void> {
    this.begin('waitForClusterActive', name);
    const cluster = this.requireCluster(name, 'waitForClusterActive');
    if (cluster.status === 'DELETING') {
      throw this.fail(
        'REQUEST_FAILED',
        'waitForClusterActive',
        `Cluster ${name} is being deleted`,
        name
      );
    }
    cluster.status = 'ACTIVE';
  }

  async waitForClusterDeleted(name: string, _timeoutSeconds: number): Promise<void> {
    this.begin('waitForClusterDeleted', name);
    const cluster = this.clusters.get(name);
    if (cluster && cluster.status !== 'DELETING') {
      throw this.fail(
        'REQUEST_FAILED',
        'waitForClusterDeleted',
        `Cluster ${name} is in ${cluster.status} state`,
        name
      );
    }
    this.clusters.delete(name);
  }

  // ========================================
  // Internals
  // ========================================

  private begin(operation: GatewayOperation, target?: string): void {
    this.calls.push(target === undefined ? { operation } : { operation, target });

    const failure = this.failures.get(operation);
    if (failure && (failure.target === undefined || failure.target === target)) {
      if (failure.target !== undefined) {
        this.failures.delete(operation);
      }
      throw this.fail(failure.code, operation, failure.message, target);
    }
  }

  private fail(
    code: CloudGatewayErrorCode,
    operation: GatewayOperation,
    message: string,
    resourceId?: string
  ): CloudGatewayError {
    return new CloudGatewayError(code, operation, message, { resourceId });
  }

  private nextId(prefix: string): string {
    const next = (this.sequences.get(prefix) ?? 0) + 1;
    this.sequences.set(prefix, next);
    return `${prefix}-${String(next).padStart(8, '0')}`;
  }

  private notFound(operation: GatewayOperation, kind: string, id: string): CloudGatewayError {
    return this.fail('NOT_FOUND', operation, `The ${kind} '${id}' does not exist`, id);
  }

  private requireVpc(vpcId: string, operation: GatewayOperation): VpcRecord {
    const vpc = this.vpcs.get(vpcId);
    if (!vpc) throw this.notFound(operation, 'vpc ID', vpcId);
    return vpc;
  }

  private requireSubnet(subnetId: string, operation: GatewayOperation): SubnetRecord {
    const subnet = this.subnets.get(subnetId);
    if (!subnet) throw this.notFound(operation, 'subnet ID', subnetId);
    return subnet;
  }

  private requireInternetGateway(id: string, operation: GatewayOperation): InternetGatewayRecord {
    const igw = this.internetGateways.get(id);
    if (!igw) throw this.notFound(operation, 'internetGateway ID', id);
    return igw;
  }

  private requireRouteTable(id: string, operation: GatewayOperation): RouteTableRecord {
    const table = this.routeTables.get(id);
    if (!table) throw this.notFound(operation, 'routeTable ID', id);
    return table;
  }

  private requireSecurityGroup(id: string, operation: GatewayOperation): SecurityGroupRecord {
    const group = this.securityGroups.get(id);
    if (!group) throw this.notFound(operation, 'security group', id);
    return group;
  }

  private requireRole(roleName: string, operation: GatewayOperation): RoleRecord {
    const role = this.roles.get(roleName);
    if (!role) throw this.notFound(operation, 'role', roleName);
    return role;
  }

  private requireCluster(name: string, operation: GatewayOperation): ClusterRecord {
    const cluster = this.clusters.get(name);
    if (!cluster) throw this.fail('NOT_FOUND', operation, `No cluster found for name: ${name}.`, name);
    return cluster;
  }

  private subnetsIn(vpcId: string): SubnetRecord[] {
    return [...this.subnets.values()].filter((subnet) => subnet.vpcId === vpcId);
  }

  private routeTablesIn(vpcId: string): RouteTableRecord[] {
    return [...this.routeTables.values()].filter((table) => table.vpcId === vpcId);
  }

  private securityGroupsIn(vpcId: string): SecurityGroupRecord[] {
    return [...this.securityGroups.values()].filter((group) => group.vpcId === vpcId);
  }

  private networkInterfacesIn(vpcId: string): NetworkInterfaceRecord[] {
    return [...this.networkInterfaces.values()].filter((eni) => eni.vpcId === vpcId);
  }

  private toVpcSummary(vpc: VpcRecord): VpcSummary {
    return {
      vpcId: vpc.id,
      cidrBlock: vpc.cidrBlock,
      isDefault: false,
      tags: { ...vpc.tags },
    };
  }

  private toSecurityGroupSummary(group: SecurityGroupRecord): SecurityGroupSummary {
    return {
      groupId: group.id,
      groupName: group.groupName,
      vpcId: group.vpcId,
    };
  }
}
