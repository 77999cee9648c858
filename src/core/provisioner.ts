/**
 * Provisioner
 * Runs the fixed creation pipeline: identity, role, network, cluster, add-ons.
 * Calls are issued one at a time; the first failure ends the run and nothing
 * created before it is removed.
 */

import {
  CloudGateway,
  ResourceTags,
  SecurityGroupSummary,
  SubnetSummary,
  VpcSummary,
  isCloudGatewayError,
} from '../types/cloud-gateway';
import { Clock, formatDate } from '../types/clock';
import { WaitConfig } from '../types/effective-config';
import { Logger } from '../types/logger';
import { ProgressTracker, silentProgress } from '../types/progress';
import {
  CLUSTER_ROLE_NAME,
  CLUSTER_ROLE_POLICY_ARNS,
  CLUSTER_ROLE_TRUST_POLICY,
  CORE_ADDONS,
  DEFAULT_ROUTE_CIDR,
  INTERNET_GATEWAY_NAME,
  ISOLATED_HOSTING_VALUE,
  MIN_CLUSTER_SECURITY_GROUPS,
  MIN_CLUSTER_SUBNETS,
  MIN_CLUSTER_ZONES,
  ROUTE_TABLE_NAME,
  SECURITY_GROUP_DESCRIPTION,
  SECURITY_GROUP_NAME,
  SUBNET_LAYOUT,
  TAG_CREATED_BY,
  TAG_HOSTING_VPC,
  TAG_NAME,
  TAG_VPC_ID,
  TOOL_TAG_VALUE,
  VPC_CIDR,
  VPC_NAME_PREFIX,
  buildRoleArn,
} from './constants';
import { SandboxError, fromGatewayFailure } from './errors';

/**
 * Operator choices for the reuse-network path
 */
export interface NetworkSelector {
  selectVpc(vpcs: VpcSummary[]): Promise<string>;
  selectSubnets(subnets: SubnetSummary[]): Promise<string[]>;
  selectSecurityGroups(groups: SecurityGroupSummary[]): Promise<string[]>;
}

export type NetworkPlan = { mode: 'create' } | { mode: 'reuse'; selector: NetworkSelector };

export interface ProvisionRequest {
  /** Final cluster name, sandbox prefix included */
  clusterName: string;
  kubernetesVersion: string;
  autoMode: boolean;
  installAddons: boolean;
  network: NetworkPlan;
  /** Opened for all inbound traffic on a newly created security group */
  ingressCidr?: string;
}

export interface ProvisionedNetwork {
  vpcId: string;
  subnetIds: string[];
  securityGroupIds: string[];
  /** True when the network was created by this run */
  created: boolean;
  internetGatewayId?: string;
  routeTableId?: string;
}

export interface CreatedResource {
  resourceType: string;
  resourceId: string;
}

export interface ProvisionResult {
  clusterName: string;
  kubernetesVersion: string;
  roleArn: string;
  /** False when the role already existed */
  roleCreated: boolean;
  network: ProvisionedNetwork;
  addons: string[];
  createdResources: CreatedResource[];
}

export interface ProvisionerDependencies {
  gateway: CloudGateway;
  logger: Logger;
  clock: Clock;
  wait: WaitConfig;
  progress?: ProgressTracker;
}

type CreationStep = 'identity' | 'role' | 'network' | 'cluster' | 'addons';

export class Provisioner {
  private readonly gateway: CloudGateway;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly wait: WaitConfig;
  private readonly progress: ProgressTracker;
  private createdResources: CreatedResource[] = [];

  constructor(deps: ProvisionerDependencies) {
    this.gateway = deps.gateway;
    this.logger = deps.logger;
    this.clock = deps.clock;
    this.wait = deps.wait;
    this.progress = deps.progress ?? silentProgress;
  }

  async provision(request: ProvisionRequest): Promise<ProvisionResult> {
    this.createdResources = [];

    const roleArn = await this.runStep('identity', 'CONFIGURATION', () => this.resolveRoleArn());
    const roleCreated = await this.runStep('role', 'RESOURCE_CREATION', () => this.ensureClusterRole());
    const network = await this.runStep('network', 'RESOURCE_CREATION', () =>
      request.network.mode === 'reuse'
        ? this.selectExistingNetwork(request.network.selector)
        : this.createNetwork(request.ingressCidr)
    );

    await this.runStep('cluster', 'RESOURCE_CREATION', () => this.createCluster(request, roleArn, network));

    const addons: string[] = [];
    if (request.installAddons) {
      await this.runStep('addons', 'RESOURCE_CREATION', () => this.installAddons(request.clusterName, addons));
    }

    return {
      clusterName: request.clusterName,
      kubernetesVersion: request.kubernetesVersion,
      roleArn,
      roleCreated,
      network,
      addons,
      createdResources: [...this.createdResources],
    };
  }

  /**
   * Run one pipeline step, wrapping failures with the step's error class
   */
  private async runStep<T>(
    step: CreationStep,
    code: 'CONFIGURATION' | 'RESOURCE_CREATION',
    fn: () => Promise<T>
  ): Promise<T> {
    this.logger.event('step_started', `Starting ${step}`, { step });
    try {
      const result = await fn();
      this.logger.event('step_completed', `Completed ${step}`, { step });
      return result;
    } catch (error) {
      throw fromGatewayFailure(code, error, { operation: step });
    }
  }

  private async resolveRoleArn(): Promise<string> {
    const identity = await this.gateway.getCallerIdentity();
    this.logger.debug(`Caller identity: ${identity.arn}`, { step: 'identity' });
    return buildRoleArn(identity.accountId);
  }

  private async ensureClusterRole(): Promise<boolean> {
    let created = true;
    try {
      await this.gateway.createRole({
        roleName: CLUSTER_ROLE_NAME,
        assumeRolePolicyDocument: CLUSTER_ROLE_TRUST_POLICY,
      });
      this.recordCreated('role', CLUSTER_ROLE_NAME);
    } catch (error) {
      if (!isCloudGatewayError(error) || error.code !== 'ALREADY_EXISTS') {
        throw error;
      }
      created = false;
      this.logger.event('resource_exists', `Role ${CLUSTER_ROLE_NAME} already exists, reusing it`, {
        step: 'role',
        resourceType: 'role',
        resourceId: CLUSTER_ROLE_NAME,
      });
    }

    for (const policyArn of CLUSTER_ROLE_POLICY_ARNS) {
      await this.gateway.attachRolePolicy(CLUSTER_ROLE_NAME, policyArn);
      this.logger.debug(`Attached ${policyArn} to ${CLUSTER_ROLE_NAME}`, { step: 'role' });
    }
    return created;
  }

  private async selectExistingNetwork(selector: NetworkSelector): Promise<ProvisionedNetwork> {
    const vpcs = await this.gateway.listVpcs();
    if (vpcs.length === 0) {
      throw new SandboxError('INVARIANT_VIOLATION', 'No VPCs are available to reuse', { operation: 'listVpcs' });
    }
    const vpcId = await selector.selectVpc(vpcs);
    if (!vpcs.some((vpc) => vpc.vpcId === vpcId)) {
      throw new SandboxError('INVARIANT_VIOLATION', `VPC ${vpcId} is not one of the listed VPCs`, {
        resourceId: vpcId,
      });
    }

    const subnets = await this.gateway.listSubnets(vpcId);
    if (subnets.length < MIN_CLUSTER_SUBNETS) {
      throw new SandboxError(
        'INVARIANT_VIOLATION',
        `VPC ${vpcId} has ${subnets.length} subnet(s); a cluster needs at least ${MIN_CLUSTER_SUBNETS}`,
        { operation: 'listSubnets', resourceId: vpcId }
      );
    }
    const subnetIds = await selector.selectSubnets(subnets);
    validateSubnetSelection(subnetIds, subnets, vpcId);

    const groups = await this.gateway.listSecurityGroups(vpcId);
    const securityGroupIds = await selector.selectSecurityGroups(groups);
    validateSecurityGroupSelection(securityGroupIds, groups, vpcId);

    this.logger.info(
      `Reusing VPC ${vpcId} with subnets ${subnetIds.join(', ')} and security groups ${securityGroupIds.join(', ')}`,
      { step: 'network', resourceId: vpcId }
    );
    return { vpcId, subnetIds, securityGroupIds, created: false };
  }

  private async createNetwork(ingressCidr: string | undefined): Promise<ProvisionedNetwork> {
    const region = this.gateway.region;

    const vpcId = await this.gateway.createVpc({
      cidrBlock: VPC_CIDR,
      tags: provenanceTags(`${VPC_NAME_PREFIX}${formatDate(this.clock.now())}`),
    });
    this.recordCreated('vpc', vpcId);

    const subnetIds: string[] = [];
    for (const layout of SUBNET_LAYOUT) {
      const subnetId = await this.gateway.createSubnet({
        vpcId,
        cidrBlock: layout.cidrBlock,
        availabilityZone: `${region}${layout.zoneSuffix}`,
        tags: provenanceTags(layout.name),
      });
      this.recordCreated('subnet', subnetId);
      subnetIds.push(subnetId);
    }
    for (const subnetId of subnetIds) {
      await this.gateway.enableSubnetPublicIp(subnetId);
      this.logger.debug(`Enabled public IPv4 assignment on ${subnetId}`, { step: 'network' });
    }

    const internetGatewayId = await this.gateway.createInternetGateway(provenanceTags(INTERNET_GATEWAY_NAME));
    this.recordCreated('internet-gateway', internetGatewayId);
    await this.gateway.attachInternetGateway(internetGatewayId, vpcId);

    const routeTableId = await this.gateway.createRouteTable(vpcId, provenanceTags(ROUTE_TABLE_NAME));
    this.recordCreated('route-table', routeTableId);
    await this.gateway.createRoute({
      routeTableId,
      destinationCidrBlock: DEFAULT_ROUTE_CIDR,
      gatewayId: internetGatewayId,
    });
    for (const subnetId of subnetIds) {
      await this.gateway.associateRouteTable(routeTableId, subnetId);
    }

    const securityGroupId = await this.gateway.createSecurityGroup({
      vpcId,
      groupName: SECURITY_GROUP_NAME,
      description: SECURITY_GROUP_DESCRIPTION,
      tags: provenanceTags(SECURITY_GROUP_NAME),
    });
    this.recordCreated('security-group', securityGroupId);

    if (ingressCidr) {
      await this.gateway.authorizeSecurityGroupIngress(securityGroupId, ingressCidr);
      this.logger.warn(`Security group ${securityGroupId} accepts all traffic from ${ingressCidr}`, {
        step: 'network',
        resourceId: securityGroupId,
      });
    }

    return {
      vpcId,
      subnetIds,
      securityGroupIds: [securityGroupId],
      created: true,
      internetGatewayId,
      routeTableId,
    };
  }

  private async createCluster(request: ProvisionRequest, roleArn: string, network: ProvisionedNetwork): Promise<void> {
    const tags: ResourceTags = { [TAG_CREATED_BY]: TOOL_TAG_VALUE };
    if (network.created) {
      tags[TAG_HOSTING_VPC] = ISOLATED_HOSTING_VALUE;
      tags[TAG_VPC_ID] = network.vpcId;
    }

    await this.gateway.createCluster({
      name: request.clusterName,
      version: request.kubernetesVersion,
      roleArn,
      subnetIds: network.subnetIds,
      securityGroupIds: network.securityGroupIds,
      tags,
      autoMode: request.autoMode,
    });
    this.recordCreated('cluster', request.clusterName);
  }

  private async installAddons(clusterName: string, installed: string[]): Promise<void> {
    if (this.wait.enabled) {
      await this.progress.track(
        `Waiting for cluster ${clusterName} to become active`,
        () => this.gateway.waitForClusterActive(clusterName, this.wait.timeoutSeconds),
        `Cluster ${clusterName} is active`
      );
    }

    for (const addon of CORE_ADDONS) {
      await this.gateway.createAddon(clusterName, addon);
      installed.push(addon);
      this.logger.event('resource_created', `Installed add-on ${addon}`, {
        step: 'addons',
        resourceType: 'addon',
        resourceId: addon,
      });
    }
  }

  private recordCreated(resourceType: string, resourceId: string): void {
    this.createdResources.push({ resourceType, resourceId });
    this.logger.event('resource_created', `Created ${resourceType} ${resourceId}`, { resourceType, resourceId });
  }
}

function provenanceTags(name: string): ResourceTags {
  return { [TAG_NAME]: name, [TAG_CREATED_BY]: TOOL_TAG_VALUE };
}

/**
 * Check the operator's subnet choice: at least two subnets of the VPC, spread
 * over at least two availability zones
 */
export function validateSubnetSelection(selectedIds: string[], available: SubnetSummary[], vpcId: string): void {
  const unique = [...new Set(selectedIds)];
  if (unique.length < MIN_CLUSTER_SUBNETS) {
    throw new SandboxError(
      'INVARIANT_VIOLATION',
      `At least ${MIN_CLUSTER_SUBNETS} subnets are required, ${unique.length} selected`,
      { resourceId: vpcId }
    );
  }

  const zones = new Set<string>();
  for (const subnetId of unique) {
    const subnet = available.find((candidate) => candidate.subnetId === subnetId);
    if (!subnet) {
      throw new SandboxError('INVARIANT_VIOLATION', `Subnet ${subnetId} does not belong to VPC ${vpcId}`, {
        resourceId: subnetId,
      });
    }
    zones.add(subnet.availabilityZone);
  }
  if (zones.size < MIN_CLUSTER_ZONES) {
    throw new SandboxError(
      'INVARIANT_VIOLATION',
      `Selected subnets span ${zones.size} availability zone(s); at least ${MIN_CLUSTER_ZONES} are required`,
      { resourceId: vpcId }
    );
  }
}

export function validateSecurityGroupSelection(
  selectedIds: string[],
  available: SecurityGroupSummary[],
  vpcId: string
): void {
  if (selectedIds.length < MIN_CLUSTER_SECURITY_GROUPS) {
    throw new SandboxError(
      'INVARIANT_VIOLATION',
      `At least ${MIN_CLUSTER_SECURITY_GROUPS} security group is required`,
      { resourceId: vpcId }
    );
  }
  for (const groupId of selectedIds) {
    if (!available.some((group) => group.groupId === groupId)) {
      throw new SandboxError('INVARIANT_VIOLATION', `Security group ${groupId} does not belong to VPC ${vpcId}`, {
        resourceId: groupId,
      });
    }
  }
}
