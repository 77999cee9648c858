/**
 * Fixed names, tags and addresses of the sandbox resource graph
 */

export const TAG_CREATED_BY = 'CreatedBy';
export const TOOL_TAG_VALUE = 'EKS-Sandbox-Tool';
export const TAG_HOSTING_VPC = 'HostingVPC';
export const ISOLATED_HOSTING_VALUE = 'isolated';
export const TAG_VPC_ID = 'VpcId';
export const TAG_NAME = 'Name';

export const CLUSTER_NAME_PREFIX = 'Sandbox-';

export const VPC_CIDR = '10.0.0.0/16';
export const VPC_NAME_PREFIX = 'Sandbox-EKS-VPC-';

export const SUBNET_LAYOUT = [
  { name: 'EKS-Subnet-1', cidrBlock: '10.0.1.0/24', zoneSuffix: 'a' },
  { name: 'EKS-Subnet-2', cidrBlock: '10.0.2.0/24', zoneSuffix: 'b' },
] as const;

export const INTERNET_GATEWAY_NAME = 'EKS-IGW';
export const ROUTE_TABLE_NAME = 'EKS-Route-Table';
export const DEFAULT_ROUTE_CIDR = '0.0.0.0/0';
export const SECURITY_GROUP_NAME = 'EKS-SG';
export const SECURITY_GROUP_DESCRIPTION = 'EKS Security Group';
export const DEFAULT_SECURITY_GROUP_NAME = 'default';

export const CLUSTER_ROLE_NAME = 'EKSClusterRole';
export const CLUSTER_ROLE_POLICY_ARNS = [
  'arn:aws:iam::aws:policy/AmazonEKSClusterPolicy',
  'arn:aws:iam::aws:policy/AmazonEKSVPCResourceController',
] as const;

export const CLUSTER_ROLE_TRUST_POLICY = JSON.stringify({
  Version: '2012-10-17',
  Statement: [
    {
      Effect: 'Allow',
      Principal: { Service: 'eks.amazonaws.com' },
      Action: 'sts:AssumeRole',
    },
  ],
});

export const CORE_ADDONS = ['coredns', 'kube-proxy', 'vpc-cni'] as const;

export const MIN_CLUSTER_SUBNETS = 2;
export const MIN_CLUSTER_ZONES = 2;
export const MIN_CLUSTER_SECURITY_GROUPS = 1;

export function buildRoleArn(accountId: string, roleName: string = CLUSTER_ROLE_NAME): string {
  return `arn:aws:iam::${accountId}:role/${roleName}`;
}

export function toSandboxClusterName(name: string): string {
  return `${CLUSTER_NAME_PREFIX}${name}`;
}
