/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: eks-sandbox [create|delete] [options]

Creates or deletes a sandbox EKS cluster. Missing choices are asked for interactively.

Options:
  --region <region>              AWS region (default: eu-west-2)
  --profile <name>               Shared-credentials profile
  --name <name>                  Cluster name for create (prefixed with Sandbox-)
  --cluster <name>               Cluster to delete
  --k8s-version <version>        Kubernetes version (default: latest available)
  --auto-mode, --no-auto-mode    Managed compute, storage and load balancing (default: on)
  --addons, --no-addons          Install coredns, kube-proxy and vpc-cni (default: on)
  --reuse-network                Reuse an existing VPC, subnets and security groups
  --new-network                  Create a new isolated VPC (default)
  --cascade, --no-cascade        Delete an isolated VPC with its cluster (default: on)
  --allow-ingress <cidr>         Open the new security group to a CIDR block
  --numeric-versions             Compare versions numerically when picking the latest
  --no-wait                      Do not wait for cluster state changes
  --dry-run                      Run against an in-memory account; nothing reaches AWS
  --no-interactive               Disable interactive prompts; use flags, config and defaults
  --verbose                      Enable verbose output with more progress details
  --debug                        Enable debug mode with full diagnostics
  --json                         JSON log lines and a JSON run summary
  -h, --help                     Show this help message
  -v, --version                  Show version number

Configuration:
  Flags override AWS_REGION, AWS_DEFAULT_REGION and AWS_PROFILE, which override
  ~/.config/eks-sandbox/config.json.

Examples:
  eks-sandbox
  eks-sandbox create --name demo --no-addons
  eks-sandbox create --name demo --reuse-network --profile sandbox
  eks-sandbox delete --cluster Sandbox-demo --no-cascade
  eks-sandbox create --name demo --dry-run --no-interactive`;
}

/** Print usage to stderr */
export function printUsage(): void {
  console.error(getUsageText());
}
