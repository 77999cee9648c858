/**
 * Effective config display
 * Shown in debug mode so the operator can see where each value came from
 */

import { EffectiveConfig } from '../types/effective-config';

function withSource(config: EffectiveConfig, key: string, value: string): string {
  const source = config.sources[key];
  return source ? `${value} (${source})` : value;
}

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

/**
 * Format effective config for human-readable display
 */
export function formatEffectiveConfigForDisplay(config: EffectiveConfig): string {
  const lines: string[] = [];

  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('                    EFFECTIVE CONFIGURATION');
  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('');

  lines.push(`Run ID:              ${config.runId}`);
  lines.push(`Resolved At:         ${config.resolvedAt}`);
  lines.push(`Action:              ${config.action ?? '(ask)'}`);
  lines.push('');

  lines.push('┌─ AWS ───────────────────────────────────────────────────────┐');
  lines.push(`│ Region:  ${withSource(config, 'region', config.aws.region)}`);
  lines.push(`│ Profile: ${withSource(config, 'profile', config.aws.profile ?? '(default chain)')}`);
  lines.push(`│ Dry Run: ${yesNo(config.dryRun)}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  const cluster = config.cluster;
  lines.push('┌─ Cluster ───────────────────────────────────────────────────┐');
  lines.push(`│ Name:             ${cluster.name ?? '(ask)'}`);
  lines.push(`│ Version:          ${withSource(config, 'kubernetesVersion', cluster.kubernetesVersion ?? '(latest)')}`);
  lines.push(`│ Version Ordering: ${withSource(config, 'versionOrdering', cluster.versionOrdering)}`);
  lines.push(`│ Auto Mode:        ${withSource(config, 'autoMode', yesNo(cluster.autoMode))}`);
  lines.push(`│ Add-ons:          ${withSource(config, 'installAddons', yesNo(cluster.installAddons))}`);
  lines.push(`│ Reuse Network:    ${withSource(config, 'reuseNetwork', yesNo(cluster.reuseNetwork))}`);
  if (cluster.ingressCidr) {
    lines.push(`│ Ingress CIDR:     ${withSource(config, 'ingressCidr', cluster.ingressCidr)}`);
  }
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('┌─ Teardown ──────────────────────────────────────────────────┐');
  lines.push(`│ Cluster:  ${config.teardown.clusterName ?? '(ask)'}`);
  lines.push(`│ Cascade:  ${withSource(config, 'cascadeNetwork', yesNo(config.teardown.cascadeNetwork))}`);
  lines.push(`│ Wait:     ${withSource(config, 'wait', yesNo(config.wait.enabled))}, up to ${config.wait.timeoutSeconds}s`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push(`Interactive: ${yesNo(config.interactivity.interactive)}`);
  lines.push('═══════════════════════════════════════════════════════════════');

  return lines.join('\n');
}
