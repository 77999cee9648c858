/**
 * Version Resolver
 * Picks the "latest" Kubernetes version from the versions the provider offers.
 */

import { CloudGateway } from '../types/cloud-gateway';
import { VersionOrdering } from '../types/effective-config';
import { SandboxError, fromGatewayFailure } from './errors';

/**
 * Compare two versions by their dot-separated numeric components.
 * Non-numeric components compare as 0.
 */
export function compareVersionsNumerically(a: string, b: string): number {
  const left = a.split('.').map((part) => Number.parseInt(part, 10) || 0);
  const right = b.split('.').map((part) => Number.parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Select the latest version.
 *
 * With `lexicographic` ordering the list is sorted descending as plain strings,
 * so `1.9` ranks above `1.10`. Use `numeric` to compare components as integers.
 */
export function resolveLatestVersion(
  versions: readonly string[],
  ordering: VersionOrdering = 'lexicographic'
): string {
  if (versions.length === 0) {
    throw new SandboxError('CONFIGURATION', 'No Kubernetes versions are available', {
      operation: 'listClusterVersions',
    });
  }

  const sorted = [...versions].sort((a, b) => {
    if (ordering === 'numeric') {
      return compareVersionsNumerically(b, a);
    }
    return a < b ? 1 : a > b ? -1 : 0;
  });
  return sorted[0];
}

/**
 * Read the available versions and select the latest
 */
export async function fetchLatestVersion(
  gateway: CloudGateway,
  ordering: VersionOrdering = 'lexicographic'
): Promise<string> {
  let versions: string[];
  try {
    versions = await gateway.listClusterVersions();
  } catch (error) {
    throw fromGatewayFailure('CONFIGURATION', error, { operation: 'listClusterVersions' });
  }
  return resolveLatestVersion(versions, ordering);
}
