import { describe, it, expect } from 'vitest';
import { compareVersionsNumerically, fetchLatestVersion, resolveLatestVersion } from './version-resolver';
import { SandboxError } from './errors';
import { MemoryCloudGateway } from '../gateway/memory-cloud-gateway';

describe('resolveLatestVersion', () => {
  it('should compare as strings by default', () => {
    expect(resolveLatestVersion(['1.28', '1.9', '1.10'])).toBe('1.9');
  });

  it('should compare components as integers with numeric ordering', () => {
    expect(resolveLatestVersion(['1.28', '1.9', '1.10'], 'numeric')).toBe('1.28');
  });

  it('should agree on same-width versions', () => {
    const versions = ['1.29', '1.31', '1.30'];

    expect(resolveLatestVersion(versions, 'lexicographic')).toBe('1.31');
    expect(resolveLatestVersion(versions, 'numeric')).toBe('1.31');
  });

  it('should return the only version', () => {
    expect(resolveLatestVersion(['1.30'])).toBe('1.30');
  });

  it('should not reorder the input', () => {
    const versions = ['1.28', '1.9', '1.10'];

    resolveLatestVersion(versions);

    expect(versions).toEqual(['1.28', '1.9', '1.10']);
  });

  it('should fail with a configuration error on an empty list', () => {
    expect(() => resolveLatestVersion([])).toThrow(SandboxError);
    expect(() => resolveLatestVersion([])).toThrow('No Kubernetes versions are available');
  });
});

describe('compareVersionsNumerically', () => {
  it('should treat missing components as zero', () => {
    expect(compareVersionsNumerically('1.30', '1.30.0')).toBe(0);
    expect(compareVersionsNumerically('1.30.1', '1.30')).toBeGreaterThan(0);
    expect(compareVersionsNumerically('1.9', '1.10')).toBeLessThan(0);
  });
});

describe('fetchLatestVersion', () => {
  it('should resolve from the gateway versions', async () => {
    const gateway = new MemoryCloudGateway({ clusterVersions: ['1.28', '1.9', '1.10'] });

    await expect(fetchLatestVersion(gateway)).resolves.toBe('1.9');
    await expect(fetchLatestVersion(gateway, 'numeric')).resolves.toBe('1.28');
  });

  it('should wrap a listing failure as a configuration error', async () => {
    const gateway = new MemoryCloudGateway();
    gateway.failOn('listClusterVersions', 'REQUEST_FAILED', { message: 'access denied' });

    await expect(fetchLatestVersion(gateway)).rejects.toMatchObject({
      name: 'SandboxError',
      code: 'CONFIGURATION',
      operation: 'listClusterVersions',
      message: 'listClusterVersions failed: access denied',
    });
  });

  it('should fail when the provider offers no versions', async () => {
    const gateway = new MemoryCloudGateway({ clusterVersions: [] });

    await expect(fetchLatestVersion(gateway)).rejects.toMatchObject({ code: 'CONFIGURATION' });
  });
});
