/**
 * Schema Validation with Zod
 * Runtime validation for the user config file and the resolved config
 */

import { z } from 'zod';
import type { UserConfig } from './user-config.schema';

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

// =============================================================================
// Shared
// =============================================================================

const OCTET = '(25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)';

const cidrSchema = z
  .string()
  .regex(
    new RegExp(`^${OCTET}(\\.${OCTET}){3}\\/(\\d|[12]\\d|3[0-2])$`),
    'Expected an IPv4 CIDR block such as 203.0.113.0/24'
  );

const versionOrderingSchema = z.enum(['lexicographic', 'numeric']);

// =============================================================================
// User Config Schema
// =============================================================================

const userConfigSchema = z
  .object({
    region: z.string().min(1, 'Region cannot be empty').optional(),
    profile: z.string().min(1, 'Profile cannot be empty').optional(),
    kubernetesVersion: z.string().regex(/^\d+\.\d+$/, 'Expected a version such as 1.31').optional(),
    autoMode: z.boolean().optional(),
    installAddons: z.boolean().optional(),
    reuseNetwork: z.boolean().optional(),
    cascadeNetwork: z.boolean().optional(),
    ingressCidr: cidrSchema.optional(),
    versionOrdering: versionOrderingSchema.optional(),
    waitForCluster: z.boolean().optional(),
    clusterWaitTimeoutSeconds: z.number().int().positive().optional(),
  })
  .strict();

export function validateUserConfig(data: unknown): ValidationResult<UserConfig> {
  const result = userConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse user config from JSON string
 */
export function parseUserConfig(json: string): ValidationResult<UserConfig> {
  try {
    const data: unknown = JSON.parse(json);
    return validateUserConfig(data);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
}

// =============================================================================
// Effective Config Schema (subset for validation)
// =============================================================================

const effectiveConfigSchema = z.object({
  schemaVersion: z.literal('1.0.0'),
  runId: z.string().min(1),
  resolvedAt: z.string().datetime(),
  action: z.enum(['create', 'delete']).nullable(),
  aws: z.object({
    region: z.string().min(1),
    profile: z.string().min(1).optional(),
  }),
  cluster: z.object({
    name: z.string().min(1).optional(),
    kubernetesVersion: z.string().min(1).optional(),
    autoMode: z.boolean(),
    installAddons: z.boolean(),
    reuseNetwork: z.boolean(),
    ingressCidr: cidrSchema.optional(),
    versionOrdering: versionOrderingSchema,
  }),
  teardown: z.object({
    clusterName: z.string().min(1).optional(),
    cascadeNetwork: z.boolean(),
  }),
  wait: z.object({
    enabled: z.boolean(),
    timeoutSeconds: z.number().int().positive(),
  }),
  dryRun: z.boolean(),
});

/**
 * Validate the resolved config before a run starts
 */
export function validateEffectiveConfig(data: unknown): ValidationResult<z.infer<typeof effectiveConfigSchema>> {
  const result = effectiveConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

export { userConfigSchema, effectiveConfigSchema, cidrSchema };
