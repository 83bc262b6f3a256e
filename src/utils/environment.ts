/**
 * Environment Profiles
 *
 * Resolves a named environment profile by deep-merging the global baseline
 * with the environment's override. Objects merge key by key, arrays and
 * scalars from the override replace the baseline.
 *
 * @module utils/environment
 */

import { EnvironmentProfileSchema } from '../config/schema.js';
import type { EnvironmentCatalog } from '../config/schema.js';
import { createMigrationError } from '../contracts/errors.js';
import type { EnvironmentProfile } from '../contracts/types.js';
import { loadEnvironmentCatalog, detectEnvironment } from './config.js';
import { logger } from './logger.js';

/**
 * Baseline used when environments.yaml is absent or silent.
 */
export const BUILTIN_GLOBAL_PROFILE: Omit<EnvironmentProfile, 'name'> = {
  tablespaces: {
    data: {
      primary: 'USERS',
      lob: ['GD_LOB_01', 'GD_LOB_02', 'GD_LOB_03', 'GD_LOB_04'],
    },
  },
  subpartition_defaults: {
    min_count: 2,
    max_count: 16,
    size_based_recommendations: [
      { tier: 'small', max_gb: 1, count: 2 },
      { tier: 'medium', max_gb: 10, count: 4 },
      { tier: 'large', max_gb: 50, count: 8 },
      { tier: 'xlarge', max_gb: 100, count: 12 },
      { tier: 'xxlarge', max_gb: 999999, count: 16 },
    ],
  },
  parallel_defaults: {
    min_degree: 1,
    max_degree: 8,
    default_degree: 4,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge; the override wins field by field. Inputs are not mutated.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

/**
 * Resolve one environment from a loaded catalog.
 * Unknown names fall back to the global profile with a warning.
 */
export function resolveEnvironment(name: string, catalog: EnvironmentCatalog): EnvironmentProfile {
  let merged = deepMerge(BUILTIN_GLOBAL_PROFILE, catalog.environments.global ?? {});

  if (name !== 'global') {
    const override = catalog.environments[name];
    if (override) {
      merged = deepMerge(merged, override);
    } else {
      logger.warn(`Environment "${name}" not defined, using global defaults`);
    }
  }

  const result = EnvironmentProfileSchema.safeParse({ ...merged, name });
  if (!result.success) {
    throw createMigrationError(
      'environmentInvalid',
      `Resolved environment "${name}" is invalid: ${result.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join(', ')}`,
      { environment: name }
    );
  }
  return result.data;
}

/**
 * Load environments.yaml and resolve the requested (or detected) environment.
 */
export async function loadEnvironmentProfile(
  name?: string,
  configPath?: string
): Promise<EnvironmentProfile> {
  const environment = detectEnvironment(name);
  const catalog = await loadEnvironmentCatalog(configPath);
  return resolveEnvironment(environment, catalog);
}
