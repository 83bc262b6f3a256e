/**
 * Configuration Zod Schemas
 *
 * Zod validation schemas for environments.yaml and the environment profile
 * embedded in every plan document.
 *
 * @module config/schema
 */

import { z } from 'zod';

// =============================================================================
// ENVIRONMENT PROFILE SCHEMAS
// =============================================================================

/**
 * One row of the size-based subpartition recommendation table
 */
export const SizeTierSchema = z.object({
  tier: z.string().min(1),
  max_gb: z.number().positive(),
  count: z.number().int().min(1).max(1024),
});

/**
 * Fully resolved environment profile (after merging with global)
 */
export const EnvironmentProfileSchema = z
  .object({
    name: z.string().min(1),
    tablespaces: z.object({
      data: z.object({
        primary: z.string().min(1),
        lob: z.array(z.string().min(1)),
      }),
    }),
    subpartition_defaults: z.object({
      min_count: z.number().int().min(1),
      max_count: z.number().int().max(1024),
      size_based_recommendations: z.array(SizeTierSchema).min(1),
    }),
    parallel_defaults: z.object({
      min_degree: z.number().int().min(1),
      max_degree: z.number().int().min(1),
      default_degree: z.number().int().min(1),
    }),
  })
  .refine((env) => env.subpartition_defaults.min_count <= env.subpartition_defaults.max_count, {
    message: 'subpartition_defaults.min_count must not exceed max_count',
    path: ['subpartition_defaults'],
  })
  .refine((env) => env.parallel_defaults.min_degree <= env.parallel_defaults.max_degree, {
    message: 'parallel_defaults.min_degree must not exceed max_degree',
    path: ['parallel_defaults'],
  });

/**
 * Partial override for a named environment. Arrays replace, objects merge.
 */
export const EnvironmentOverrideSchema = z
  .object({
    tablespaces: z
      .object({
        data: z
          .object({
            primary: z.string().min(1).optional(),
            lob: z.array(z.string().min(1)).optional(),
          })
          .optional(),
      })
      .optional(),
    subpartition_defaults: z
      .object({
        min_count: z.number().int().min(1).optional(),
        max_count: z.number().int().max(1024).optional(),
        size_based_recommendations: z.array(SizeTierSchema).optional(),
      })
      .optional(),
    parallel_defaults: z
      .object({
        min_degree: z.number().int().min(1).optional(),
        max_degree: z.number().int().min(1).optional(),
        default_degree: z.number().int().min(1).optional(),
      })
      .optional(),
  })
  .strict();

export type EnvironmentOverride = z.infer<typeof EnvironmentOverrideSchema>;

// =============================================================================
// ENVIRONMENT CATALOG (environments.yaml root)
// =============================================================================

export const RuntimeSettingsSchema = z.object({
  query_timeout_ms: z.number().int().positive().default(60000),
  sample_size: z.number().int().min(1).max(100000).default(1000),
});

export type RuntimeSettings = z.infer<typeof RuntimeSettingsSchema>;

export const EnvironmentCatalogSchema = z.object({
  version: z.literal('1.0').optional(),
  environments: z.record(EnvironmentOverrideSchema).default({}),
  settings: RuntimeSettingsSchema.default({}),
});

export type EnvironmentCatalog = z.infer<typeof EnvironmentCatalogSchema>;
