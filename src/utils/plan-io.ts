/**
 * Plan I/O Utilities
 *
 * Utilities for loading and saving repartitioning plan documents.
 *
 * @module utils/plan-io
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { validatePlanDocument, formatValidationErrors } from '../contracts/validators.js';
import { createMigrationError, errorMessage, isMigrationError } from '../contracts/errors.js';
import type { MigrationPlanDocument, ValidationResult } from '../contracts/types.js';

/** Default plan file path */
const DEFAULT_PLAN_PATH = 'output/migration-plan.json';

function resolvePlanPath(planPath?: string): string {
  return path.resolve(process.cwd(), planPath || DEFAULT_PLAN_PATH);
}

/**
 * Load and validate a plan document from disk.
 * Throws if file doesn't exist or validation fails.
 */
export async function loadPlan(planPath?: string): Promise<MigrationPlanDocument> {
  const fullPath = resolvePlanPath(planPath);

  if (!(await planExists(planPath))) {
    throw createMigrationError('planNotFound', `Plan file not found: ${fullPath}`, {
      path: fullPath,
    });
  }

  try {
    const content = await fs.readFile(fullPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);

    const result = validatePlanDocument(parsed);
    if (!result.success || !result.data) {
      throw createMigrationError(
        'planInvalid',
        `Plan validation failed: ${formatValidationErrors(result.errors).join(', ')}`,
        { path: fullPath, errors: result.errors }
      );
    }

    return result.data;
  } catch (error) {
    if (isMigrationError(error)) {
      throw error;
    }
    throw createMigrationError('planInvalid', `Failed to load plan: ${errorMessage(error)}`, {
      path: fullPath,
    });
  }
}

/**
 * Load a plan without validation (for the configuration validator, which
 * reports structural problems itself).
 */
export async function loadPlanRaw(planPath?: string): Promise<unknown> {
  const fullPath = resolvePlanPath(planPath);

  let content: string;
  try {
    content = await fs.readFile(fullPath, 'utf-8');
  } catch (error) {
    throw createMigrationError('planNotFound', `Failed to read plan: ${errorMessage(error)}`, {
      path: fullPath,
    });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw createMigrationError('planInvalid', `Plan is not valid JSON: ${errorMessage(error)}`, {
      path: fullPath,
    });
  }
}

/**
 * Check if a plan file exists.
 */
export async function planExists(planPath?: string): Promise<boolean> {
  try {
    await fs.access(resolvePlanPath(planPath));
    return true;
  } catch {
    return false;
  }
}

/**
 * Save a plan document to disk (2-space indented JSON).
 * Creates the parent directory if it doesn't exist.
 */
export async function savePlan(document: MigrationPlanDocument, planPath?: string): Promise<string> {
  const fullPath = resolvePlanPath(planPath);

  try {
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
    return fullPath;
  } catch (error) {
    throw createMigrationError('planWriteFailed', `Failed to write plan: ${errorMessage(error)}`, {
      path: fullPath,
    });
  }
}

/**
 * Validate a plan file and return the result.
 * Does not throw on validation failure.
 */
export async function validatePlanFile(
  planPath?: string
): Promise<ValidationResult<MigrationPlanDocument>> {
  const fullPath = resolvePlanPath(planPath);

  if (!(await planExists(planPath))) {
    return {
      success: false,
      errors: [{ path: 'file', message: `Plan file not found: ${fullPath}` }],
    };
  }

  try {
    const content = await fs.readFile(fullPath, 'utf-8');
    return validatePlanDocument(JSON.parse(content));
  } catch (error) {
    return {
      success: false,
      errors: [{ path: 'parse', message: `Failed to parse plan: ${errorMessage(error)}` }],
    };
  }
}

/**
 * Get the default plan path.
 */
export function getDefaultPlanPath(): string {
  return resolvePlanPath();
}
