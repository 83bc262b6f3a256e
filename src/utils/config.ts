/**
 * Configuration Management
 *
 * Loads environments.yaml and resolves database connection settings from
 * the command line or the process environment.
 *
 * @module utils/config
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { logger } from './logger.js';
import { EnvironmentCatalogSchema } from '../config/schema.js';
import type { EnvironmentCatalog, RuntimeSettings } from '../config/schema.js';
import { createMigrationError, errorMessage, isMigrationError } from '../contracts/errors.js';
import type { ConnectionDetails } from '../contracts/types.js';

/** Default environments file path */
const DEFAULT_ENVIRONMENTS_PATH = 'config/environments.yaml';

const DEFAULT_PORT = 1521;

// =============================================================================
// ENVIRONMENTS.YAML
// =============================================================================

/**
 * Load and validate environments.yaml.
 * Returns an empty catalog (built-in defaults apply) if the file doesn't exist.
 */
export async function loadEnvironmentCatalog(configPath?: string): Promise<EnvironmentCatalog> {
  const fullPath = path.resolve(process.cwd(), configPath || DEFAULT_ENVIRONMENTS_PATH);

  let content: string;
  try {
    content = await fs.readFile(fullPath, 'utf-8');
  } catch {
    logger.debug('Environment config not found, using built-in defaults', { path: fullPath });
    return EnvironmentCatalogSchema.parse({});
  }

  try {
    const result = EnvironmentCatalogSchema.safeParse(parseYaml(content));
    if (!result.success) {
      throw createMigrationError(
        'environmentInvalid',
        `environments.yaml validation failed: ${result.error.message}`,
        { path: fullPath, issues: result.error.issues }
      );
    }
    return result.data;
  } catch (error) {
    if (isMigrationError(error)) {
      throw error;
    }
    throw createMigrationError(
      'environmentInvalid',
      `Failed to load environments.yaml: ${errorMessage(error)}`,
      { path: fullPath }
    );
  }
}

/**
 * Substitute environment variables in a string.
 * Supports ${VAR_NAME} syntax.
 */
export function substituteEnvVars(content: string): string {
  return content.replace(/\$\{([^}]+)\}/g, (match: string, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      logger.warn(`Environment variable ${varName} is not set`);
      return match; // Keep original if not set
    }
    return value;
  });
}

/**
 * Parse YAML content with environment variable substitution
 */
function parseYaml(content: string): unknown {
  return yaml.load(substituteEnvVars(content));
}

/**
 * Pick the environment name: explicit option, then MIGRATION_ENV, then global.
 */
export function detectEnvironment(explicit?: string): string {
  const name = explicit || process.env.MIGRATION_ENV || 'global';
  return name.trim().toLowerCase();
}

/**
 * Per-query timeout; MIGRATION_QUERY_TIMEOUT_MS overrides the file setting.
 */
export function getQueryTimeoutMs(settings: RuntimeSettings): number {
  const fromEnv = Number(process.env.MIGRATION_QUERY_TIMEOUT_MS);
  if (Number.isInteger(fromEnv) && fromEnv > 0) {
    return fromEnv;
  }
  return settings.query_timeout_ms;
}

// =============================================================================
// CONNECTION SETTINGS
// =============================================================================

export interface ConnectionSettings {
  user: string;
  password: string;
  /** Easy Connect string or connect descriptor handed to the driver */
  connectString: string;
  /** Original string the operator supplied, password removed */
  displayString: string;
  details: ConnectionDetails;
}

interface ParsedConnection {
  user?: string;
  password?: string;
  connectString: string;
  details: ConnectionDetails;
}

/**
 * Parse "user/password@host:port/service", "user/password@host:port:sid",
 * "host:port/service" or a bare TNS alias.
 */
export function parseConnectionString(raw: string): ParsedConnection {
  const at = raw.lastIndexOf('@');
  const credentials = at >= 0 ? raw.slice(0, at) : '';
  const target = at >= 0 ? raw.slice(at + 1) : raw;

  let user: string | undefined;
  let password: string | undefined;
  if (credentials) {
    const slash = credentials.indexOf('/');
    user = slash >= 0 ? credentials.slice(0, slash) : credentials;
    password = slash >= 0 ? credentials.slice(slash + 1) : undefined;
  }

  const slash = target.lastIndexOf('/');
  if (slash >= 0) {
    const hostPort = target.slice(0, slash);
    const service = target.slice(slash + 1);
    const colon = hostPort.lastIndexOf(':');
    const host = colon >= 0 ? hostPort.slice(0, colon) : hostPort;
    const port = colon >= 0 ? Number(hostPort.slice(colon + 1)) : DEFAULT_PORT;
    return {
      user,
      password,
      connectString: target,
      details: {
        type: 'SERVICE_NAME',
        host,
        port: Number.isInteger(port) ? port : null,
        service,
        user: user ?? null,
      },
    };
  }

  const parts = target.split(':');
  if (parts.length === 3) {
    const [host, portText, sid] = parts;
    const port = Number(portText);
    return {
      user,
      password,
      connectString:
        `(DESCRIPTION=(ADDRESS=(PROTOCOL=TCP)(HOST=${host})(PORT=${portText}))` +
        `(CONNECT_DATA=(SID=${sid})))`,
      details: {
        type: 'SID',
        host,
        port: Number.isInteger(port) ? port : null,
        service: sid,
        user: user ?? null,
      },
    };
  }

  return {
    user,
    password,
    connectString: target,
    details: { type: 'UNKNOWN', host: null, port: null, service: target, user: user ?? null },
  };
}

/**
 * Service name recorded in plan metadata and fed to the provenance hash.
 */
export function extractDatabaseService(raw: string | undefined): string {
  if (!raw) {
    return 'Unknown';
  }
  return parseConnectionString(raw).details.service || 'Unknown';
}

/**
 * True when a connection string was passed or is set in the environment.
 */
export function hasConnectionConfigured(explicit?: string): boolean {
  return Boolean(explicit || process.env.ORACLE_CONNECTION || process.env.ORACLE_CONNECT_STRING);
}

/**
 * Resolve connection settings from an explicit string or ORACLE_* variables.
 * Explicit credentials in the string win over the environment.
 */
export function resolveConnectionSettings(explicit?: string): ConnectionSettings {
  const raw = explicit || process.env.ORACLE_CONNECTION || process.env.ORACLE_CONNECT_STRING;
  if (!raw) {
    throw createMigrationError(
      'connectionMissing',
      'No connection configured. Pass --connection or set ORACLE_CONNECTION / ORACLE_CONNECT_STRING.'
    );
  }

  const parsed = parseConnectionString(raw);
  const user = parsed.user || process.env.ORACLE_USER;
  const password = parsed.password ?? process.env.ORACLE_PASSWORD;
  if (!user || password === undefined) {
    throw createMigrationError(
      'connectionMissing',
      'Database user or password missing. Include them in the connection string or set ORACLE_USER / ORACLE_PASSWORD.'
    );
  }

  return {
    user,
    password,
    connectString: parsed.connectString,
    displayString: `${user}@${raw.slice(raw.lastIndexOf('@') + 1)}`,
    details: { ...parsed.details, user },
  };
}
