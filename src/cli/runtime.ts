/**
 * Shared command setup: environment profile, runtime settings and the
 * Oracle session factory.
 *
 * @module cli/runtime
 */

import { getSessionFactory } from '../connectors/index.js';
import type { SessionFactory } from '../connectors/index.js';
import type { RuntimeSettings } from '../config/schema.js';
import type { EnvironmentProfile } from '../contracts/types.js';
import {
  detectEnvironment,
  getQueryTimeoutMs,
  loadEnvironmentCatalog,
  resolveConnectionSettings,
} from '../utils/config.js';
import type { ConnectionSettings } from '../utils/config.js';
import { resolveEnvironment } from '../utils/environment.js';

export interface Runtime {
  environment: EnvironmentProfile;
  settings: RuntimeSettings;
}

export async function loadRuntime(environmentName?: string, configPath?: string): Promise<Runtime> {
  const catalog = await loadEnvironmentCatalog(configPath);
  return {
    environment: resolveEnvironment(detectEnvironment(environmentName), catalog),
    settings: catalog.settings,
  };
}

export interface DatabaseAccess {
  connection: ConnectionSettings;
  sessionFactory: SessionFactory;
}

export function openDatabase(settings: RuntimeSettings, connectionString?: string): DatabaseAccess {
  const connection = resolveConnectionSettings(connectionString);
  return {
    connection,
    sessionFactory: getSessionFactory('oracle', {
      user: connection.user,
      password: connection.password,
      connectString: connection.connectString,
      queryTimeoutMs: getQueryTimeoutMs(settings),
    }),
  };
}
