/**
 * tenants.json parser
 *
 * Expected format:
 *
 *   {
 *     "tenants": {
 *       "friendly-name": {
 *         "tenant_name": "the-api-subdomain",
 *         "enterprise_id": "xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx",
 *         "api_key": "your-api-key-here"
 *       }
 *     }
 *   }
 *
 * The file is read with the YAML parser, which also accepts plain JSON.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { ConfigNotFoundError, ConfigParseError, NoTenantsError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { isValidTenantName } from '../utils/validation.js';
import { isJsonObject, type JsonObject } from '../types/role.js';
import { defaultBaseUrl, type TenantConfig, type TenantConfigFile } from '../types/config.js';

export const SAMPLE_CONFIG: TenantConfigFile = {
  tenants: {
    'acme-master': {
      tenant_name: 'acme-master',
      enterprise_id: 'xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx',
      api_key: 'your-api-key-for-this-tenant',
    },
    'acme-region-east': {
      tenant_name: 'acme-east',
      enterprise_id: 'yyyyyyyy-yyyy-yyyy-yyyy-yyyyyyyyyyyy',
      api_key: 'your-api-key-for-this-tenant',
    },
    'acme-region-west': {
      tenant_name: 'acme-west',
      enterprise_id: 'zzzzzzzz-zzzz-zzzz-zzzz-zzzzzzzzzzzz',
      api_key: 'your-api-key-for-this-tenant',
    },
  },
};

export function formatSampleConfig(): string {
  return JSON.stringify(SAMPLE_CONFIG, null, 2);
}

/**
 * Load all tenants from the config file, keyed by friendly name in file order
 */
export async function loadTenantConfig(configPath: string): Promise<Map<string, TenantConfig>> {
  logger.verbose(`Loading tenant config: ${configPath}`);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new ConfigNotFoundError(configPath);
    }
    throw new ConfigParseError(configPath, `Could not read file: ${error instanceof Error ? error.message : String(error)}`);
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new ConfigParseError(configPath, `Invalid syntax: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (document === null || document === undefined) {
    throw new NoTenantsError(configPath);
  }

  if (!isJsonObject(document)) {
    throw new ConfigParseError(configPath, 'Expected an object at the top level');
  }

  const rawTenants = document.tenants ?? {};
  if (!isJsonObject(rawTenants)) {
    throw new ConfigParseError(configPath, '"tenants" must be an object keyed by tenant name');
  }

  const tenants = new Map<string, TenantConfig>();
  for (const [name, details] of Object.entries(rawTenants)) {
    tenants.set(name, parseTenantEntry(configPath, name, details));
  }

  if (tenants.size === 0) {
    throw new NoTenantsError(configPath);
  }

  logger.verbose(`Loaded ${tenants.size} tenant(s): ${Array.from(tenants.keys()).join(', ')}`);

  return tenants;
}

function parseTenantEntry(configPath: string, name: string, details: unknown): TenantConfig {
  if (!isJsonObject(details)) {
    throw new ConfigParseError(configPath, `Tenant '${name}' must be an object`);
  }

  const tenantName = requireString(configPath, name, details, 'tenant_name');
  const enterpriseId = requireString(configPath, name, details, 'enterprise_id');
  const apiKey = requireString(configPath, name, details, 'api_key');

  if (!isValidTenantName(tenantName)) {
    throw new ConfigParseError(configPath, `Tenant '${name}' has an invalid tenant_name "${tenantName}"`);
  }

  return {
    name,
    tenantName,
    enterpriseId,
    apiKey,
    baseUrl: parseBaseUrl(configPath, name, details.api_base_url) ?? defaultBaseUrl(tenantName),
  };
}

function requireString(configPath: string, name: string, details: JsonObject, field: string): string {
  const value = details[field];
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigParseError(configPath, `Tenant '${name}' is missing "${field}"`);
  }
  return value.trim();
}

function parseBaseUrl(configPath: string, name: string, value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new ConfigParseError(configPath, `Tenant '${name}' has a non-string "api_base_url"`);
  }

  try {
    new URL(value);
  } catch {
    throw new ConfigParseError(configPath, `Tenant '${name}' has an invalid api_base_url "${value}"`);
  }

  return value.replace(/\/+$/, '');
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
