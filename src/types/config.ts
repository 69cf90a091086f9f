/**
 * CLI configuration and options types
 */

export interface CloneOptions {
  config: string;
  sourceTenant?: string;
  roleName?: string;
  targetTenants?: string;
  allTargets?: boolean;
  listRoles?: boolean;
  exportRole?: string;
  fromExport?: string;
  dryRun?: boolean;
  yes?: boolean;
  verbose?: boolean;
  sampleConfig?: boolean;
}

/**
 * A tenant entry from the config file, keyed by its friendly name
 */
export interface TenantConfig {
  name: string;
  tenantName: string;
  enterpriseId: string;
  apiKey: string;
  baseUrl: string;
}

/**
 * Raw shape of one entry under "tenants" in the config file
 */
export interface TenantConfigEntry {
  tenant_name: string;
  enterprise_id: string;
  api_key: string;
  api_base_url?: string;
}

export interface TenantConfigFile {
  tenants: Record<string, TenantConfigEntry>;
}

export const DEFAULT_CONFIG_PATH = 'tenants.json';
export const API_DOMAIN = 'example.cloud';

export function defaultBaseUrl(tenantName: string): string {
  return `https://${tenantName}-api.${API_DOMAIN}/api`;
}
