/**
 * Role and scope types shared by the API layer and the cloner
 */

export type JsonObject = { [key: string]: unknown };

/**
 * A role as listed by the roles endpoint
 */
export interface RoleSummary {
  id?: string;
  name: string;
  description: string;
}

/**
 * Identifier extracted from a scopes response: the scope's name when one of
 * the known keys carries it, otherwise the raw scope object.
 */
export type ScopeIdentifier = string | JsonObject;

/**
 * A portable role definition that can be applied to any tenant
 */
export interface RoleDefinition {
  name: string;
  description: string;
  scopes: ScopeIdentifier[];
  rawScopes: unknown[];
}

/**
 * On-disk shape of an exported role definition
 */
export interface RoleExportFile {
  name: string;
  description: string;
  scopes: ScopeIdentifier[];
  raw_scopes: unknown[];
}

export type CloneOutcome = 'created' | 'updated' | 'would-create' | 'would-update' | 'failed';

export type CloneStage = 'lookup' | 'create' | 'apply';

export interface CloneResult {
  tenant: string;
  outcome: CloneOutcome;
  roleId?: string;
  scopeCount: number;
  failedStage?: CloneStage;
  error?: string;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
