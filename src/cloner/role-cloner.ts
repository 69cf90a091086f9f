/**
 * Role cloning workflow
 *
 * Reads a role definition from a source tenant and writes it to targets one
 * at a time. A target that fails is reported in its result and the next
 * target still runs.
 */

import { findRoleByName, getRoleScopes, listRoles, createRole, replaceRoleScopes } from '../api/roles.js';
import { extractScopeIdentifiers, formatScope, toScopeNames } from '../parsers/scopes.js';
import { ApiAuthError, ApiRequestError, RoleClonerError, RoleNotFoundError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import type { TenantApiClient } from '../api/client.js';
import type { CloneResult, CloneStage, RoleDefinition } from '../types/role.js';

export interface FetchedRole {
  roleId: string;
  definition: RoleDefinition;
}

export interface CloneToTenantOptions {
  dryRun?: boolean;
}

const STAGE_LABELS: Record<CloneStage, string> = {
  lookup: 'Failed to look up roles',
  create: 'Failed to create role',
  apply: 'Failed to apply scopes',
};

/**
 * Fetch a complete role definition (metadata + scopes) from the source tenant
 */
export async function fetchRoleDefinition(source: TenantApiClient, roleName: string): Promise<FetchedRole> {
  const roles = await listRoles(source);
  const role = findRoleByName(roles, roleName);

  if (!role) {
    throw new RoleNotFoundError(roleName, source.name, roles.map(r => r.name));
  }

  if (!role.id) {
    throw new RoleClonerError(`Role '${role.name}' in tenant '${source.name}' has no id`);
  }

  logger.verbose(`Found role: ${role.name} (ID: ${role.id})`);

  const rawScopes = await getRoleScopes(source, role.id);
  const scopes = extractScopeIdentifiers(rawScopes);

  logger.verbose(`Captured ${scopes.length} permission scope(s)`);
  for (const scope of scopes) {
    logger.verbose(`  • ${formatScope(scope)}`);
  }

  return {
    roleId: role.id,
    definition: {
      name: role.name,
      description: role.description,
      scopes,
      rawScopes,
    },
  };
}

/**
 * Create or update the role in one target tenant.
 *
 * Existing role: scopes are replaced. Missing role: the role is created, then
 * scopes are applied. In dry-run mode only the lookup is performed.
 */
export async function cloneToTenant(
  target: TenantApiClient,
  definition: RoleDefinition,
  options: CloneToTenantOptions = {}
): Promise<CloneResult> {
  const { dryRun = false } = options;
  const roleName = definition.name;
  const scopeCount = toScopeNames(definition.scopes).names.length;

  logger.header(`Cloning '${roleName}' → ${target.name}`);

  let stage: CloneStage = 'lookup';
  let roleId: string | undefined;
  let createdRole = false;

  try {
    const roles = await listRoles(target);
    const existing = findRoleByName(roles, roleName);

    if (existing) {
      if (!existing.id) {
        logger.error(`Role '${existing.name}' exists in ${target.name} but has no id`);
        return { tenant: target.name, outcome: 'failed', scopeCount, failedStage: 'lookup', error: 'Existing role has no id' };
      }

      roleId = existing.id;
      logger.warn(`Role '${existing.name}' already exists in ${target.name} (ID: ${roleId})`);

      if (dryRun) {
        logger.info(`[DRY RUN] Would update ${scopeCount} scope(s) on existing role`);
        return { tenant: target.name, outcome: 'would-update', roleId, scopeCount };
      }

      logger.info('Updating scopes on existing role...');
      stage = 'apply';
      await replaceRoleScopes(target, roleId, definition.scopes);
      logger.success(`Updated ${scopeCount} scope(s)`);
      return { tenant: target.name, outcome: 'updated', roleId, scopeCount };
    }

    if (dryRun) {
      logger.info(`[DRY RUN] Would create role '${roleName}' with ${scopeCount} scope(s)`);
      return { tenant: target.name, outcome: 'would-create', scopeCount };
    }

    stage = 'create';
    const created = await createRole(target, roleName, definition.description);
    roleId = created.id;
    createdRole = true;
    logger.success(`Created role (ID: ${roleId})`);

    stage = 'apply';
    await replaceRoleScopes(target, roleId, definition.scopes);
    logger.success(`Applied ${scopeCount} permission scope(s)`);

    return { tenant: target.name, outcome: 'created', roleId, scopeCount };
  } catch (error) {
    if (!(error instanceof ApiRequestError)) {
      throw error;
    }

    logger.error(`${STAGE_LABELS[stage]}: ${error.message}`);
    if (error instanceof ApiAuthError) {
      logger.warn(`Check the api_key configured for ${target.name}`);
    }
    if (createdRole) {
      logger.warn('Role was created without scopes. Apply them manually or delete the empty role.');
    }

    return {
      tenant: target.name,
      outcome: 'failed',
      roleId,
      scopeCount,
      failedStage: stage,
      error: error.message,
    };
  }
}

/**
 * Clone to every target in order
 */
export async function cloneToTenants(
  targets: TenantApiClient[],
  definition: RoleDefinition,
  options: CloneToTenantOptions = {}
): Promise<CloneResult[]> {
  const results: CloneResult[] = [];
  for (const target of targets) {
    results.push(await cloneToTenant(target, definition, options));
  }
  return results;
}

export function isSuccessful(result: CloneResult): boolean {
  return result.outcome !== 'failed';
}
