/**
 * Role operations on the authorization v2 roles API
 *
 *   GET  authz2/v1/roles/               list roles
 *   POST authz2/v1/roles/               create role
 *   GET  authz2/v1/roles/{id}/scopes    read scopes
 *   PUT  authz2/v1/roles/{id}/scopes    replace scopes
 */

import { ApiRequestError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { roleNamesMatch } from '../utils/validation.js';
import { toScopeNames, formatScope } from '../parsers/scopes.js';
import { isJsonObject, type JsonObject, type RoleSummary, type ScopeIdentifier } from '../types/role.js';
import type { TenantApiClient } from './client.js';

const ROLES_PATH = 'authz2/v1/roles/';

function scopesPath(roleId: string): string {
  return `authz2/v1/roles/${encodeURIComponent(roleId)}/scopes`;
}

/**
 * Pick the list out of a response that may be a bare array or wrap it under
 * one of the given keys.
 */
function unwrapList(result: unknown, keys: string[]): unknown[] {
  if (Array.isArray(result)) {
    return result;
  }

  if (isJsonObject(result)) {
    for (const key of keys) {
      const value = result[key];
      if (Array.isArray(value)) {
        return value;
      }
    }
  }

  return [];
}

/**
 * Role id from `id`, else `role_id`, as a string
 */
function readRoleId(raw: JsonObject): string | undefined {
  const rawId = raw.id ?? raw.role_id;
  return typeof rawId === 'string' || typeof rawId === 'number' ? String(rawId) : undefined;
}

/**
 * Normalise a role object from the API. Returns undefined for entries that
 * do not carry a name.
 */
export function toRoleSummary(raw: unknown): RoleSummary | undefined {
  if (!isJsonObject(raw)) {
    return undefined;
  }

  const { name, description } = raw;
  if (typeof name !== 'string') {
    return undefined;
  }

  return {
    id: readRoleId(raw),
    name,
    description: typeof description === 'string' ? description : '',
  };
}

export async function listRoles(client: TenantApiClient): Promise<RoleSummary[]> {
  const result = await client.get(ROLES_PATH);

  const roles: RoleSummary[] = [];
  for (const raw of unwrapList(result, ['roles', 'results'])) {
    const role = toRoleSummary(raw);
    if (role) {
      roles.push(role);
    } else {
      logger.verbose(`Ignoring role entry without a name in ${client.name}`);
    }
  }

  logger.verbose(`${client.name}: ${roles.length} role(s)`);
  return roles;
}

export function findRoleByName(roles: RoleSummary[], roleName: string): RoleSummary | undefined {
  return roles.find(role => roleNamesMatch(role.name, roleName));
}

export async function getRoleScopes(client: TenantApiClient, roleId: string): Promise<unknown[]> {
  const result = await client.get(scopesPath(roleId));
  return unwrapList(result, ['scopes', 'results']);
}

/**
 * Create a role with no scopes. The API must answer with the new role's id;
 * name and description fall back to what was sent.
 */
export async function createRole(
  client: TenantApiClient,
  name: string,
  description: string
): Promise<RoleSummary & { id: string }> {
  const result = await client.post(ROLES_PATH, { name, description });
  const id = isJsonObject(result) ? readRoleId(result) : undefined;

  if (!id) {
    throw new ApiRequestError(
      'POST',
      `${client.tenant.baseUrl}/${ROLES_PATH}`,
      'Create role response did not include a role id'
    );
  }

  const created = toRoleSummary(result);
  return {
    id,
    name: created?.name ?? name,
    description: created?.description || description,
  };
}

/**
 * Replace every scope on a role with the given set
 * @returns the scope names that were sent
 */
export async function replaceRoleScopes(
  client: TenantApiClient,
  roleId: string,
  scopes: ScopeIdentifier[]
): Promise<string[]> {
  const { names, dropped } = toScopeNames(scopes);

  for (const scope of dropped) {
    logger.verbose(`Skipping scope without a name: ${formatScope(scope)}`);
  }

  await client.put(scopesPath(roleId), { scope_names: names });
  return names;
}
