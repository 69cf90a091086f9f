/**
 * Scope response parsing
 *
 * The scopes endpoint has returned bare strings, objects keyed by `scope` or
 * `name`, and a few other shapes over time. These helpers reduce whatever
 * comes back to identifiers that can be written to another tenant.
 */

import { isJsonObject, type ScopeIdentifier } from '../types/role.js';

const IDENTIFIER_KEYS = ['scope', 'name', 'permission', 'id', 'slug'] as const;

/**
 * Extract one identifier per scope entry. An object with none of the known
 * keys is kept whole.
 */
export function extractScopeIdentifiers(rawScopes: unknown[]): ScopeIdentifier[] {
  const identifiers: ScopeIdentifier[] = [];

  for (const item of rawScopes) {
    if (typeof item === 'string') {
      identifiers.push(item);
      continue;
    }

    if (!isJsonObject(item)) {
      continue;
    }

    const identifier = identifierFromObject(item);
    identifiers.push(identifier ?? item);
  }

  return identifiers;
}

function identifierFromObject(item: Record<string, unknown>): string | undefined {
  for (const key of IDENTIFIER_KEYS) {
    if (!(key in item)) continue;

    const value = item[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

export interface ScopeNames {
  names: string[];
  dropped: ScopeIdentifier[];
}

/**
 * Reduce identifiers to the scope names the replace endpoint accepts.
 * Objects contribute their `name`, else their `scope`; anything else is dropped.
 */
export function toScopeNames(identifiers: ScopeIdentifier[]): ScopeNames {
  const names: string[] = [];
  const dropped: ScopeIdentifier[] = [];

  for (const identifier of identifiers) {
    if (typeof identifier === 'string') {
      names.push(identifier);
      continue;
    }

    const name = identifier['name'] ?? identifier['scope'];
    if (typeof name === 'string') {
      names.push(name);
    } else {
      dropped.push(identifier);
    }
  }

  return { names, dropped };
}

export function formatScope(identifier: ScopeIdentifier): string {
  return typeof identifier === 'string' ? identifier : JSON.stringify(identifier);
}
