/**
 * Input validation utilities for tenant configuration and CLI arguments
 */

/**
 * Tenant subdomain: DNS label characters, no leading or trailing hyphen
 */
const TENANT_NAME_REGEX = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i;

/**
 * Validate a tenant subdomain
 * @returns true if valid, false otherwise
 */
export function isValidTenantName(tenantName: string): boolean {
  return TENANT_NAME_REGEX.test(tenantName);
}

/**
 * Split a comma-separated CLI value into trimmed, non-empty, unique entries
 * in first-seen order.
 */
export function parseCommaList(value: string): string[] {
  const seen = new Set<string>();
  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (trimmed) {
      seen.add(trimmed);
    }
  }
  return Array.from(seen);
}

/**
 * Role names match case-insensitively with surrounding whitespace ignored,
 * and exactly otherwise.
 */
export function roleNamesMatch(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
