/**
 * Target tenant selection
 */

import { NoTargetsError, UsageError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { parseCommaList } from '../utils/validation.js';
import type { TenantConfig } from '../types/config.js';

export interface TargetSelection {
  allTargets?: boolean;
  targetTenants?: string;
}

export function hasTargetSelection(selection: TargetSelection): boolean {
  return Boolean(selection.allTargets || selection.targetTenants);
}

/**
 * Resolve the target tenants for a clone. `allTargets` takes precedence over
 * an explicit list. The source tenant is never a target.
 */
export function resolveTargets(
  tenants: Map<string, TenantConfig>,
  sourceName: string | undefined,
  selection: TargetSelection
): TenantConfig[] {
  const targets: TenantConfig[] = [];

  if (selection.allTargets) {
    for (const [name, tenant] of tenants) {
      if (name !== sourceName) {
        targets.push(tenant);
      }
    }
  } else if (selection.targetTenants) {
    for (const name of parseCommaList(selection.targetTenants)) {
      const tenant = tenants.get(name);
      if (!tenant) {
        logger.warn(`Target tenant '${name}' not found in config, skipping.`);
      } else if (name === sourceName) {
        logger.warn(`Skipping source tenant '${name}' as a target.`);
      } else {
        targets.push(tenant);
      }
    }
  } else {
    throw new UsageError('Specify --target-tenants or --all-targets');
  }

  if (targets.length === 0) {
    throw new NoTargetsError();
  }

  return targets;
}
