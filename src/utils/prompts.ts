/**
 * User prompts and confirmations
 */

import inquirer from 'inquirer';
import * as logger from './logger.js';
import { toScopeNames } from '../parsers/scopes.js';
import type { RoleDefinition } from '../types/role.js';
import type { TenantConfig } from '../types/config.js';

export interface ClonePlan {
  definition: RoleDefinition;
  sourceName: string;
  targets: TenantConfig[];
  dryRun: boolean;
}

export function printClonePlan(plan: ClonePlan): void {
  if (plan.dryRun) {
    logger.newline();
    logger.warn('DRY RUN MODE - no changes will be made');
  }

  logger.header('Role Clone Summary');

  console.log(`Role:    ${plan.definition.name}`);
  const { names, dropped } = toScopeNames(plan.definition.scopes);
  const skipped = dropped.length > 0 ? ` (${dropped.length} without a name will be skipped)` : '';
  console.log(`Scopes:  ${names.length} permission(s)${skipped}`);
  console.log(`Source:  ${plan.sourceName}`);
  console.log(`Targets: ${plan.targets.map(t => t.name).join(', ')}`);
  logger.newline();

  logger.table([
    ['Target', 'Tenant', 'API'],
    ...plan.targets.map(t => [t.name, t.tenantName, t.baseUrl]),
  ]);
}

/**
 * Prompts need an interactive terminal; piped and CI runs skip them
 */
export function canPrompt(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export async function confirmClone(plan: ClonePlan): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: `Create or overwrite role '${plan.definition.name}' in ${plan.targets.length} tenant(s)?`,
      default: false,
    },
  ]);

  return proceed;
}
