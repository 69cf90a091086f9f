#!/usr/bin/env node

/**
 * Tenant Role Cloner CLI
 *
 * Clone custom RBAC roles from one tenant to sibling tenants
 */

import { program } from 'commander';
import { cloneCommand } from './commands/clone.js';
import { DEFAULT_CONFIG_PATH } from './types/config.js';

program
  .name('role-cloner')
  .description('Clone a custom RBAC role (name + permission scopes) from one tenant to others')
  .version('0.1.0')
  .option(
    '--config <path>',
    'Path to tenant configuration JSON file',
    DEFAULT_CONFIG_PATH
  )
  .option(
    '--source-tenant <name>',
    'Friendly name of the source tenant (from config)'
  )
  .option(
    '--role-name <name>',
    'Name of the custom role to clone (matched case-insensitively)'
  )
  .option(
    '--target-tenants <names>',
    'Comma-separated list of target tenant names'
  )
  .option(
    '--all-targets',
    'Clone to ALL tenants in config (except source)'
  )
  .option(
    '--list-roles',
    'List all roles in the source tenant'
  )
  .option(
    '--export-role <file>',
    'Export the role definition to a JSON file (for sharing/auditing)'
  )
  .option(
    '--from-export <file>',
    'Clone a role definition previously written by --export-role instead of reading the source tenant'
  )
  .option(
    '--dry-run',
    'Preview actions without making any changes'
  )
  .option(
    '--yes',
    'Skip the confirmation prompt'
  )
  .option(
    '--verbose',
    'Show detailed API call information'
  )
  .option(
    '--sample-config',
    'Print a sample tenants.json and exit'
  )
  .addHelpText(
    'after',
    `
Examples:
  # Clone "Field Tech" from acme-master to two specific tenants
  $ role-cloner --source-tenant acme-master --role-name "Field Tech" \\
      --target-tenants "acme-region-east,acme-region-west"

  # Preview cloning to every other tenant in the config
  $ role-cloner --source-tenant acme-master --role-name "Field Tech" --all-targets --dry-run

  # List all roles in a tenant
  $ role-cloner --source-tenant acme-master --list-roles`
  )
  .action(cloneCommand);

program.parse();
