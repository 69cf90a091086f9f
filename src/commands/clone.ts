/**
 * Clone command implementation
 *
 * 1. Load tenants from the config file
 * 2. List roles, or read a role definition from the source tenant (or an export file)
 * 3. Export the definition, or write it to each target tenant in turn
 * 4. Report per-target results; any failed target makes the exit code 1
 */

import ora, { type Ora } from 'ora';
import { TenantApiClient } from '../api/client.js';
import { listRoles } from '../api/roles.js';
import { fetchRoleDefinition, cloneToTenants, isSuccessful } from '../cloner/role-cloner.js';
import { hasTargetSelection, resolveTargets } from '../cloner/targets.js';
import { readRoleExport, writeRoleExport } from '../export/role-export.js';
import { formatSampleConfig, loadTenantConfig } from '../parsers/tenants-config.js';
import { ConfigNotFoundError, RoleClonerError, UnknownTenantError, UsageError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { setVerbose } from '../utils/logger.js';
import { canPrompt, confirmClone, printClonePlan, type ClonePlan } from '../utils/prompts.js';
import type { CloneOptions, TenantConfig } from '../types/config.js';
import type { CloneResult, RoleDefinition, RoleSummary } from '../types/role.js';

export async function cloneCommand(options: CloneOptions): Promise<void> {
  const exitCode = await runClone(options);
  process.exit(exitCode);
}

/**
 * Run the command and return the process exit code
 */
export async function runClone(options: CloneOptions): Promise<number> {
  try {
    if (options.verbose) {
      setVerbose(true);
    }

    if (options.sampleConfig) {
      console.log(formatSampleConfig());
      return 0;
    }

    validateOptions(options);

    const tenants = await loadTenantConfig(options.config);

    if (options.listRoles) {
      await showRoles(getTenant(tenants, options.sourceTenant));
      return 0;
    }

    const { definition, sourceLabel } = await loadDefinition(options, tenants);

    if (options.exportRole) {
      await writeRoleExport(options.exportRole, definition);
      logger.success(`Role definition exported to: ${options.exportRole}`);
      return 0;
    }

    const plan: ClonePlan = {
      definition,
      sourceName: sourceLabel,
      targets: resolveTargets(tenants, options.sourceTenant, options),
      dryRun: Boolean(options.dryRun),
    };

    printClonePlan(plan);

    if (!plan.dryRun && !options.yes && canPrompt()) {
      const confirmed = await confirmClone(plan);
      if (!confirmed) {
        logger.info('Clone cancelled by user.');
        return 0;
      }
    }

    const results = await cloneToTenants(
      plan.targets.map(tenant => new TenantApiClient(tenant)),
      definition,
      { dryRun: plan.dryRun }
    );

    return reportResults(results, plan.dryRun);
  } catch (error) {
    if (error instanceof RoleClonerError) {
      logger.error(error.message);
      if (error instanceof ConfigNotFoundError) {
        logger.newline();
        console.log(formatSampleConfig());
      }
      return 1;
    }

    logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    if (logger.isVerbose() && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return 1;
  }
}

/**
 * Argument checks that do not need the config file or the network
 */
function validateOptions(options: CloneOptions): void {
  if (options.listRoles) {
    if (!options.sourceTenant) {
      throw new UsageError('--source-tenant is required');
    }
    return;
  }

  if (!options.fromExport) {
    if (!options.sourceTenant) {
      throw new UsageError('--source-tenant is required (or use --from-export)');
    }
    if (!options.roleName) {
      throw new UsageError('--role-name is required (or use --list-roles to see available roles)');
    }
  }

  if (!options.exportRole && !hasTargetSelection(options)) {
    throw new UsageError('Specify --target-tenants or --all-targets');
  }
}

function getTenant(tenants: Map<string, TenantConfig>, name: string | undefined): TenantConfig {
  const tenant = name ? tenants.get(name) : undefined;
  if (!name || !tenant) {
    throw new UnknownTenantError(name ?? '', Array.from(tenants.keys()));
  }
  return tenant;
}

/**
 * Spinner frames and verbose request lines share the terminal, so the
 * animation is off in verbose mode.
 */
function startSpinner(text: string): Ora {
  return ora({ text, isEnabled: !logger.isVerbose() }).start();
}

async function showRoles(source: TenantConfig): Promise<void> {
  const spinner = startSpinner(`Fetching roles from ${source.name}...`);

  let roles: RoleSummary[];
  try {
    roles = await listRoles(new TenantApiClient(source));
  } catch (error) {
    spinner.fail(`Could not list roles in ${source.name}`);
    throw error;
  }
  spinner.succeed(`Fetched roles from ${source.name}`);

  logger.header(`Roles in tenant: ${source.name}`);

  if (roles.length > 0) {
    logger.table([
      ['Name', 'ID', 'Description'],
      ...roles.map(role => [role.name, role.id ?? 'N/A', role.description]),
    ]);
    logger.newline();
  }

  logger.info(`Total: ${roles.length} role(s)`);
}

async function loadDefinition(
  options: CloneOptions,
  tenants: Map<string, TenantConfig>
): Promise<{ definition: RoleDefinition; sourceLabel: string }> {
  if (options.fromExport) {
    if (options.sourceTenant) {
      getTenant(tenants, options.sourceTenant);
    }

    const definition = await readRoleExport(options.fromExport);
    logger.success(`Loaded role '${definition.name}' with ${definition.scopes.length} scope(s) from ${options.fromExport}`);
    return { definition, sourceLabel: options.fromExport };
  }

  const source = getTenant(tenants, options.sourceTenant);
  const roleName = options.roleName ?? '';

  const spinner = startSpinner(`Fetching role '${roleName}' from ${source.name}...`);
  try {
    const { roleId, definition } = await fetchRoleDefinition(new TenantApiClient(source), roleName);
    spinner.succeed(
      `Found role: ${definition.name} (ID: ${roleId}), captured ${definition.scopes.length} permission scope(s)`
    );
    return { definition, sourceLabel: source.name };
  } catch (error) {
    spinner.fail(`Could not fetch role '${roleName}' from ${source.name}`);
    throw error;
  }
}

const OUTCOME_LABELS: Record<CloneResult['outcome'], string> = {
  created: 'created',
  updated: 'updated',
  'would-create': 'would create',
  'would-update': 'would update',
  failed: 'FAILED',
};

function reportResults(results: CloneResult[], dryRun: boolean): number {
  logger.header('Results Summary');

  logger.table([
    ['Target', 'Result', 'Role ID', 'Scopes'],
    ...results.map(result => [
      result.tenant,
      result.failedStage ? `${OUTCOME_LABELS[result.outcome]} (${result.failedStage})` : OUTCOME_LABELS[result.outcome],
      result.roleId ?? '-',
      String(result.scopeCount),
    ]),
  ]);
  logger.newline();

  const succeeded = results.filter(isSuccessful).length;
  const failed = results.length - succeeded;
  const summary = `${succeeded} succeeded, ${failed} failed out of ${results.length} target(s)`;

  if (failed > 0) {
    logger.warn(summary);
    return 1;
  }

  logger.success(summary);
  if (dryRun) {
    logger.info('Dry run complete. No changes were made.');
  }
  return 0;
}
