import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import ora from 'ora';
import { runClone } from '../commands/clone.js';
import * as logger from '../utils/logger.js';
import { canPrompt, confirmClone } from '../utils/prompts.js';
import { formatSampleConfig } from '../parsers/tenants-config.js';
import { FakeTenantApi, makeTenant } from './helpers/fake-tenant-api.js';
import type { CloneOptions } from '../types/config.js';

vi.mock('../utils/logger.js', () => ({
  setVerbose: vi.fn(),
  isVerbose: vi.fn(() => false),
  verbose: vi.fn(),
  info: vi.fn(),
  success: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  header: vi.fn(),
  table: vi.fn(),
  newline: vi.fn(),
}));

vi.mock('../utils/prompts.js', () => ({
  printClonePlan: vi.fn(),
  canPrompt: vi.fn(() => false),
  confirmClone: vi.fn(async () => true),
}));

vi.mock('ora', () => {
  const spinner = { start: vi.fn(), succeed: vi.fn(), fail: vi.fn() };
  spinner.start.mockReturnValue(spinner);
  return { default: vi.fn(() => spinner) };
});

const master = makeTenant('acme-master');
const east = makeTenant('acme-east');
const west = makeTenant('acme-west');

const SOURCE_SCOPES = [{ scope: 'device.read' }, { scope: 'device.write' }];

describe('runClone', () => {
  let dir: string;
  let configPath: string;
  let api: FakeTenantApi;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'role-cloner-cmd-'));
    configPath = join(dir, 'tenants.json');

    const entries = Object.fromEntries(
      [master, east, west].map(t => [
        t.name,
        { tenant_name: t.tenantName, enterprise_id: t.enterpriseId, api_key: t.apiKey },
      ])
    );
    await writeFile(configPath, JSON.stringify({ tenants: entries }), 'utf-8');

    api = new FakeTenantApi()
      .addTenant(master, [
        { id: 'm-1', name: 'Admin', description: 'Everything', scopes: ['*'] },
        { id: 'm-2', name: 'Field Tech', description: 'On-site', scopes: SOURCE_SCOPES },
      ])
      .addTenant(east, [])
      .addTenant(west, [{ id: 'w-9', name: 'field tech', scopes: ['stale.scope'] }]);

    vi.stubGlobal('fetch', api.fetch);
    vi.mocked(canPrompt).mockReturnValue(false);
    vi.mocked(logger.isVerbose).mockReturnValue(false);
    vi.mocked(confirmClone).mockResolvedValue(true);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.clearAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function options(overrides: Partial<CloneOptions>): CloneOptions {
    return { config: configPath, ...overrides };
  }

  it('should print the sample config without touching the network', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const code = await runClone(options({ sampleConfig: true }));

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith(formatSampleConfig());
    expect(api.calls).toEqual([]);
    log.mockRestore();
  });

  it('should require a source tenant before any request', async () => {
    const code = await runClone(options({ roleName: 'Field Tech', allTargets: true }));

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('--source-tenant is required (or use --from-export)');
    expect(api.calls).toEqual([]);
  });

  it('should require a target selection before any request', async () => {
    const code = await runClone(options({ sourceTenant: 'acme-master', roleName: 'Field Tech' }));

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('Specify --target-tenants or --all-targets');
    expect(api.calls).toEqual([]);
  });

  it('should list roles in the source tenant', async () => {
    const code = await runClone(options({ sourceTenant: 'acme-master', listRoles: true }));

    expect(code).toBe(0);
    expect(logger.table).toHaveBeenCalledWith([
      ['Name', 'ID', 'Description'],
      ['Admin', 'm-1', 'Everything'],
      ['Field Tech', 'm-2', 'On-site'],
    ]);
    expect(logger.info).toHaveBeenCalledWith('Total: 2 role(s)');
  });

  it('should animate the spinner only outside verbose mode', async () => {
    await runClone(options({ sourceTenant: 'acme-master', listRoles: true }));
    vi.mocked(logger.isVerbose).mockReturnValue(true);
    await runClone(options({ sourceTenant: 'acme-master', listRoles: true, verbose: true }));

    expect(vi.mocked(ora).mock.calls).toEqual([
      [{ text: 'Fetching roles from acme-master...', isEnabled: true }],
      [{ text: 'Fetching roles from acme-master...', isEnabled: false }],
    ]);
  });

  it('should reject an unknown source tenant', async () => {
    const code = await runClone(options({ sourceTenant: 'acme-north', listRoles: true }));

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "Source tenant 'acme-north' not found in config. Available tenants: acme-master, acme-east, acme-west"
    );
  });

  it('should create the role where missing and update it where present', async () => {
    const code = await runClone(options({ sourceTenant: 'acme-master', roleName: 'field tech', allTargets: true }));

    expect(code).toBe(0);
    expect(api.mutatingCalls().map(c => [c.method, c.url])).toEqual([
      ['POST', `${east.baseUrl}/authz2/v1/roles/`],
      ['PUT', `${east.baseUrl}/authz2/v1/roles/role-100/scopes`],
      ['PUT', `${west.baseUrl}/authz2/v1/roles/w-9/scopes`],
    ]);
    expect(api.rolesOf(east)).toEqual([
      { id: 'role-100', name: 'Field Tech', description: 'On-site', scopes: ['device.read', 'device.write'] },
    ]);
    expect(api.rolesOf(west)[0].scopes).toEqual(['device.read', 'device.write']);
    expect(logger.success).toHaveBeenCalledWith('2 succeeded, 0 failed out of 2 target(s)');
  });

  it('should authenticate to each tenant with its own key', async () => {
    await runClone(options({ sourceTenant: 'acme-master', roleName: 'Field Tech', targetTenants: 'acme-east' }));

    for (const tenant of [master, east]) {
      const keys = new Set(api.callsTo(tenant).map(c => c.authorization));
      expect(keys).toEqual(new Set([`Bearer ${tenant.apiKey}`]));
    }
    expect(api.callsTo(west)).toEqual([]);
  });

  it('should keep going when one target fails and exit with 1', async () => {
    api.failOn(east, 'GET', 403, { detail: 'Forbidden.' });

    const code = await runClone(options({ sourceTenant: 'acme-master', roleName: 'Field Tech', allTargets: true }));

    expect(code).toBe(1);
    expect(api.mutatingCalls().map(c => c.url)).toEqual([`${west.baseUrl}/authz2/v1/roles/w-9/scopes`]);
    expect(logger.warn).toHaveBeenCalledWith('1 succeeded, 1 failed out of 2 target(s)');
    expect(logger.table).toHaveBeenLastCalledWith([
      ['Target', 'Result', 'Role ID', 'Scopes'],
      ['acme-east', 'FAILED (lookup)', '-', '2'],
      ['acme-west', 'updated', 'w-9', '2'],
    ]);
  });

  it('should make no mutating calls in a dry run', async () => {
    const code = await runClone(
      options({ sourceTenant: 'acme-master', roleName: 'Field Tech', allTargets: true, dryRun: true })
    );

    expect(code).toBe(0);
    expect(api.mutatingCalls()).toEqual([]);
    expect(confirmClone).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith('Dry run complete. No changes were made.');
  });

  it('should fail when the role does not exist in the source', async () => {
    const code = await runClone(options({ sourceTenant: 'acme-master', roleName: 'Auditor', allTargets: true }));

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "Role 'Auditor' not found in tenant 'acme-master'. Available roles: Admin, Field Tech"
    );
    expect(api.mutatingCalls()).toEqual([]);
  });

  it('should export the role and clone it again from the file', async () => {
    const exportPath = join(dir, 'field-tech.json');

    const exportCode = await runClone(
      options({ sourceTenant: 'acme-master', roleName: 'Field Tech', exportRole: exportPath })
    );

    expect(exportCode).toBe(0);
    expect(api.mutatingCalls()).toEqual([]);
    expect(JSON.parse(await readFile(exportPath, 'utf-8'))).toEqual({
      name: 'Field Tech',
      description: 'On-site',
      scopes: ['device.read', 'device.write'],
      raw_scopes: SOURCE_SCOPES,
    });

    api.calls.length = 0;
    const cloneCode = await runClone(options({ fromExport: exportPath, targetTenants: 'acme-east' }));

    expect(cloneCode).toBe(0);
    expect(api.callsTo(master)).toEqual([]);
    expect(api.rolesOf(east)[0]).toMatchObject({ name: 'Field Tech', scopes: ['device.read', 'device.write'] });
  });

  it('should stop when the confirmation is declined', async () => {
    vi.mocked(canPrompt).mockReturnValue(true);
    vi.mocked(confirmClone).mockResolvedValue(false);

    const code = await runClone(options({ sourceTenant: 'acme-master', roleName: 'Field Tech', allTargets: true }));

    expect(code).toBe(0);
    expect(logger.info).toHaveBeenCalledWith('Clone cancelled by user.');
    expect(api.mutatingCalls()).toEqual([]);
  });

  it('should skip the confirmation with --yes', async () => {
    vi.mocked(canPrompt).mockReturnValue(true);

    await runClone(options({ sourceTenant: 'acme-master', roleName: 'Field Tech', allTargets: true, yes: true }));

    expect(confirmClone).not.toHaveBeenCalled();
    expect(api.mutatingCalls()).toHaveLength(3);
  });

  it('should print the sample config when the config file is missing', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const code = await runClone({ config: join(dir, 'missing.json'), sourceTenant: 'acme-master', listRoles: true });

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining('Config file not found'));
    expect(log).toHaveBeenCalledWith(formatSampleConfig());
    log.mockRestore();
  });
});
