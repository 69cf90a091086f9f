/**
 * Custom error types for better error handling
 */

export class RoleClonerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoleClonerError';
  }
}

export class UsageError extends RoleClonerError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigNotFoundError extends RoleClonerError {
  configPath: string;

  constructor(configPath: string) {
    super(
      `Config file not found: ${configPath}. ` +
      'Create a tenants.json file with your tenant credentials (see --sample-config).'
    );
    this.name = 'ConfigNotFoundError';
    this.configPath = configPath;
  }
}

export class ConfigParseError extends RoleClonerError {
  configPath: string;

  constructor(configPath: string, cause: string) {
    super(`Failed to parse config file ${configPath}: ${cause}`);
    this.name = 'ConfigParseError';
    this.configPath = configPath;
  }
}

export class NoTenantsError extends RoleClonerError {
  constructor(configPath: string) {
    super(`No tenants found in config file ${configPath}.`);
    this.name = 'NoTenantsError';
  }
}

export class UnknownTenantError extends RoleClonerError {
  tenantName: string;

  constructor(tenantName: string, available: string[]) {
    super(
      `Source tenant '${tenantName}' not found in config. ` +
      `Available tenants: ${available.join(', ')}`
    );
    this.name = 'UnknownTenantError';
    this.tenantName = tenantName;
  }
}

export class NoTargetsError extends RoleClonerError {
  constructor() {
    super('No valid target tenants to clone to.');
    this.name = 'NoTargetsError';
  }
}

export class RoleNotFoundError extends RoleClonerError {
  roleName: string;
  tenantName: string;
  availableRoles: string[];

  constructor(roleName: string, tenantName: string, availableRoles: string[]) {
    const available = availableRoles.length > 0 ? availableRoles.join(', ') : '(none)';
    super(
      `Role '${roleName}' not found in tenant '${tenantName}'. ` +
      `Available roles: ${available}`
    );
    this.name = 'RoleNotFoundError';
    this.roleName = roleName;
    this.tenantName = tenantName;
    this.availableRoles = availableRoles;
  }
}

export class ExportFileError extends RoleClonerError {
  filePath: string;

  constructor(filePath: string, cause: string) {
    super(`Invalid role export file ${filePath}: ${cause}`);
    this.name = 'ExportFileError';
    this.filePath = filePath;
  }
}

/**
 * A request to a tenant API that failed at the transport level or returned a
 * non-2xx status. `status` is undefined when no response was received.
 */
export class ApiRequestError extends RoleClonerError {
  method: string;
  url: string;
  status?: number;

  constructor(method: string, url: string, detail: string, status?: number) {
    const prefix = status !== undefined ? `${method} ${url} returned ${status}` : `${method} ${url} failed`;
    super(`${prefix}: ${detail}`);
    this.name = 'ApiRequestError';
    this.method = method;
    this.url = url;
    this.status = status;
  }
}

/** 401 or 403 from a tenant API */
export class ApiAuthError extends ApiRequestError {
  constructor(method: string, url: string, detail: string, status: number) {
    super(method, url, detail, status);
    this.name = 'ApiAuthError';
  }
}

export class ApiNotFoundError extends ApiRequestError {
  constructor(method: string, url: string, detail: string) {
    super(method, url, detail, 404);
    this.name = 'ApiNotFoundError';
  }
}
