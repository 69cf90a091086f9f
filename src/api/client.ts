/**
 * Thin HTTP client for a single tenant's REST API
 */

import { ApiAuthError, ApiNotFoundError, ApiRequestError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { isJsonObject } from '../types/role.js';
import type { TenantConfig } from '../types/config.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

const MAX_ERROR_DETAIL_LENGTH = 200;

export class TenantApiClient {
  readonly tenant: TenantConfig;

  constructor(tenant: TenantConfig) {
    this.tenant = tenant;
  }

  get name(): string {
    return this.tenant.name;
  }

  async get(path: string): Promise<unknown> {
    return this.request('GET', path);
  }

  async post(path: string, body: unknown): Promise<unknown> {
    return this.request('POST', path, body);
  }

  async put(path: string, body: unknown): Promise<unknown> {
    return this.request('PUT', path, body);
  }

  private get headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.tenant.apiKey}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.tenant.baseUrl}/${path}`;

    logger.verbose(`[${method}] ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      throw new ApiRequestError(method, url, error instanceof Error ? error.message : String(error));
    }

    const text = await response.text();

    if (!response.ok) {
      logger.verbose(`[${method}] ${url} error response: ${text}`);
      throw createApiError(method, url, response.status, describeErrorBody(text, response.statusText));
    }

    if (!text.trim()) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new ApiRequestError(method, url, 'Response body is not valid JSON', response.status);
    }
  }
}

/**
 * Map an HTTP status to the matching error class
 */
export function createApiError(method: string, url: string, status: number, detail: string): ApiRequestError {
  if (status === 401 || status === 403) {
    return new ApiAuthError(method, url, detail, status);
  }
  if (status === 404) {
    return new ApiNotFoundError(method, url, detail);
  }
  return new ApiRequestError(method, url, detail, status);
}

/**
 * Pull a human-readable message out of an error response body
 */
export function describeErrorBody(text: string, statusText: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isJsonObject(parsed)) {
      for (const key of ['detail', 'message', 'error']) {
        const value = parsed[key];
        if (typeof value === 'string' && value) {
          return value;
        }
      }
    }
  } catch {
    // Not JSON, fall through to the raw text
  }

  const trimmed = text.trim();
  if (trimmed) {
    return trimmed.length > MAX_ERROR_DETAIL_LENGTH
      ? trimmed.slice(0, MAX_ERROR_DETAIL_LENGTH - 3) + '...'
      : trimmed;
  }

  return statusText || 'no response body';
}
