/**
 * Role definition export files, for sharing and auditing
 */

import { readFile, writeFile } from 'node:fs/promises';
import { ExportFileError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { isJsonObject, type RoleDefinition, type RoleExportFile, type ScopeIdentifier } from '../types/role.js';

export function toExportFile(definition: RoleDefinition): RoleExportFile {
  return {
    name: definition.name,
    description: definition.description,
    scopes: definition.scopes,
    raw_scopes: definition.rawScopes,
  };
}

export async function writeRoleExport(filePath: string, definition: RoleDefinition): Promise<void> {
  const content = JSON.stringify(toExportFile(definition), null, 2) + '\n';
  await writeFile(filePath, content, 'utf-8');
  logger.verbose(`Wrote ${content.length} bytes to ${filePath}`);
}

export async function readRoleExport(filePath: string): Promise<RoleDefinition> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ExportFileError(filePath, `Could not read file: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ExportFileError(filePath, `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseExportFile(filePath, parsed);
}

export function parseExportFile(filePath: string, parsed: unknown): RoleDefinition {
  if (!isJsonObject(parsed)) {
    throw new ExportFileError(filePath, 'Expected a JSON object');
  }

  const { name, description, scopes, raw_scopes: rawScopes } = parsed;

  if (typeof name !== 'string' || !name.trim()) {
    throw new ExportFileError(filePath, 'Missing "name"');
  }

  if (!Array.isArray(scopes)) {
    throw new ExportFileError(filePath, 'Missing "scopes" array');
  }

  const identifiers: ScopeIdentifier[] = [];
  for (const scope of scopes) {
    if (typeof scope === 'string' || isJsonObject(scope)) {
      identifiers.push(scope);
    } else {
      throw new ExportFileError(filePath, `Unsupported scope entry: ${JSON.stringify(scope)}`);
    }
  }

  return {
    name,
    description: typeof description === 'string' ? description : '',
    scopes: identifiers,
    rawScopes: Array.isArray(rawScopes) ? rawScopes : [],
  };
}
