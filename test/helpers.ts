/**
 * Shared test helpers
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseContract } from '../src/core/loader';
import { describeError } from '../src/core/errors';
import { BreakingChange, ContractDocument } from '../src/core/types';

export const FIXTURES = path.join(__dirname, 'fixtures');
export const SPEC_ROOT = path.join(FIXTURES, 'openapi');
export const CONTRACTS = path.join(FIXTURES, 'contracts');

/**
 * Build a contract from a plain OpenAPI-shaped object.
 */
export function contract(document: unknown): ContractDocument {
  const result = parseContract(JSON.stringify(document), 'inline.json');
  if (!result.success) {
    throw new Error(describeError(result.error));
  }
  return result.data;
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function breaking(
  changeType: BreakingChange['changeType'],
  severity: BreakingChange['severity'],
  affectedPath: string,
  description = ''
): BreakingChange {
  return { changeType, severity, affectedPath, description };
}
