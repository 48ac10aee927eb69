/**
 * Structural Comparator
 *
 * Walks two contract documents (old, new) and produces the ordered list of
 * breaking changes between them. Additions are never reported.
 */

import {
  BreakingChange,
  ChangeType,
  ComparisonResult,
  ContractDocument,
  HTTP_METHODS,
  HttpMethod,
  Operation,
  Parameter,
  PathItem,
} from './types';
import { SeverityContext, classifySeverity } from './classifier';

// ─── Helper ─────────────────────────────────────────────────────────────────

function change(
  context: SeverityContext,
  affectedPath: string,
  description: string
): BreakingChange {
  const changeType: ChangeType = context.changeType;
  return Object.freeze({
    changeType,
    affectedPath,
    description,
    severity: classifySeverity(context),
  });
}

function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

const parameterKey = (p: Parameter): string => `${p.location}:${p.name}`;

// ─── Per-Level Passes ───────────────────────────────────────────────────────

function compareParameters(
  endpoint: string,
  oldParams: readonly Parameter[],
  newParams: readonly Parameter[]
): BreakingChange[] {
  const changes: BreakingChange[] = [];
  const newByKey = new Map(newParams.map((p) => [parameterKey(p), p]));

  for (const oldParam of oldParams) {
    const label = `${oldParam.name} (${oldParam.location})`;
    const newParam = newByKey.get(parameterKey(oldParam));

    if (!newParam) {
      changes.push(
        change(
          { changeType: 'REMOVED_PARAMETER', wasRequired: oldParam.required },
          endpoint,
          `Parameter removed: ${label}`
        )
      );
      continue;
    }

    if (!oldParam.required && newParam.required) {
      changes.push(
        change(
          { changeType: 'ADDED_REQUIRED_PARAMETER' },
          endpoint,
          `Parameter became required: ${label}`
        )
      );
    }

    if (oldParam.schemaType !== newParam.schemaType) {
      changes.push(
        change(
          { changeType: 'CHANGED_PARAMETER_TYPE' },
          endpoint,
          `Parameter type changed: ${label} from ${oldParam.schemaType} to ${newParam.schemaType}`
        )
      );
    }
  }

  return changes;
}

function compareResponses(
  endpoint: string,
  oldOp: Operation,
  newOp: Operation
): BreakingChange[] {
  const changes: BreakingChange[] = [];

  for (const statusCode of Object.keys(oldOp.responses)) {
    if (!hasOwn(newOp.responses, statusCode)) {
      changes.push(
        change(
          { changeType: 'REMOVED_RESPONSE_CODE', statusCode },
          endpoint,
          `Response code removed: ${statusCode}`
        )
      );
    }
  }

  return changes;
}

/**
 * Request/response body schema comparison. Body shapes are not part of the
 * compared surface yet, so this reports nothing.
 */
export function compareSchemas(
  _endpoint: string,
  _oldOp: Operation,
  _newOp: Operation
): BreakingChange[] {
  return [];
}

function compareOperation(
  method: HttpMethod,
  path: string,
  oldOp: Operation,
  newOp: Operation
): BreakingChange[] {
  const endpoint = `${method} ${path}`;
  return [
    ...compareParameters(endpoint, oldOp.parameters, newOp.parameters),
    ...compareResponses(endpoint, oldOp, newOp),
    ...compareSchemas(endpoint, oldOp, newOp),
  ];
}

function compareOperations(path: string, oldItem: PathItem, newItem: PathItem): BreakingChange[] {
  const changes: BreakingChange[] = [];

  for (const method of HTTP_METHODS) {
    const oldOp = oldItem[method];
    if (!oldOp) continue;

    const newOp = newItem[method];
    if (!newOp) {
      // A removed operation is reported once; its parameters and responses are not
      changes.push(
        change(
          { changeType: 'CHANGED_ENDPOINT_METHOD' },
          `${method} ${path}`,
          `Operation removed: ${method} ${path}`
        )
      );
      continue;
    }

    changes.push(...compareOperation(method, path, oldOp, newOp));
  }

  return changes;
}

// ─── Main Compare ───────────────────────────────────────────────────────────

/**
 * Compare two contracts and return every breaking change, ordered by the old
 * document's path order, then method, then parameters, then responses.
 *
 * @param before - The baseline contract
 * @param after  - The candidate contract
 */
export function compareContracts(
  before: ContractDocument,
  after: ContractDocument
): ComparisonResult {
  const changes: BreakingChange[] = [];

  for (const [path, oldItem] of Object.entries(before.paths)) {
    if (!hasOwn(after.paths, path)) {
      changes.push(
        change({ changeType: 'REMOVED_ENDPOINT' }, path, `Endpoint removed: ${path}`)
      );
      continue;
    }

    changes.push(...compareOperations(path, oldItem, after.paths[path]));
  }

  return Object.freeze(changes);
}

/**
 * Count changes of a given severity.
 */
export function countBySeverity(
  changes: ComparisonResult,
  severity: BreakingChange['severity']
): number {
  return changes.filter((c) => c.severity === severity).length;
}
