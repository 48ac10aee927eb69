/**
 * Spec Loader
 *
 * Reads a YAML or JSON contract document from disk and adapts it into the
 * neutral ContractDocument model. Nothing outside this module sees the
 * document's native shape.
 */

import * as fs from 'fs';
import {
  ContractDocument,
  HTTP_METHODS,
  HttpMethod,
  Operation,
  Parameter,
  PathItem,
  ResponseSpec,
} from './types';
import {
  ContractObject,
  OperationObject,
  ParameterObject,
  PathItemObject,
  Reference,
  SchemaObject,
  formatIssue,
} from './openapi-schema';
import { LoadError, errorMessage, fileNotFound, parseError } from './errors';
import { Result, err, ok } from './result';
import { parseContractText } from '../formats';

const MAX_REF_DEPTH = 16;

/** Internal failure carrying the reason; converted to a ParseError at the boundary */
class InvalidContract extends Error {}

// ─── Reference Resolution ───────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeSegment(segment: string, ref: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InvalidContract(`malformed reference "${ref}"`);
  }
}

/**
 * Resolve a local JSON pointer ("#/components/parameters/Id") against the
 * document root. External references are not supported.
 */
function resolvePointer(root: unknown, ref: string): unknown {
  if (!ref.startsWith('#/')) {
    throw new InvalidContract(`unsupported reference "${ref}" (only local references are resolved)`);
  }

  let current: unknown = root;
  for (const raw of ref.slice(2).split('/')) {
    const segment = decodeSegment(raw, ref).replace(/~1/g, '/').replace(/~0/g, '~');
    if (!isRecord(current) || !(segment in current)) {
      throw new InvalidContract(`unresolved reference "${ref}"`);
    }
    current = current[segment];
  }
  return current;
}

/**
 * Follow $ref chains until a non-reference value is reached.
 */
function deref(root: unknown, value: unknown): unknown {
  let current = value;
  for (let depth = 0; depth < MAX_REF_DEPTH; depth++) {
    const ref = Reference.safeParse(current);
    if (!ref.success) return current;
    current = resolvePointer(root, ref.data.$ref);
  }
  throw new InvalidContract('reference chain too deep (circular $ref?)');
}

// ─── Type Normalization ─────────────────────────────────────────────────────

function normalizeType(type: string | string[] | undefined): string {
  if (type === undefined) return 'unknown';
  if (typeof type === 'string') return type;

  const types = type.filter((t) => t !== 'null');
  if (types.length === 0) return type.length > 0 ? 'null' : 'unknown';
  return types.join('|');
}

function schemaTypeOf(root: unknown, param: ParameterObject, where: string): string {
  if (param.schema) {
    const resolved = SchemaObject.safeParse(deref(root, param.schema));
    if (!resolved.success) {
      throw new InvalidContract(`${where}.schema: ${formatIssue(resolved.error)}`);
    }
    return normalizeType(resolved.data.type);
  }
  return normalizeType(param.type);
}

// ─── Adapters ───────────────────────────────────────────────────────────────

// Swagger 2 payload parameters; request bodies are not compared
const PAYLOAD_LOCATIONS = new Set(['body', 'formData']);

function adaptParameter(root: unknown, entry: unknown, where: string): Parameter | null {
  const resolved = deref(root, entry);
  if (isRecord(resolved) && typeof resolved.in === 'string' && PAYLOAD_LOCATIONS.has(resolved.in)) {
    return null;
  }

  const parsed = ParameterObject.safeParse(resolved);
  if (!parsed.success) {
    throw new InvalidContract(`${where}: ${formatIssue(parsed.error)}`);
  }

  const param = parsed.data;
  return Object.freeze({
    name: param.name,
    location: param.in,
    required: param.required === true,
    schemaType: schemaTypeOf(root, param, where),
  });
}

function adaptParameters(root: unknown, entries: unknown[] | undefined, where: string): Parameter[] {
  const params: Parameter[] = [];
  (entries ?? []).forEach((entry, i) => {
    const param = adaptParameter(root, entry, `${where}.parameters.${i}`);
    if (param) params.push(param);
  });
  return params;
}

const parameterKey = (p: Parameter): string => `${p.location}:${p.name}`;

/**
 * Path-level parameters apply to every operation; an operation parameter
 * with the same (location, name) replaces the inherited one in place.
 */
function mergeParameters(inherited: Parameter[], own: Parameter[]): Parameter[] {
  const ownByKey = new Map(own.map((p) => [parameterKey(p), p]));
  const merged = inherited.map((p) => ownByKey.get(parameterKey(p)) ?? p);
  const inheritedKeys = new Set(inherited.map(parameterKey));
  return [...merged, ...own.filter((p) => !inheritedKeys.has(parameterKey(p)))];
}

function adaptOperation(
  root: unknown,
  op: OperationObject | null,
  inherited: Parameter[],
  where: string
): Operation {
  const own = adaptParameters(root, op?.parameters, where);

  const responses: Record<string, ResponseSpec> = {};
  for (const statusCode of Object.keys(op?.responses ?? {})) {
    responses[statusCode] = Object.freeze({ statusCode });
  }

  return Object.freeze({
    parameters: Object.freeze(mergeParameters(inherited, own)),
    responses: Object.freeze(responses),
  });
}

function methodKey(method: HttpMethod): keyof Omit<PathItemObject, 'parameters'> {
  switch (method) {
    case 'GET':
      return 'get';
    case 'POST':
      return 'post';
    case 'PUT':
      return 'put';
    case 'DELETE':
      return 'delete';
    case 'PATCH':
      return 'patch';
    case 'HEAD':
      return 'head';
    case 'OPTIONS':
      return 'options';
    case 'TRACE':
      return 'trace';
  }
}

function adaptPathItem(root: unknown, item: PathItemObject | null, where: string): PathItem {
  if (!item) return Object.freeze({});

  const inherited = adaptParameters(root, item.parameters, where);
  const pathItem: Partial<Record<HttpMethod, Operation>> = {};

  for (const method of HTTP_METHODS) {
    const key = methodKey(method);
    const op = item[key];
    if (op !== undefined) {
      pathItem[method] = adaptOperation(root, op, inherited, `${where}.${key}`);
    }
  }

  return Object.freeze(pathItem);
}

/**
 * Adapt an already-parsed document value into the contract model.
 * Throws InvalidContract on a structurally malformed document.
 */
function adaptDocument(raw: unknown): ContractDocument {
  const parsed = ContractObject.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidContract(formatIssue(parsed.error));
  }

  const { info, paths } = parsed.data;
  const adapted: Record<string, PathItem> = {};
  for (const [pathKey, item] of Object.entries(paths ?? {})) {
    adapted[pathKey] = adaptPathItem(raw, item, `paths.${pathKey}`);
  }

  return Object.freeze({
    info: Object.freeze({ title: info?.title, version: info?.version }),
    paths: Object.freeze(adapted),
  });
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Parse contract text into the model. `source` names the document in errors
 * and selects the parser by extension.
 */
export function parseContract(text: string, source: string): Result<ContractDocument, LoadError> {
  let raw: unknown;
  try {
    raw = parseContractText(text, source);
  } catch (error) {
    return err(parseError(source, errorMessage(error)));
  }

  try {
    return ok(adaptDocument(raw));
  } catch (error) {
    if (error instanceof InvalidContract) {
      return err(parseError(source, error.message));
    }
    throw error;
  }
}

/**
 * Load a contract document from disk.
 */
export function loadContract(filePath: string): Result<ContractDocument, LoadError> {
  if (!fs.existsSync(filePath)) {
    return err(fileNotFound(filePath));
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    return err(parseError(filePath, `unable to read file: ${errorMessage(error)}`));
  }

  return parseContract(text, filePath);
}
