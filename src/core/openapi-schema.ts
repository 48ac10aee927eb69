/**
 * Structural schema for the subset of an OpenAPI (or Swagger 2) document the
 * loader reads. Unknown fields are stripped; everything the comparator does
 * not look at is left out.
 */

import { z } from 'zod';
import { PARAMETER_LOCATIONS } from './types';

// ─── Leaf Objects ───────────────────────────────────────────────────────────

export const Reference = z.object({
  $ref: z.string(),
});

export type Reference = z.infer<typeof Reference>;

export const SchemaObject = z.object({
  $ref: z.string().optional(),
  // OpenAPI 3.1 allows a list of types
  type: z.union([z.string(), z.array(z.string())]).optional(),
});

export type SchemaObject = z.infer<typeof SchemaObject>;

export const ParameterObject = z.object({
  name: z.string(),
  in: z.enum(PARAMETER_LOCATIONS),
  required: z.boolean().optional(),
  schema: SchemaObject.optional(),
  // Swagger 2 puts the type on the parameter itself
  type: z.string().optional(),
});

export type ParameterObject = z.infer<typeof ParameterObject>;

// ─── Operations & Paths ─────────────────────────────────────────────────────

/**
 * Drop specification extensions (`x-*` keys) from a map whose other keys
 * are data (path templates, status codes).
 */
function withoutExtensions(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).filter(([key]) => !key.startsWith('x-')));
}

// Parameters stay untyped here: entries may be references, which are
// resolved and validated by the loader with the pointer in the message.
const ParameterList = z.array(z.unknown());

export const OperationObject = z.object({
  parameters: ParameterList.optional(),
  responses: z.preprocess(withoutExtensions, z.record(z.string(), z.unknown())).nullish(),
});

export type OperationObject = z.infer<typeof OperationObject>;

export const PathItemObject = z.object({
  parameters: ParameterList.optional(),
  get: OperationObject.nullish(),
  post: OperationObject.nullish(),
  put: OperationObject.nullish(),
  delete: OperationObject.nullish(),
  patch: OperationObject.nullish(),
  head: OperationObject.nullish(),
  options: OperationObject.nullish(),
  trace: OperationObject.nullish(),
});

export type PathItemObject = z.infer<typeof PathItemObject>;

// ─── Document Root ──────────────────────────────────────────────────────────

const InfoObject = z
  .object({
    title: z.string().optional().catch(undefined),
    // `version: 1.0` in YAML arrives as a number
    version: z
      .union([z.string(), z.number()])
      .transform((v) => String(v))
      .optional()
      .catch(undefined),
  })
  .catch({});

export const ContractObject = z.object({
  info: InfoObject.optional(),
  paths: z
    .preprocess(withoutExtensions, z.record(z.string(), PathItemObject.nullable()))
    .nullish(),
});

export type ContractObject = z.infer<typeof ContractObject>;

/**
 * Render the first validation issue as "<json.path>: <message>".
 */
export function formatIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) return 'invalid document';
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}
