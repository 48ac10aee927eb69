/**
 * YAML contract parser.
 */

import { parseDocument } from 'yaml';
import { stripBom } from './text';

/**
 * Parse a YAML document into a plain value.
 * Throws with the first reported YAML error when the document is malformed.
 */
export function parseYaml(input: string): unknown {
  const doc = parseDocument(stripBom(input));

  const [first] = doc.errors;
  if (first) {
    throw new Error(`Invalid YAML: ${first.message}`);
  }

  return doc.toJS();
}
