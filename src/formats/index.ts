/**
 * Format Parsers — Barrel export
 */

export { parseJson } from './json';
export { parseYaml } from './yaml';

import * as path from 'path';
import { parseJson } from './json';
import { parseYaml } from './yaml';

/**
 * Parse contract text, choosing the parser from the file extension.
 * Anything that is not `.json` goes through the YAML parser, which also
 * accepts JSON.
 */
export function parseContractText(input: string, fileName: string): unknown {
  if (path.extname(fileName).toLowerCase() === '.json') {
    return parseJson(input);
  }

  return parseYaml(input);
}
