/**
 * JSON contract parser.
 */

import { stripBom } from './text';

/**
 * Parse a JSON contract document into a plain value.
 * Documents with trailing commas are accepted on a second, lenient pass.
 */
export function parseJson(input: string): unknown {
  const cleaned = stripBom(input).trim();

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    try {
      return JSON.parse(cleaned.replace(/,\s*([\]}])/g, '$1'));
    } catch {
      throw new Error(
        `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
