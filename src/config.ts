/**
 * Configuration
 *
 * Optional `api-contract-compat.config.json` in the working directory.
 * Missing keys fall back to the defaults below; CLI flags override both.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './core/errors';
import { formatIssue } from './core/openapi-schema';
import { parseJson } from './formats/json';
import { DEFAULT_CONTRACT_DIR, DEFAULT_EXTENSIONS } from './store/version-locator';

export const CONFIG_FILE_NAME = 'api-contract-compat.config.json';

export const CheckerConfig = z
  .object({
    specRoot: z
      .string()
      .min(1)
      .describe('Directory holding one sub-directory per API version')
      .default('src/main/resources/openapi'),
    versions: z
      .array(z.string().min(1))
      .describe('Ordered version chain checked by validate-all')
      .default(() => ['v1', 'v2', 'v3', 'v4']),
    contractDir: z
      .string()
      .min(1)
      .describe('Sub-directory of each version directory holding the contract')
      .default(DEFAULT_CONTRACT_DIR),
    extensions: z
      .array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'must look like ".yaml"'))
      .min(1)
      .default(() => [...DEFAULT_EXTENSIONS]),
    reportFormat: z.enum(['console', 'text', 'markdown', 'json']).default('console'),
  })
  .strict();

export type CheckerConfig = z.infer<typeof CheckerConfig>;

export interface LoadConfigOptions {
  /** Directory searched for the default config file (default: process.cwd()) */
  cwd?: string;

  /** Explicit config file; unlike the default file it must exist */
  configPath?: string;
}

/**
 * Load and validate the configuration. Throws ConfigError on a missing
 * explicit file or an invalid one.
 */
export function loadConfig(options: LoadConfigOptions = {}): CheckerConfig {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : path.join(cwd, CONFIG_FILE_NAME);

  if (!fs.existsSync(configPath)) {
    if (options.configPath) {
      throw new ConfigError(configPath, 'file not found');
    }
    return CheckerConfig.parse({});
  }

  let raw: unknown;
  try {
    raw = parseJson(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(configPath, errorMessage(error));
  }

  const parsed = CheckerConfig.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(configPath, formatIssue(parsed.error));
  }

  return parsed.data;
}
