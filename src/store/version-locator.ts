/**
 * Directory-based Version Locator
 *
 * Maps version labels to contract files using a fixed on-disk layout:
 *
 *   <specRoot>/
 *     v1/
 *       current/
 *         api.yaml      → first matching file (alphabetical) is the contract
 *     v2/
 *       current/
 *         api.yaml
 *     ...
 */

import * as fs from 'fs';
import * as path from 'path';
import { ContractLocator } from '../core/types';

export const DEFAULT_CONTRACT_DIR = 'current';
export const DEFAULT_EXTENSIONS = ['.yaml', '.yml', '.json'];

export interface DirectoryLocatorOptions {
  /** Sub-directory of each version directory (default: 'current') */
  contractDir?: string;

  /** Accepted file extensions, case-insensitive */
  extensions?: string[];
}

// ─── Helpers ────────────────────────────────────────────────────────────────

const collator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' });

/**
 * Natural order for version labels: v2 before v10.
 */
export function compareVersionLabels(a: string, b: string): number {
  return collator.compare(a, b);
}

function isDirectory(dir: string): boolean {
  return fs.existsSync(dir) && fs.statSync(dir).isDirectory();
}

// ─── Locator Implementation ─────────────────────────────────────────────────

export class DirectoryLocator implements ContractLocator {
  private readonly specRoot: string;
  private readonly contractDir: string;
  private readonly extensions: string[];

  constructor(specRoot: string, options: DirectoryLocatorOptions = {}) {
    this.specRoot = path.resolve(specRoot);
    this.contractDir = options.contractDir ?? DEFAULT_CONTRACT_DIR;
    this.extensions = (options.extensions ?? DEFAULT_EXTENSIONS).map((e) => e.toLowerCase());
  }

  directoryFor(version: string): string {
    return path.join(this.specRoot, version, this.contractDir);
  }

  /**
   * Resolve a version to its contract file, or null when the version
   * directory or a matching file is missing.
   */
  async locate(version: string): Promise<string | null> {
    const dir = this.directoryFor(version);
    if (!isDirectory(dir)) return null;

    const candidates = fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => this.extensions.includes(path.extname(name).toLowerCase()))
      .sort();

    const [first] = candidates;
    return first === undefined ? null : path.join(dir, first);
  }

  /**
   * List version directories that hold a contract directory, in natural order.
   */
  async listVersions(): Promise<string[]> {
    if (!isDirectory(this.specRoot)) return [];

    return fs
      .readdirSync(this.specRoot, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .filter((name) => isDirectory(this.directoryFor(name)))
      .sort(compareVersionLabels);
  }
}
