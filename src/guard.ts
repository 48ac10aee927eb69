/**
 * ContractGuard — Main API
 *
 * The primary entry point for api-contract-compat. Provides a simple API for:
 * - Comparing two contract files
 * - Comparing two versions from the version directory layout
 * - Validating a whole version chain
 * - Writing migration reports
 */

import * as path from 'path';
import {
  ChainResult,
  ContractDocument,
  ContractGuardOptions,
  ContractLocator,
} from './core/types';
import { CheckError, LoadError, contractNotFound } from './core/errors';
import { Result, andThen, err, ok } from './core/result';
import { compareContracts } from './core/comparator';
import { loadContract } from './core/loader';
import { validateChain } from './core/orchestrator';
import { Report, generateReport, writeReport } from './core/reporter';
import { DirectoryLocator } from './store/version-locator';

export interface CompareOptions {
  /** Label for the old contract in the report (default: its path or version) */
  oldLabel?: string;

  /** Label for the new contract in the report (default: its path or version) */
  newLabel?: string;

  /** ISO timestamp for the report header (default: now) */
  generatedAt?: string;
}

export interface MigrationReportOptions {
  /** Directory the report file is written to (default: cwd) */
  outDir?: string;

  /** ISO timestamp for the report header (default: now) */
  generatedAt?: string;
}

export interface MigrationReportResult {
  report: Report;
  filePath: string;
}

/**
 * File name of the migration report for a version transition.
 */
export function migrationReportFileName(fromVersion: string, toVersion: string): string {
  return `api-migration-report-${fromVersion}-to-${toVersion}.md`;
}

// ─── ContractGuard Class ────────────────────────────────────────────────────

export class ContractGuard {
  private locator: ContractLocator;
  private versions: string[];
  private strict: boolean;
  private onContractLoaded?: (filePath: string, contract: ContractDocument) => void;

  constructor(options: ContractGuardOptions = {}) {
    // Initialize locator
    if (options.specRoot === undefined || typeof options.specRoot === 'string') {
      this.locator = new DirectoryLocator(options.specRoot ?? process.cwd(), {
        contractDir: options.contractDir,
        extensions: options.extensions,
      });
    } else {
      this.locator = options.specRoot;
    }

    this.versions = options.versions ?? [];
    this.strict = options.strict ?? false;
    this.onContractLoaded = options.onContractLoaded;
  }

  /**
   * Load a single contract file.
   */
  load = (filePath: string): Result<ContractDocument, LoadError> => {
    const result = loadContract(filePath);
    if (result.success) {
      this.onContractLoaded?.(filePath, result.data);
    }
    return result;
  };

  /**
   * Compare two contract files.
   *
   * Both files are loaded before comparing; the first load failure is returned.
   */
  compareFiles(
    oldPath: string,
    newPath: string,
    options: CompareOptions = {}
  ): Result<Report, LoadError> {
    return andThen(this.load(oldPath), (before) =>
      andThen(this.load(newPath), (after) =>
        ok(
          generateReport(
            compareContracts(before, after),
            options.oldLabel ?? oldPath,
            options.newLabel ?? newPath,
            { generatedAt: options.generatedAt }
          )
        )
      )
    );
  }

  /**
   * Resolve a version label to its contract file through the locator.
   */
  async locate(version: string): Promise<Result<string, CheckError>> {
    const file = await this.locator.locate(version);
    if (file === null) {
      return err(contractNotFound(version, this.locator.directoryFor(version)));
    }
    return ok(file);
  }

  /**
   * Compare two versions from the version directory layout.
   */
  async compareVersions(
    fromVersion: string,
    toVersion: string,
    options: CompareOptions = {}
  ): Promise<Result<Report, CheckError>> {
    const [fromFile, toFile] = await Promise.all([this.locate(fromVersion), this.locate(toVersion)]);
    if (!fromFile.success) return fromFile;
    if (!toFile.success) return toFile;

    return this.compareFiles(fromFile.data, toFile.data, {
      oldLabel: options.oldLabel ?? fromVersion,
      newLabel: options.newLabel ?? toVersion,
      generatedAt: options.generatedAt,
    });
  }

  /**
   * Validate every adjacent transition of a version chain
   * (default: the configured versions).
   */
  async validateAll(versions: readonly string[] = this.versions): Promise<ChainResult> {
    return validateChain(versions, {
      locator: this.locator,
      load: this.load,
      strict: this.strict,
    });
  }

  /**
   * Compare two versions and write the Markdown migration report to
   * `api-migration-report-<from>-to-<to>.md`.
   */
  async migrationReport(
    fromVersion: string,
    toVersion: string,
    options: MigrationReportOptions = {}
  ): Promise<Result<MigrationReportResult, CheckError>> {
    const result = await this.compareVersions(fromVersion, toVersion, {
      generatedAt: options.generatedAt,
    });
    if (!result.success) return result;

    const filePath = path.join(
      options.outDir ?? process.cwd(),
      migrationReportFileName(fromVersion, toVersion)
    );
    writeReport(result.data, filePath, 'markdown');

    return ok({ report: result.data, filePath });
  }

  /**
   * Version labels present under the spec root, in natural order.
   */
  async discoverVersions(): Promise<string[]> {
    return this.locator.listVersions();
  }
}
