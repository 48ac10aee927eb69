/**
 * api-contract-compat
 *
 * Catch breaking API contract changes before your clients do.
 *
 * @example
 * ```typescript
 * import { ContractGuard } from 'api-contract-compat';
 *
 * const guard = new ContractGuard({ specRoot: './openapi', versions: ['v1', 'v2', 'v3'] });
 *
 * const result = guard.compareFiles('api-v1.yaml', 'api-v2.yaml');
 * if (result.success) {
 *   console.log(result.data.render('console'));
 *   process.exitCode = result.data.exitCode();
 * }
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { ContractGuard, migrationReportFileName } from './guard';
export type { CompareOptions, MigrationReportOptions, MigrationReportResult } from './guard';

// ─── Core Types ─────────────────────────────────────────────────────────────
export { HTTP_METHODS, PARAMETER_LOCATIONS, SEVERITIES } from './core/types';
export type {
  BreakingChange,
  ChainResult,
  ChangeType,
  ComparisonResult,
  ContractDocument,
  ContractGuardOptions,
  ContractInfo,
  ContractLocator,
  HttpMethod,
  Operation,
  Parameter,
  ParameterLocation,
  PathItem,
  Recommendation,
  ReportFormat,
  ResponseSpec,
  Severity,
  SeveritySummary,
  TransitionResult,
  TransitionStatus,
} from './core/types';

// ─── Results & Errors ───────────────────────────────────────────────────────
export { ok, err, andThen } from './core/result';
export type { Result } from './core/result';
export { ConfigError, describeError } from './core/errors';
export type { CheckError, LoadError, LocateError } from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { loadContract, parseContract } from './core/loader';
export { compareContracts, compareSchemas } from './core/comparator';
export { classifySeverity, isSuccessStatus } from './core/classifier';
export type { SeverityContext } from './core/classifier';
export { Report, generateReport, formatReport, writeReport, calculateCompatibilityScore } from './core/reporter';
export { validateChain, formatChainSummary, formatTransition } from './core/orchestrator';

// ─── Locator & Config ───────────────────────────────────────────────────────
export { DirectoryLocator } from './store/version-locator';
export { loadConfig, CheckerConfig } from './config';

// ─── Format Parsers ─────────────────────────────────────────────────────────
export { parseJson, parseYaml, parseContractText } from './formats';
