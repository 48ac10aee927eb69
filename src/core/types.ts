/**
 * Canonical contract model for api-contract-compat.
 * These types are independent of the source document format; the comparator
 * and reporter only ever see this model.
 */

// ─── HTTP Surface ───────────────────────────────────────────────────────────

/** Methods compared per path, in comparison order. */
export const HTTP_METHODS = [
  'GET',
  'POST',
  'PUT',
  'DELETE',
  'PATCH',
  'HEAD',
  'OPTIONS',
  'TRACE',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const PARAMETER_LOCATIONS = ['path', 'query', 'header', 'cookie'] as const;

export type ParameterLocation = (typeof PARAMETER_LOCATIONS)[number];

// ─── Contract Model ─────────────────────────────────────────────────────────

export interface Parameter {
  /** Parameter name; together with `location` this is the parameter's identity */
  readonly name: string;

  readonly location: ParameterLocation;

  readonly required: boolean;

  /** Normalized type descriptor (e.g. 'string', 'integer', 'string|integer', 'unknown') */
  readonly schemaType: string;
}

export interface ResponseSpec {
  readonly statusCode: string;
}

export interface Operation {
  readonly parameters: readonly Parameter[];

  /** Keyed by status code string ('200', '404', 'default') */
  readonly responses: Readonly<Record<string, ResponseSpec>>;
}

export type PathItem = Readonly<Partial<Record<HttpMethod, Operation>>>;

export interface ContractInfo {
  readonly title?: string;
  readonly version?: string;
}

export interface ContractDocument {
  readonly info: ContractInfo;

  /** Path template → path item, in source order */
  readonly paths: Readonly<Record<string, PathItem>>;
}

// ─── Breaking Changes ───────────────────────────────────────────────────────

export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type ChangeType =
  | 'REMOVED_ENDPOINT'
  | 'CHANGED_ENDPOINT_METHOD'
  | 'REMOVED_PARAMETER'
  | 'ADDED_REQUIRED_PARAMETER'
  | 'CHANGED_PARAMETER_TYPE'
  | 'REMOVED_RESPONSE_CODE';

export interface BreakingChange {
  readonly changeType: ChangeType;

  /** Path template, or "<METHOD> <path>" for operation-level changes */
  readonly affectedPath: string;

  /** Human-readable description of the change */
  readonly description: string;

  readonly severity: Severity;
}

export type ComparisonResult = readonly BreakingChange[];

// ─── Reports ────────────────────────────────────────────────────────────────

export type ReportFormat = 'console' | 'text' | 'markdown' | 'json';

export type Recommendation = 'block' | 'review' | 'safe';

export interface SeveritySummary {
  CRITICAL: number;
  HIGH: number;
  MEDIUM: number;
  LOW: number;
  total: number;
}

// ─── Version Chains ─────────────────────────────────────────────────────────

export type TransitionStatus = 'passed' | 'failed' | 'skipped';

export interface TransitionResult {
  from: string;
  to: string;

  /** "<from> → <to>" */
  label: string;

  status: TransitionStatus;

  /** Empty for skipped transitions */
  changes: ComparisonResult;

  criticalCount: number;
  highCount: number;

  /** Why the transition was skipped */
  warning?: string;
}

export interface ChainResult {
  /** One entry per adjacent version pair, in chain order */
  transitions: TransitionResult[];

  totalCritical: number;
  skippedCount: number;

  /** True when no transition has a CRITICAL change (and, in strict mode, none was skipped) */
  passed: boolean;
}

// ─── Locator Interface ──────────────────────────────────────────────────────

export interface ContractLocator {
  /** Resolve a version label to its contract file, or null when there is none */
  locate(version: string): Promise<string | null>;

  /** Directory expected to hold the contract for a version */
  directoryFor(version: string): string;

  /** Version labels present on disk, in natural order */
  listVersions(): Promise<string[]>;
}

// ─── Guard Options ──────────────────────────────────────────────────────────

export interface ContractGuardOptions {
  /** Root directory holding one sub-directory per version, or a custom locator (default: cwd) */
  specRoot?: string | ContractLocator;

  /** Ordered version chain used by validateAll() (default: none) */
  versions?: string[];

  /** Sub-directory of each version directory holding the contract (default: 'current') */
  contractDir?: string;

  /** Accepted contract file extensions (default: .yaml, .yml, .json) */
  extensions?: string[];

  /** Fail a chain that has skipped transitions (default: false) */
  strict?: boolean;

  /** Called after each contract file loads successfully */
  onContractLoaded?: (filePath: string, contract: ContractDocument) => void;
}
