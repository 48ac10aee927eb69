/**
 * Error taxonomy for contract loading and version resolution.
 *
 * Structural differences between contracts are never errors; they are
 * reported as BreakingChange values by the comparator.
 */

export interface FileNotFoundError {
  kind: 'file_not_found';
  path: string;
}

export interface ParseError {
  kind: 'parse_error';
  path: string;
  cause: string;
}

export type LoadError = FileNotFoundError | ParseError;

export interface ContractNotFoundError {
  kind: 'contract_not_found';
  version: string;
  directory: string;
}

export type LocateError = ContractNotFoundError;

export type CheckError = LoadError | LocateError;

export const fileNotFound = (path: string): FileNotFoundError => ({
  kind: 'file_not_found',
  path,
});

export const parseError = (path: string, cause: string): ParseError => ({
  kind: 'parse_error',
  path,
  cause,
});

export const contractNotFound = (version: string, directory: string): ContractNotFoundError => ({
  kind: 'contract_not_found',
  version,
  directory,
});

/**
 * One-line message naming the offending file and the reason.
 */
export function describeError(error: CheckError): string {
  switch (error.kind) {
    case 'file_not_found':
      return `File not found: ${error.path}`;
    case 'parse_error':
      return `Failed to parse contract ${error.path}: ${error.cause}`;
    case 'contract_not_found':
      return `No contract found for version "${error.version}" in ${error.directory}`;
  }
}

/**
 * Thrown by loadConfig() for a missing or invalid configuration file.
 */
export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    reason: string
  ) {
    super(`Invalid configuration ${configPath}: ${reason}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
