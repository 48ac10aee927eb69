/**
 * Multi-Version Orchestrator
 *
 * Runs the comparator over every adjacent pair of an ordered version chain.
 * Every transition is evaluated, even after a failing one; a transition whose
 * contracts cannot be found or loaded is skipped with a warning.
 */

import {
  ChainResult,
  ContractDocument,
  ContractLocator,
  TransitionResult,
} from './types';
import { CheckError, LoadError, contractNotFound, describeError, errorMessage } from './errors';
import { Result, err, ok } from './result';
import { compareContracts, countBySeverity } from './comparator';
import { loadContract } from './loader';

export interface ChainOptions {
  locator: ContractLocator;

  /** Contract loader (default: loadContract) */
  load?: (filePath: string) => Result<ContractDocument, LoadError>;

  /** Count skipped transitions as failures (default: false) */
  strict?: boolean;
}

type Loader = NonNullable<ChainOptions['load']>;

async function resolveVersion(
  version: string,
  locator: ContractLocator,
  load: Loader
): Promise<Result<ContractDocument, CheckError>> {
  const file = await locator.locate(version);
  if (file === null) {
    return err(contractNotFound(version, locator.directoryFor(version)));
  }
  return load(file);
}

async function runTransition(
  from: string,
  to: string,
  locator: ContractLocator,
  load: Loader
): Promise<TransitionResult> {
  const label = `${from} → ${to}`;
  const skipped = (warning: string): TransitionResult => ({
    from,
    to,
    label,
    status: 'skipped',
    changes: [],
    criticalCount: 0,
    highCount: 0,
    warning,
  });

  let before: Result<ContractDocument, CheckError>;
  let after: Result<ContractDocument, CheckError>;
  try {
    [before, after] = await Promise.all([
      resolveVersion(from, locator, load),
      resolveVersion(to, locator, load),
    ]);
  } catch (error) {
    // An unreadable version directory or a failing custom loader
    return skipped(errorMessage(error));
  }

  if (!before.success || !after.success) {
    const problems: string[] = [];
    if (!before.success) problems.push(describeError(before.error));
    if (!after.success) problems.push(describeError(after.error));
    return skipped(problems.join('; '));
  }

  const changes = compareContracts(before.data, after.data);
  const criticalCount = countBySeverity(changes, 'CRITICAL');

  return {
    from,
    to,
    label,
    status: criticalCount > 0 ? 'failed' : 'passed',
    changes,
    criticalCount,
    highCount: countBySeverity(changes, 'HIGH'),
  };
}

/**
 * Validate an ordered version chain pairwise.
 *
 * Transitions run concurrently; results are returned in chain order.
 */
export async function validateChain(
  versions: readonly string[],
  options: ChainOptions
): Promise<ChainResult> {
  const load = options.load ?? loadContract;

  const pairs = versions.slice(1).map((to, i) => ({ from: versions[i], to }));
  const transitions = await Promise.all(
    pairs.map(({ from, to }) => runTransition(from, to, options.locator, load))
  );

  const totalCritical = transitions.reduce((sum, t) => sum + t.criticalCount, 0);
  const skippedCount = transitions.filter((t) => t.status === 'skipped').length;

  return {
    transitions,
    totalCritical,
    skippedCount,
    passed: totalCritical === 0 && !(options.strict && skippedCount > 0),
  };
}

// ─── Summary Rendering ──────────────────────────────────────────────────────

/**
 * One line per transition, e.g. "✅ v1 → v2: PASS (0 critical, 0 high)".
 */
export function formatTransition(t: TransitionResult): string {
  switch (t.status) {
    case 'passed':
      return `✅ ${t.label}: PASS (${t.criticalCount} critical, ${t.highCount} high)`;
    case 'failed':
      return `❌ ${t.label}: FAIL (${t.criticalCount} critical, ${t.highCount} high)`;
    case 'skipped':
      return `⚠️  ${t.label}: SKIPPED (${t.warning ?? 'contract unavailable'})`;
  }
}

export function formatOverall(result: ChainResult): string {
  if (result.passed) {
    const note = result.skippedCount > 0 ? ` (${result.skippedCount} transition(s) skipped)` : '';
    return `🎯 Overall Result: ✅ PASSED${note}`;
  }
  if (result.totalCritical > 0) {
    return `🎯 Overall Result: ❌ FAILED (${result.totalCritical} critical issues)`;
  }
  return `🎯 Overall Result: ❌ FAILED (${result.skippedCount} transition(s) skipped)`;
}

/**
 * Transition-by-transition summary followed by the overall verdict.
 */
export function formatChainSummary(result: ChainResult): string {
  const lines: string[] = [];

  lines.push('📋 Multi-Version Validation Summary:');
  lines.push('='.repeat(40));

  if (result.transitions.length === 0) {
    lines.push('(fewer than two versions: nothing to compare)');
  }
  for (const t of result.transitions) {
    lines.push(formatTransition(t));
  }

  lines.push('');
  lines.push(formatOverall(result));

  return lines.join('\n');
}
