/**
 * Report Generator
 *
 * Turns a ComparisonResult into a Report: severity summary, recommendation,
 * exit code, and renderings as plain text, colored console text, Markdown
 * and JSON.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import {
  BreakingChange,
  ComparisonResult,
  Recommendation,
  ReportFormat,
  SEVERITIES,
  Severity,
  SeveritySummary,
} from './types';

// ─── Severity Icons & Labels ────────────────────────────────────────────────

const SEVERITY_ICON: Record<Severity, string> = {
  CRITICAL: '🔴',
  HIGH: '🟡',
  MEDIUM: '🟠',
  LOW: '🟢',
};

const SECTION_TITLE: Record<Severity, string> = {
  CRITICAL: 'CRITICAL BREAKING CHANGES',
  HIGH: 'HIGH IMPACT CHANGES',
  MEDIUM: 'MEDIUM IMPACT CHANGES',
  LOW: 'LOW IMPACT CHANGES',
};

const SCORE_PENALTY: Record<Severity, number> = {
  CRITICAL: 25,
  HIGH: 10,
  MEDIUM: 5,
  LOW: 1,
};

export const RECOMMENDATION_TEXT: Record<Recommendation, string> = {
  block: 'block',
  review: 'review/major-version',
  safe: 'safe to release',
};

const NEXT_STEPS = [
  'Review breaking changes above',
  'Update API documentation',
  'Notify API consumers of changes',
  'Update integration tests',
];

// ─── Report ─────────────────────────────────────────────────────────────────

export interface GenerateOptions {
  /** ISO timestamp for the report header (default: now) */
  generatedAt?: string;
}

export class Report {
  readonly summary: SeveritySummary;
  readonly grouped: Readonly<Record<Severity, readonly BreakingChange[]>>;
  readonly recommendation: Recommendation;
  readonly compatibilityScore: number;

  constructor(
    readonly changes: ComparisonResult,
    readonly oldLabel: string,
    readonly newLabel: string,
    readonly generatedAt: string
  ) {
    this.grouped = groupBySeverity(changes);
    this.summary = {
      CRITICAL: this.grouped.CRITICAL.length,
      HIGH: this.grouped.HIGH.length,
      MEDIUM: this.grouped.MEDIUM.length,
      LOW: this.grouped.LOW.length,
      total: changes.length,
    };
    this.recommendation = recommend(this.summary);
    this.compatibilityScore = calculateCompatibilityScore(changes);
  }

  /** Whether the compared contracts may be released (no CRITICAL change) */
  get passed(): boolean {
    return this.summary.CRITICAL === 0;
  }

  /**
   * Process exit status: 1 if any CRITICAL change exists, 0 otherwise.
   */
  exitCode(): number {
    return this.passed ? 0 : 1;
  }

  render(format: ReportFormat = 'text'): string {
    return formatReport(this, format);
  }
}

/**
 * Build a report for a comparison between two labeled contracts.
 */
export function generateReport(
  result: ComparisonResult,
  oldLabel: string,
  newLabel: string,
  options: GenerateOptions = {}
): Report {
  return new Report(result, oldLabel, newLabel, options.generatedAt ?? new Date().toISOString());
}

function recommend(summary: SeveritySummary): Recommendation {
  if (summary.CRITICAL > 0) return 'block';
  if (summary.HIGH > 0) return 'review';
  return 'safe';
}

/**
 * Backward compatibility score (0–100).
 *
 * - 100 = no breaking changes
 * - Deductions: critical = -25, high = -10, medium = -5, low = -1
 * - Floor at 0
 */
export function calculateCompatibilityScore(changes: ComparisonResult): number {
  const score = changes.reduce((acc, c) => acc - SCORE_PENALTY[c.severity], 100);
  return Math.max(0, score);
}

// ─── Format Report ──────────────────────────────────────────────────────────

/**
 * Format a report in the specified format.
 */
export function formatReport(report: Report, format: ReportFormat): string {
  switch (format) {
    case 'text':
      return formatText(report, PLAIN);
    case 'console':
      return formatText(report, COLORED);
    case 'markdown':
      return formatMarkdown(report);
    case 'json':
      return formatJson(report);
  }
}

/**
 * Write a rendered report to disk as UTF-8, creating parent directories.
 */
export function writeReport(report: Report, filePath: string, format: ReportFormat = 'markdown'): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, report.render(format), 'utf-8');
}

// ─── Text / Console Format ──────────────────────────────────────────────────

interface Palette {
  title(s: string): string;
  muted(s: string): string;
  severity(severity: Severity, s: string): string;
  good(s: string): string;
  bad(s: string): string;
  warn(s: string): string;
}

const identity = (s: string): string => s;

const PLAIN: Palette = {
  title: identity,
  muted: identity,
  severity: (_severity, s) => s,
  good: identity,
  bad: identity,
  warn: identity,
};

const SEVERITY_COLOR: Record<Severity, (s: string) => string> = {
  CRITICAL: chalk.red,
  HIGH: chalk.yellow,
  MEDIUM: chalk.magenta,
  LOW: chalk.green,
};

const COLORED: Palette = {
  title: chalk.bold,
  muted: chalk.gray,
  severity: (severity, s) => SEVERITY_COLOR[severity](s),
  good: chalk.green,
  bad: chalk.red,
  warn: chalk.yellow,
};

function formatText(report: Report, p: Palette): string {
  const lines: string[] = [];

  lines.push(p.title('🔍 OpenAPI Contract Compatibility Report'));
  lines.push(p.muted('='.repeat(50)));
  lines.push(`📅 Generated: ${report.generatedAt}`);
  lines.push(`🔄 Comparing: ${report.oldLabel} → ${report.newLabel}`);
  lines.push('');

  if (report.changes.length === 0) {
    lines.push(p.good('✅ No breaking changes detected!'));
    lines.push('🎉 The API is backward compatible.');
    lines.push('');
    lines.push(`💡 Recommendation: ${RECOMMENDATION_TEXT[report.recommendation]}`);
    return lines.join('\n');
  }

  lines.push('📊 Summary:');
  for (const severity of SEVERITIES) {
    lines.push(`  ${SEVERITY_ICON[severity]} ${capitalize(severity)}: ${report.summary[severity]}`);
  }
  lines.push(`  Compatibility Score: ${report.compatibilityScore}%`);
  lines.push('');

  for (const severity of SEVERITIES) {
    const group = report.grouped[severity];
    if (group.length === 0) continue;

    const title = `${SECTION_TITLE[severity]}:`;
    lines.push(p.severity(severity, `${SEVERITY_ICON[severity]} ${title}`));
    lines.push(p.muted('-'.repeat(title.length)));
    for (const c of group) {
      lines.push(`  • ${c.description}`);
      lines.push(`    Path: ${c.affectedPath}`);
      if (severity === 'CRITICAL') {
        lines.push(`    Type: ${c.changeType}`);
      }
      lines.push('');
    }
  }

  lines.push(`💡 Recommendation: ${RECOMMENDATION_TEXT[report.recommendation]}`);
  switch (report.recommendation) {
    case 'block':
      lines.push(p.bad('  ❌ DO NOT DEPLOY - Critical breaking changes detected'));
      lines.push('  🔧 Fix breaking changes or bump major version');
      break;
    case 'review':
      lines.push(p.warn('  ⚠️  Consider major version bump'));
      lines.push('  📋 Prepare migration guide for clients');
      break;
    case 'safe':
      lines.push(p.good('  ✅ Safe to deploy with minor version bump'));
      break;
  }

  lines.push('');
  lines.push('🔗 Next Steps:');
  NEXT_STEPS.forEach((step, i) => lines.push(`  ${i + 1}. ${step}`));

  return lines.join('\n');
}

function capitalize(severity: Severity): string {
  return severity.charAt(0) + severity.slice(1).toLowerCase();
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function formatMarkdown(report: Report): string {
  const lines: string[] = [];

  lines.push(`# API Migration Report: ${report.oldLabel} → ${report.newLabel}`);
  lines.push('');
  lines.push(`**Generated:** ${report.generatedAt}`);
  lines.push(`**Recommendation:** ${RECOMMENDATION_TEXT[report.recommendation]}`);
  lines.push(`**Compatibility Score:** ${report.compatibilityScore}%`);
  lines.push('');

  if (report.changes.length === 0) {
    lines.push('✅ **No breaking changes detected**');
    return lines.join('\n');
  }

  lines.push('| Severity | Count |');
  lines.push('|---|---|');
  for (const severity of SEVERITIES) {
    lines.push(`| ${severity} | ${report.summary[severity]} |`);
  }
  lines.push('');

  for (const severity of SEVERITIES) {
    const group = report.grouped[severity];
    if (group.length === 0) continue;

    lines.push(`## ${SEVERITY_ICON[severity]} ${severity}`);
    lines.push('');
    for (const c of group) {
      lines.push(`- **${c.affectedPath}**: ${c.description} (\`${c.changeType}\`)`);
    }
    lines.push('');
  }

  lines.push('## Next Steps');
  lines.push('');
  NEXT_STEPS.forEach((step, i) => lines.push(`${i + 1}. ${step}`));

  return lines.join('\n');
}

// ─── JSON Format ────────────────────────────────────────────────────────────

function formatJson(report: Report): string {
  return JSON.stringify(
    {
      oldLabel: report.oldLabel,
      newLabel: report.newLabel,
      generatedAt: report.generatedAt,
      summary: report.summary,
      recommendation: RECOMMENDATION_TEXT[report.recommendation],
      compatibilityScore: report.compatibilityScore,
      exitCode: report.exitCode(),
      changes: report.changes,
    },
    null,
    2
  );
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function groupBySeverity(changes: ComparisonResult): Record<Severity, BreakingChange[]> {
  return {
    CRITICAL: changes.filter((c) => c.severity === 'CRITICAL'),
    HIGH: changes.filter((c) => c.severity === 'HIGH'),
    MEDIUM: changes.filter((c) => c.severity === 'MEDIUM'),
    LOW: changes.filter((c) => c.severity === 'LOW'),
  };
}
