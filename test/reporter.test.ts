/**
 * Tests for the Report Generator
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  calculateCompatibilityScore,
  formatReport,
  generateReport,
  writeReport,
} from '../src/core/reporter';
import { BreakingChange } from '../src/core/types';
import { breaking, makeTempDir } from './helpers';

const GENERATED_AT = '2024-06-15T10:00:00.000Z';

const REMOVED_ORDERS = breaking('REMOVED_ENDPOINT', 'CRITICAL', '/orders', 'Endpoint removed: /orders');
const REQUIRED_EMAIL = breaking(
  'ADDED_REQUIRED_PARAMETER',
  'HIGH',
  'POST /users',
  'Parameter became required: email (query)'
);
const REMOVED_409 = breaking('REMOVED_RESPONSE_CODE', 'MEDIUM', 'POST /users', 'Response code removed: 409');

function createReport(changes: BreakingChange[] = []) {
  return generateReport(changes, 'v1', 'v2', { generatedAt: GENERATED_AT });
}

const stripAnsi = (s: string): string => s.replace(/\u001b\[[0-9;]*m/g, '');

describe('Report Generator', () => {
  // ─── Summary & Recommendation ─────────────────────────────────────────

  describe('Summary', () => {
    test('counts changes per severity', () => {
      const report = createReport([REMOVED_ORDERS, REQUIRED_EMAIL, REMOVED_409]);

      expect(report.summary).toEqual({ CRITICAL: 1, HIGH: 1, MEDIUM: 1, LOW: 0, total: 3 });
      expect(report.grouped.HIGH).toEqual([REQUIRED_EMAIL]);
    });

    test('blocks when a CRITICAL change exists', () => {
      const report = createReport([REQUIRED_EMAIL, REMOVED_ORDERS]);

      expect(report.recommendation).toBe('block');
      expect(report.passed).toBe(false);
      expect(report.exitCode()).toBe(1);
    });

    test('asks for review when the worst change is HIGH', () => {
      const report = createReport([REQUIRED_EMAIL, REMOVED_409]);

      expect(report.recommendation).toBe('review');
      expect(report.exitCode()).toBe(0);
    });

    test('is safe with only MEDIUM or LOW changes', () => {
      expect(createReport([REMOVED_409]).recommendation).toBe('safe');
      expect(createReport().recommendation).toBe('safe');
      expect(createReport().exitCode()).toBe(0);
    });

    test('defaults the timestamp to now', () => {
      const report = generateReport([], 'a', 'b');
      expect(Number.isNaN(Date.parse(report.generatedAt))).toBe(false);
    });
  });

  // ─── Compatibility Score ──────────────────────────────────────────────

  describe('Compatibility score', () => {
    test('is 100 without changes', () => {
      expect(calculateCompatibilityScore([])).toBe(100);
    });

    test('deducts per severity', () => {
      expect(calculateCompatibilityScore([REMOVED_ORDERS, REQUIRED_EMAIL, REMOVED_409])).toBe(60);
      expect(calculateCompatibilityScore([breaking('REMOVED_PARAMETER', 'LOW', 'GET /x')])).toBe(99);
    });

    test('never drops below 0', () => {
      expect(calculateCompatibilityScore(Array.from({ length: 5 }, () => REMOVED_ORDERS))).toBe(0);
    });
  });

  // ─── Text Format ──────────────────────────────────────────────────────

  describe('Text format', () => {
    test('shows a clean report when nothing broke', () => {
      expect(formatReport(createReport(), 'text').split('\n')).toEqual([
        '🔍 OpenAPI Contract Compatibility Report',
        '='.repeat(50),
        `📅 Generated: ${GENERATED_AT}`,
        '🔄 Comparing: v1 → v2',
        '',
        '✅ No breaking changes detected!',
        '🎉 The API is backward compatible.',
        '',
        '💡 Recommendation: safe to release',
      ]);
    });

    test('groups changes by severity, most severe first', () => {
      const output = createReport([REQUIRED_EMAIL, REMOVED_ORDERS]).render('text');

      expect(output.split('\n')).toEqual([
        '🔍 OpenAPI Contract Compatibility Report',
        '='.repeat(50),
        `📅 Generated: ${GENERATED_AT}`,
        '🔄 Comparing: v1 → v2',
        '',
        '📊 Summary:',
        '  🔴 Critical: 1',
        '  🟡 High: 1',
        '  🟠 Medium: 0',
        '  🟢 Low: 0',
        '  Compatibility Score: 65%',
        '',
        '🔴 CRITICAL BREAKING CHANGES:',
        '-'.repeat(26),
        '  • Endpoint removed: /orders',
        '    Path: /orders',
        '    Type: REMOVED_ENDPOINT',
        '',
        '🟡 HIGH IMPACT CHANGES:',
        '-'.repeat(20),
        '  • Parameter became required: email (query)',
        '    Path: POST /users',
        '',
        '💡 Recommendation: block',
        '  ❌ DO NOT DEPLOY - Critical breaking changes detected',
        '  🔧 Fix breaking changes or bump major version',
        '',
        '🔗 Next Steps:',
        '  1. Review breaking changes above',
        '  2. Update API documentation',
        '  3. Notify API consumers of changes',
        '  4. Update integration tests',
      ]);
    });

    test('suggests a major version bump for HIGH changes', () => {
      const lines = createReport([REQUIRED_EMAIL]).render('text').split('\n');

      expect(lines).toContain('💡 Recommendation: review/major-version');
      expect(lines).toContain('  ⚠️  Consider major version bump');
      expect(lines).toContain('  📋 Prepare migration guide for clients');
    });

    test('approves a minor bump for MEDIUM changes', () => {
      const lines = createReport([REMOVED_409]).render('text').split('\n');

      expect(lines).toContain('🟠 MEDIUM IMPACT CHANGES:');
      expect(lines).toContain('💡 Recommendation: safe to release');
      expect(lines).toContain('  ✅ Safe to deploy with minor version bump');
    });

    test('defaults render() to text', () => {
      const report = createReport([REMOVED_409]);
      expect(report.render()).toBe(formatReport(report, 'text'));
    });
  });

  // ─── Console Format ───────────────────────────────────────────────────

  describe('Console format', () => {
    test('has the same content as the text format', () => {
      const report = createReport([REMOVED_ORDERS, REQUIRED_EMAIL, REMOVED_409]);
      expect(stripAnsi(formatReport(report, 'console'))).toBe(formatReport(report, 'text'));
    });
  });

  // ─── Markdown Format ──────────────────────────────────────────────────

  describe('Markdown format', () => {
    test('renders header, table and sections', () => {
      const output = formatReport(createReport([REQUIRED_EMAIL, REMOVED_ORDERS]), 'markdown');

      expect(output.split('\n')).toEqual([
        '# API Migration Report: v1 → v2',
        '',
        `**Generated:** ${GENERATED_AT}`,
        '**Recommendation:** block',
        '**Compatibility Score:** 65%',
        '',
        '| Severity | Count |',
        '|---|---|',
        '| CRITICAL | 1 |',
        '| HIGH | 1 |',
        '| MEDIUM | 0 |',
        '| LOW | 0 |',
        '',
        '## 🔴 CRITICAL',
        '',
        '- **/orders**: Endpoint removed: /orders (`REMOVED_ENDPOINT`)',
        '',
        '## 🟡 HIGH',
        '',
        '- **POST /users**: Parameter became required: email (query) (`ADDED_REQUIRED_PARAMETER`)',
        '',
        '## Next Steps',
        '',
        '1. Review breaking changes above',
        '2. Update API documentation',
        '3. Notify API consumers of changes',
        '4. Update integration tests',
      ]);
    });

    test('renders a clean report', () => {
      const output = formatReport(createReport(), 'markdown');

      expect(output.split('\n').slice(-1)).toEqual(['✅ **No breaking changes detected**']);
      expect(output).toContain('**Compatibility Score:** 100%');
    });
  });

  // ─── JSON Format ──────────────────────────────────────────────────────

  describe('JSON format', () => {
    test('outputs valid JSON with summary and changes', () => {
      const parsed = JSON.parse(formatReport(createReport([REMOVED_409]), 'json'));

      expect(parsed).toEqual({
        oldLabel: 'v1',
        newLabel: 'v2',
        generatedAt: GENERATED_AT,
        summary: { CRITICAL: 0, HIGH: 0, MEDIUM: 1, LOW: 0, total: 1 },
        recommendation: 'safe to release',
        compatibilityScore: 95,
        exitCode: 0,
        changes: [
          {
            changeType: 'REMOVED_RESPONSE_CODE',
            affectedPath: 'POST /users',
            description: 'Response code removed: 409',
            severity: 'MEDIUM',
          },
        ],
      });
    });
  });

  // ─── Writing Reports ──────────────────────────────────────────────────

  describe('writeReport', () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir('report');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('writes Markdown by default, creating parent directories', () => {
      const report = createReport([REMOVED_ORDERS]);
      const file = path.join(dir, 'nested', 'reports', 'migration.md');

      writeReport(report, file);

      expect(fs.readFileSync(file, 'utf-8')).toBe(report.render('markdown'));
    });

    test('writes the requested format', () => {
      const report = createReport([REMOVED_ORDERS]);
      const file = path.join(dir, 'report.json');

      writeReport(report, file, 'json');

      expect(JSON.parse(fs.readFileSync(file, 'utf-8')).exitCode).toBe(1);
    });
  });
});
