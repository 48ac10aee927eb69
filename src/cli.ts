#!/usr/bin/env node

/**
 * api-contract-compat CLI
 *
 * Commands:
 *   compare           - Compare two contract files
 *   validate-all      - Check every transition of the configured version chain
 *   migration-report  - Write a migration report between two versions
 *   help              - Show usage
 */

import * as path from 'path';
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { ContractGuard } from './guard';
import { CheckerConfig, loadConfig } from './config';
import { ContractDocument, ReportFormat } from './core/types';
import { describeError, errorMessage } from './core/errors';
import { formatChainSummary } from './core/orchestrator';
import { writeReport } from './core/reporter';

const REPORT_FORMATS: ReportFormat[] = ['console', 'text', 'markdown', 'json'];

export interface CliIO {
  out(message: string): void;
  err(message: string): void;
}

const consoleIO: CliIO = {
  out: (message) => console.log(message),
  err: (message) => console.error(message),
};

export interface ProgramOptions {
  io?: CliIO;

  /** Throw CommanderError instead of exiting on usage errors */
  exitOverride?: boolean;
}

interface CompareCliOptions {
  format?: ReportFormat;
  output?: string;
}

interface LayoutCliOptions {
  specRoot?: string;
}

interface ValidateAllCliOptions extends LayoutCliOptions {
  versions?: string[];
  discover?: boolean;
  strict?: boolean;
}

interface MigrationCliOptions extends LayoutCliOptions {
  outDir?: string;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function parseVersionList(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function contractLogger(io: CliIO) {
  return (filePath: string, contract: ContractDocument): void => {
    const title = contract.info.title ?? path.basename(filePath);
    const version = contract.info.version ? ` v${contract.info.version}` : '';
    io.err(chalk.gray(`✅ Loaded contract: ${title}${version} (${filePath})`));
  };
}

function guardFor(config: CheckerConfig, io: CliIO, opts: LayoutCliOptions & { strict?: boolean } = {}): ContractGuard {
  return new ContractGuard({
    specRoot: opts.specRoot ?? config.specRoot,
    versions: config.versions,
    contractDir: config.contractDir,
    extensions: config.extensions,
    strict: opts.strict,
    onContractLoaded: contractLogger(io),
  });
}

function fail(io: CliIO, error: unknown): void {
  io.err(chalk.red(`❌ Error: ${errorMessage(error)}`));
  process.exitCode = 1;
}

// ─── Program ────────────────────────────────────────────────────────────────

export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? consoleIO;
  const program = new Command();

  program
    .name('api-contract-compat')
    .description('Detect breaking changes between versions of an OpenAPI contract.')
    .version('1.0.0')
    .option('-c, --config <file>', 'Configuration file (default: ./api-contract-compat.config.json)')
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  if (options.exitOverride) {
    program.exitOverride();
  }

  const config = (): CheckerConfig => loadConfig({ configPath: program.opts<{ config?: string }>().config });

  // ─── compare Command ────────────────────────────────────────────────────

  program
    .command('compare')
    .description('Compare two contract files and report breaking changes')
    .argument('<oldSpecPath>', 'Baseline contract (YAML or JSON)')
    .argument('<newSpecPath>', 'Candidate contract (YAML or JSON)')
    .addOption(new Option('-f, --format <format>', 'Report format').choices(REPORT_FORMATS))
    .option('-o, --output <file>', 'Write report to file instead of stdout')
    .action((oldSpecPath: string, newSpecPath: string, opts: CompareCliOptions) => {
      try {
        const cfg = config();
        const format = opts.format ?? cfg.reportFormat;
        const result = guardFor(cfg, io).compareFiles(oldSpecPath, newSpecPath);

        if (!result.success) {
          io.err(chalk.red(`❌ ${describeError(result.error)}`));
          process.exitCode = 1;
          return;
        }

        const report = result.data;
        if (opts.output) {
          writeReport(report, opts.output, format);
          io.out(`📄 Report written to ${opts.output}`);
        } else {
          io.out(report.render(format));
        }

        process.exitCode = report.exitCode();
      } catch (error) {
        fail(io, error);
      }
    });

  // ─── validate-all Command ───────────────────────────────────────────────

  program
    .command('validate-all')
    .description('Check every adjacent transition of the version chain')
    .option('--versions <list>', 'Comma-separated version chain (e.g. "v1,v2,v3")', parseVersionList)
    .option('--spec-root <dir>', 'Directory holding one sub-directory per version')
    .option('--discover', 'Use the version directories found under the spec root')
    .option('--strict', 'Fail when a transition had to be skipped')
    .action(async (opts: ValidateAllCliOptions) => {
      try {
        const cfg = config();
        const guard = guardFor(cfg, io, opts);
        const versions = opts.discover
          ? await guard.discoverVersions()
          : (opts.versions ?? cfg.versions);

        io.out(`🔍 Validating API versions: ${versions.join(', ') || '(none)'}`);
        const result = await guard.validateAll(versions);

        for (const t of result.transitions) {
          if (t.status === 'skipped') {
            io.err(chalk.yellow(`⚠️  Skipping ${t.label}: ${t.warning ?? 'contract unavailable'}`));
          }
        }

        io.out('');
        io.out(formatChainSummary(result));
        process.exitCode = result.passed ? 0 : 1;
      } catch (error) {
        fail(io, error);
      }
    });

  // ─── migration-report Command ───────────────────────────────────────────

  program
    .command('migration-report')
    .description('Write a Markdown migration report between two versions')
    .argument('<fromVersion>', 'Baseline version label (e.g. v1)')
    .argument('<toVersion>', 'Target version label (e.g. v2)')
    .option('--spec-root <dir>', 'Directory holding one sub-directory per version')
    .option('--out-dir <dir>', 'Directory for the report file (default: current directory)')
    .action(async (fromVersion: string, toVersion: string, opts: MigrationCliOptions) => {
      try {
        const guard = guardFor(config(), io, opts);

        io.out(`📊 Generating migration report: ${fromVersion} → ${toVersion}`);
        const result = await guard.migrationReport(fromVersion, toVersion, { outDir: opts.outDir });

        if (!result.success) {
          io.err(chalk.red(`❌ ${describeError(result.error)}`));
          process.exitCode = 1;
          return;
        }

        const { report, filePath } = result.data;
        io.out(report.render('console'));
        io.out('');
        io.out(`💾 Report saved to: ${filePath}`);
        process.exitCode = report.exitCode();
      } catch (error) {
        fail(io, error);
      }
    });

  return program;
}

/**
 * Run the CLI with user arguments (without the node and script entries).
 */
export async function run(argv: string[], options: ProgramOptions = {}): Promise<void> {
  const program = createProgram(options);

  if (argv.length === 0) {
    (options.io ?? consoleIO).out(program.helpInformation().trimEnd());
    return;
  }

  await program.parseAsync(argv, { from: 'user' });
}

// ─── Run ────────────────────────────────────────────────────────────────────

if (require.main === module) {
  run(process.argv.slice(2)).catch((error: unknown) => {
    console.error(`❌ Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
}
