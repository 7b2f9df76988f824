#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { TOOL_NAME, VERSION } from './version';
import { exportProject } from './core/exportProject';
import { writeMarkdownFile, writeReportFile, type ReportFormat } from './export/writeOutputs';
import { kbToBytes, parseBoolish, parseIntish, planOutputs } from './cli/args';

export type ExportCliOptions = {
  sources: string[];
  out: string;
  exclude: string[];
  extensions: string[];
  includeTests: boolean;
  maxFiles?: number;
  maxFileBytes?: number;
  maxTotalBytes?: number;
  stripComments: boolean;
  lineNumbers: boolean;
  tree: boolean;
  toc: boolean;
  normalize: boolean;
  dedupeHeadings: boolean;
  report?: string;
  reportFormat: ReportFormat;
  failOnWarnings: boolean;
  verbose: boolean;
};

type RawCliOptions = {
  source?: string[];
  out?: string;
  exclude?: string[];
  ext?: string[];
  includeTests?: unknown;
  maxFiles?: unknown;
  maxFileSize?: unknown;
  maxTotalSize?: unknown;
  stripComments?: unknown;
  lineNumbers?: unknown;
  tree?: unknown;
  toc?: unknown;
  normalize?: unknown;
  dedupeHeadings?: unknown;
  report?: string;
  reportFormat?: string;
  failOnWarnings?: unknown;
  verbose?: boolean;
};

const DEFAULT_MAX_FILE_KB = 1024;

export async function runExport(opts: ExportCliOptions): Promise<number> {
  let warnings = 0;

  for (const plan of planOutputs(opts.sources, opts.out, opts.report)) {
    const ownOutputs = plan.report ? [plan.out, plan.report] : [plan.out];
    const result = await exportProject({
      sourceRoot: plan.source,
      excludeFiles: ownOutputs,
      excludeGlobs: opts.exclude,
      extensions: opts.extensions,
      includeTests: opts.includeTests,
      maxFiles: opts.maxFiles,
      maxFileBytes: opts.maxFileBytes,
      maxTotalBytes: opts.maxTotalBytes,
      stripComments: opts.stripComments,
      lineNumbers: opts.lineNumbers,
      includeTree: opts.tree,
      includeToc: opts.toc,
      normalize: opts.normalize,
      dedupeHeadings: opts.dedupeHeadings,
    });

    await writeMarkdownFile(plan.out, result.markdown);
    if (plan.report) await writeReportFile(plan.report, result.report, opts.reportFormat);
    warnings += result.warningCount;

    if (opts.verbose) {
      const r = result.report;
      // eslint-disable-next-line no-console
      console.log(
        `Exported ${r.filesExported} of ${r.filesScanned} file(s) from ${r.sourceRoot} (skipped: ${r.filesSkipped}). Wrote: ${plan.out}`,
      );
      if (plan.report) {
        // eslint-disable-next-line no-console
        console.log(`Wrote report: ${plan.report} (warnings: ${result.warningCount})`);
      }
    }
  }

  if (opts.failOnWarnings && warnings > 0) return 3;
  return 0;
}

export function toExportCliOptions(raw: RawCliOptions): ExportCliOptions {
  const report = raw.report && raw.report.trim() !== '' ? raw.report : undefined;
  const reportFormat: ReportFormat = String(raw.reportFormat ?? 'md').toLowerCase() === 'json' ? 'json' : 'md';
  return {
    sources: raw.source ?? [],
    out: raw.out ?? '',
    exclude: raw.exclude ?? [],
    extensions: raw.ext ?? [],
    includeTests: parseBoolish(raw.includeTests, true),
    maxFiles: parseIntish(raw.maxFiles),
    maxFileBytes: kbToBytes(raw.maxFileSize ?? DEFAULT_MAX_FILE_KB),
    maxTotalBytes: kbToBytes(raw.maxTotalSize),
    stripComments: parseBoolish(raw.stripComments, true),
    lineNumbers: parseBoolish(raw.lineNumbers, false),
    tree: parseBoolish(raw.tree, true),
    toc: parseBoolish(raw.toc, true),
    normalize: parseBoolish(raw.normalize, true),
    dedupeHeadings: parseBoolish(raw.dedupeHeadings, false),
    report,
    reportFormat,
    failOnWarnings: parseBoolish(raw.failOnWarnings, false),
    verbose: Boolean(raw.verbose),
  };
}

export async function main(argv: string[]): Promise<number> {
  const program = new Command();
  let exitCode = 0;

  const keep = (v: string): string => v;

  program
    .name(TOOL_NAME)
    .description('Export source trees into a single lint-clean Markdown document')
    .version(VERSION)
    .exitOverride()
    .requiredOption('--source <path...>', 'Root directory (or directories) to export')
    .requiredOption('--out <path>', 'Output Markdown file; a folder when several roots are given')
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to each root)', [])
    .option('--ext <ext...>', 'Only export these extensions (default: every known one)', [])
    .option('--include-tests [bool]', 'Include test files (default true)', keep, undefined)
    .option('--max-files <n>', 'Safety cap for huge trees (default no cap)', keep, undefined)
    .option('--max-file-size <kb>', `Skip files larger than this (default ${DEFAULT_MAX_FILE_KB}, 0 = no limit)`, keep, undefined)
    .option('--max-total-size <kb>', 'Stop adding files past this total (default no limit)', keep, undefined)
    .option('--strip-comments [bool]', 'Strip comments from source files (default true)', keep, undefined)
    .option('--line-numbers [bool]', 'Prefix code lines with line numbers (default false)', keep, undefined)
    .option('--tree [bool]', 'Include a directory tree (default true)', keep, undefined)
    .option('--toc [bool]', 'Include a table of contents (default true)', keep, undefined)
    .option('--normalize [bool]', 'Normalize the Markdown output (default true)', keep, undefined)
    .option('--dedupe-headings [bool]', 'Suffix repeated headings with (1), (2), ... (default false)', keep, undefined)
    .option('--report <file>', 'Optional summary report path', '')
    .option('--report-format <format>', 'md|json', 'md')
    .option('--fail-on-warnings [bool]', 'Exit with code 3 when files were skipped or a pass failed (default false)', keep, undefined)
    .option('-v, --verbose', 'Verbose logging', false);

  program.action(async (raw: RawCliOptions) => {
    exitCode = await runExport(toExportCliOptions(raw));
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 2;
    },
  );
}
