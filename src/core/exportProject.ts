import fs from 'node:fs/promises';
import path from 'node:path';
import { scanSourceFiles } from '../scan/sourceScanner';
import { grammarForExtension } from '../strip/grammar';
import { stripCommentsDetailed } from '../strip/stripComments';
import { assembleDocument, type ExportedFile } from '../export/assembleDocument';
import { normalizeMarkdownDetailed } from '../markdown/normalizeMarkdown';
import { disambiguateHeadingsDetailed } from '../markdown/disambiguateHeadings';
import {
  countGrammar,
  createEmptyReport,
  finalizeReport,
  recordFinding,
  warningCount,
  type ExportReport,
} from '../report/exportReport';

import { TOOL_NAME, VERSION } from '../version';

export type ExportProjectOptions = {
  sourceRoot: string;
  excludeGlobs?: string[];
  /** Default true. */
  includeTests?: boolean;
  extensions?: string[];
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
  /** Files never exported, typically the document and report being written by this run. */
  excludeFiles?: string[];
  /** Files larger than this are skipped. */
  maxFileBytes?: number;
  /** Once the exported files add up to this many bytes, every later file is skipped. */
  maxTotalBytes?: number;
  /** Default true. */
  stripComments?: boolean;
  lineNumbers?: boolean;
  /** Default true. */
  includeTree?: boolean;
  /** Default true. */
  includeToc?: boolean;
  /** Default true. */
  normalize?: boolean;
  dedupeHeadings?: boolean;
};

export type ExportProjectResult = {
  markdown: string;
  report: ExportReport;
  /** Findings that degraded the output (skipped files, fail-open fallbacks). */
  warningCount: number;
};

const BINARY_SNIFF_BYTES = 8000;

export function looksBinary(buf: Buffer): boolean {
  return buf.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

export function decodeText(buf: Buffer): string {
  const text = buf.toString('utf8');
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}

function kb(bytes: number): string {
  return `${Math.ceil(bytes / 1024)} KB`;
}

/**
 * Core library entrypoint: export one source root as a single Markdown document.
 *
 * - Does not write files.
 * - Never fails on a single file: problems become report findings and the file is skipped
 *   or exported unstripped.
 */
export async function exportProject(opts: ExportProjectOptions): Promise<ExportProjectResult> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const rootName = path.basename(sourceRoot) || sourceRoot;
  const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, sourceRoot });

  const relPaths = await scanSourceFiles({
    sourceRoot,
    excludeGlobs: opts.excludeGlobs,
    includeTests: opts.includeTests ?? true,
    extensions: opts.extensions,
    maxFiles: opts.maxFiles,
    excludeFiles: opts.excludeFiles,
  });
  report.filesScanned = relPaths.length;

  const strip = opts.stripComments ?? true;
  const files: ExportedFile[] = [];
  let totalBytes = 0;
  let totalLimitReached = false;

  for (const rel of relPaths) {
    if (totalLimitReached) {
      recordFinding(report, { kind: 'skippedTotalLimit', severity: 'warning', message: 'Total size limit reached', location: { file: rel } });
      continue;
    }

    let buf: Buffer;
    try {
      buf = await fs.readFile(path.join(sourceRoot, rel));
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      recordFinding(report, { kind: 'skippedUnreadable', severity: 'warning', message: msg, location: { file: rel } });
      continue;
    }

    if (opts.maxFileBytes !== undefined && buf.length > opts.maxFileBytes) {
      recordFinding(report, {
        kind: 'skippedTooLarge',
        severity: 'warning',
        message: `File is ${kb(buf.length)}, limit is ${kb(opts.maxFileBytes)}`,
        location: { file: rel },
      });
      continue;
    }
    if (looksBinary(buf)) {
      recordFinding(report, { kind: 'skippedBinary', severity: 'warning', message: 'Binary content', location: { file: rel } });
      continue;
    }
    if (opts.maxTotalBytes !== undefined && totalBytes + buf.length > opts.maxTotalBytes) {
      totalLimitReached = true;
      recordFinding(report, {
        kind: 'skippedTotalLimit',
        severity: 'warning',
        message: `Total size limit of ${kb(opts.maxTotalBytes)} reached`,
        location: { file: rel },
      });
      continue;
    }
    totalBytes += buf.length;

    const extension = path.extname(rel);
    let content = decodeText(buf);
    let grammar = grammarForExtension(extension);
    if (strip) {
      const r = stripCommentsDetailed(content, extension);
      content = r.content;
      grammar = r.grammar;
      if (r.warning) recordFinding(report, { kind: 'stripFailed', severity: 'warning', message: r.warning, location: { file: rel } });
    }
    countGrammar(report, grammar);
    files.push({ relPath: rel, extension, content });
  }

  report.filesExported = files.length;
  report.bytesRead = totalBytes;
  if (!strip) recordFinding(report, { kind: 'note', severity: 'info', message: 'Comment stripping disabled' });

  let markdown = assembleDocument({
    rootName,
    files,
    includeTree: opts.includeTree,
    includeToc: opts.includeToc,
    lineNumbers: opts.lineNumbers,
  });

  const postWarnings: string[] = [];
  if (opts.normalize ?? true) {
    const r = normalizeMarkdownDetailed(markdown);
    markdown = r.content;
    postWarnings.push(...r.warnings);
  }
  if (opts.dedupeHeadings) {
    const r = disambiguateHeadingsDetailed(markdown);
    markdown = r.content;
    postWarnings.push(...r.warnings);
  }
  for (const w of postWarnings) recordFinding(report, { kind: 'normalizeFailed', severity: 'warning', message: w });

  const final = finalizeReport(report);
  return { markdown, report: final, warningCount: warningCount(final) };
}
