import { stableStringify } from '../util/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** Relative file path (posix) within the export root. */
  file: string;
};

export type ReportFindingKind =
  | 'skippedTooLarge'
  | 'skippedTotalLimit'
  | 'skippedBinary'
  | 'skippedUnreadable'
  | 'stripFailed'
  | 'normalizeFailed'
  | 'note';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
};

export type ExportReport = {
  schema: 'export-report-v1';
  tool: { name: string; version: string };
  sourceRoot: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesScanned: number;
  filesExported: number;
  filesSkipped: number;
  bytesRead: number;
  counts: {
    filesByGrammar: Record<string, number>;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  sourceRoot: string;
  startedAtIso?: string;
}): ExportReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'export-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    sourceRoot: args.sourceRoot,
    startedAtIso: now,
    finishedAtIso: now,
    filesScanned: 0,
    filesExported: 0,
    filesSkipped: 0,
    bytesRead: 0,
    counts: { filesByGrammar: {} },
    findings: [],
  };
}

export function finalizeReport(report: ExportReport, finishedAtIso?: string): ExportReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

/** Findings that mean the output is degraded, as opposed to informational notes. */
export function warningCount(report: ExportReport): number {
  return report.findings.filter((f) => f.severity !== 'info').length;
}

export function serializeReport(report: ExportReport): string {
  // Keep it deterministic for tests and CI diffs.
  return stableStringify(report);
}

/** Appends a finding; every `skipped*` kind also counts one skipped file. */
export function recordFinding(report: ExportReport, finding: ReportFinding): void {
  report.findings.push(finding);
  if (finding.kind.startsWith('skipped')) report.filesSkipped += 1;
}

export function countGrammar(report: ExportReport, grammar: string): void {
  const byGrammar = report.counts.filesByGrammar;
  byGrammar[grammar] = (byGrammar[grammar] ?? 0) + 1;
}
