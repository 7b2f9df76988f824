import type { ExportReport, ReportFinding } from './exportReport';

function fmtLoc(f: ReportFinding): string {
  return f.location?.file ?? '';
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function countTable(lines: string[], counts: Record<string, number>): void {
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(counts).sort((a, b) => a.localeCompare(b));
  for (const k of keys) lines.push(`| ${k} | ${counts[k]} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

/** Deterministic summary of one export run; it is itself lint-clean Markdown. */
export function reportToMarkdown(report: ExportReport): string {
  const lines: string[] = [];

  lines.push(`# Export report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Source root: \`${report.sourceRoot}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files scanned: **${report.filesScanned}**`);
  lines.push(`- Files exported: **${report.filesExported}**`);
  lines.push(`- Files skipped: **${report.filesSkipped}**`);
  lines.push(`- Bytes read: **${report.bytesRead}**`);
  lines.push('');

  lines.push(`## Files by grammar`);
  lines.push('');
  countTable(lines, report.counts.filesByGrammar);

  lines.push(`## Findings summary`);
  lines.push('');
  countTable(lines, countByKind(report.findings));

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${escapeCell(fmtLoc(f))} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) | | |`);
  lines.push('');
  return lines.join('\n');
}
