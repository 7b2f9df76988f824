import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { type ExportReport, serializeReport } from '../report/exportReport';
import { reportToMarkdown } from '../report/markdownReport';

export type ReportFormat = 'json' | 'md';

async function writeTextFile(filePath: string, text: string): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, text, 'utf8');
}

/** Writes an exported document, creating parent folders. */
export async function writeMarkdownFile(filePath: string, markdown: string): Promise<void> {
  await writeTextFile(filePath, markdown);
}

/** Writes the summary report as Markdown or as key-sorted JSON. */
export async function writeReportFile(filePath: string, report: ExportReport, format: ReportFormat = 'md'): Promise<void> {
  await writeTextFile(filePath, format === 'json' ? serializeReport(report) : reportToMarkdown(report));
}
