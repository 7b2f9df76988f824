import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import Ajv, { type SchemaObject } from 'ajv/dist/2020';

import reportSchema from '../schema/export-report-v1.json';
import { countGrammar, createEmptyReport, finalizeReport, recordFinding, serializeReport, warningCount } from '../exportReport';
import { writeReportFile } from '../../export/writeOutputs';

function sampleReport() {
  const r = createEmptyReport({
    toolName: 'code-export-md',
    toolVersion: 'test',
    sourceRoot: '/tmp/project',
    startedAtIso: '2024-01-01T00:00:00.000Z',
  });
  r.filesScanned = 3;
  r.filesExported = 2;
  r.bytesRead = 120;
  countGrammar(r, 'PythonStyle');
  countGrammar(r, 'PythonStyle');
  recordFinding(r, { kind: 'skippedBinary', severity: 'warning', message: 'Binary content', location: { file: 'x.py' } });
  recordFinding(r, { kind: 'note', severity: 'info', message: 'Comments kept' });
  return finalizeReport(r, '2024-01-01T00:00:01.000Z');
}

describe('Export report', () => {
  test('counts skipped files and warnings', () => {
    const r = sampleReport();
    expect(r.filesSkipped).toBe(1);
    expect(r.counts.filesByGrammar).toEqual({ PythonStyle: 2 });
    expect(warningCount(r)).toBe(1);
  });

  test('serializes JSON that validates against export-report-v1.json', () => {
    const parsed: unknown = JSON.parse(serializeReport(sampleReport()));
    const schema: SchemaObject = reportSchema;
    const ajv = new Ajv({ allErrors: true, strict: false });
    const validate = ajv.compile(schema);
    const ok = validate(parsed);

    if (!ok) {
      // eslint-disable-next-line no-console
      console.error(validate.errors);
    }
    expect(ok).toBe(true);
  });

  test('writes markdown and json reports, creating folders', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'code-export-md-report-'));
    const md = path.join(dir, 'nested', 'report.md');
    const json = path.join(dir, 'nested', 'report.json');
    await writeReportFile(md, sampleReport());
    await writeReportFile(json, sampleReport(), 'json');

    expect((await fs.readFile(md, 'utf8')).startsWith('# Export report\n')).toBe(true);
    const parsed: { schema: string; finishedAtIso: string } = JSON.parse(await fs.readFile(json, 'utf8'));
    expect(parsed.schema).toBe('export-report-v1');
    expect(parsed.finishedAtIso).toBe('2024-01-01T00:00:01.000Z');
  });
});
