import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { main, runExport, toExportCliOptions } from '../cli';

function writeFile(p: string, content: string | Buffer) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content);
}

describe('CLI exit codes', () => {
  test('returns exit code 3 when --fail-on-warnings=true and files were skipped (even without --report)', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'code-export-md-exit3-'));
    writeFile(path.join(dir, 'src', 'ok.ts'), 'export const ok = 1;\n');
    writeFile(path.join(dir, 'src', 'blob.ts'), Buffer.from([0x00, 0x01]));
    const out = path.join(dir, 'out', 'export.md');

    const code = await runExport(
      toExportCliOptions({ source: [path.join(dir, 'src')], out, failOnWarnings: 'true' }),
    );

    expect(code).toBe(3);
    expect(fs.existsSync(out)).toBe(true);
  });

  test('returns 0 for the same tree without --fail-on-warnings', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'code-export-md-exit0-'));
    writeFile(path.join(dir, 'blob.ts'), Buffer.from([0x00]));
    const code = await runExport(toExportCliOptions({ source: [dir], out: path.join(dir, 'o.md') }));
    expect(code).toBe(0);
  });

  test('output and report files inside the source root are not exported on the next run', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'code-export-md-self-'));
    writeFile(path.join(dir, 'a.ts'), 'export const a = 1;\n');
    const out = path.join(dir, 'export.md');
    const report = path.join(dir, 'report.md');
    const opts = toExportCliOptions({ source: [dir], out, report });

    expect(await runExport(opts)).toBe(0);
    const first = fs.readFileSync(out, 'utf8');
    expect(await runExport(opts)).toBe(0);
    const second = fs.readFileSync(out, 'utf8');

    expect(second).toBe(first);
    expect(second).not.toContain('### export.md');
    expect(second).not.toContain('### report.md');
  });

  test('main returns 1 when a required option is missing', async () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      expect(await main(['node', 'code-export-md', '--out', 'x.md'])).toBe(1);
    } finally {
      stderr.mockRestore();
    }
  });
});
