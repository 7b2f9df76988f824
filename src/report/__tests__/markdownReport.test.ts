import { reportToMarkdown } from '../markdownReport';
import { createEmptyReport, recordFinding } from '../exportReport';

describe('markdownReport', () => {
  test('renders stable sections even when empty', () => {
    const r = createEmptyReport({ toolName: 'code-export-md', toolVersion: '0.0.0', sourceRoot: '/x' });
    const md = reportToMarkdown(r);

    expect(md).toContain('# Export report');
    expect(md).toContain('- Files exported: **0**');
    expect(md).toContain('## Files by grammar');
    expect(md).toContain('| (none) | 0 |');
    expect(md).toContain('## Findings summary');
    expect(md).toContain('| (none) | (none) | | |');
  });

  test('escapes pipes and sorts findings deterministically', () => {
    const r = createEmptyReport({ toolName: 'code-export-md', toolVersion: '0.0.0', sourceRoot: '/x' });
    recordFinding(r, {
      kind: 'stripFailed',
      severity: 'warning',
      message: 'CStyle lexer failed: a|b',
      location: { file: 'b.cs' },
    });
    recordFinding(r, { kind: 'note', severity: 'info', message: 'A note' });
    recordFinding(r, {
      kind: 'skippedTooLarge',
      severity: 'warning',
      message: 'File is 2048 KB, limit is 1024 KB',
      location: { file: 'big.sql' },
    });
    r.counts.filesByGrammar.CStyle = 3;
    const md = reportToMarkdown(r);

    expect(md).toContain('- Files skipped: **1**');
    expect(md).toContain('| CStyle | 3 |');
    expect(md).toContain('| warning | stripFailed | b.cs | CStyle lexer failed: a\\|b |');

    const idxNote = md.indexOf('| info | note |');
    const idxSkip = md.indexOf('| warning | skippedTooLarge |');
    const idxStrip = md.indexOf('| warning | stripFailed |');
    expect(idxNote).toBeGreaterThan(0);
    expect(idxNote).toBeLessThan(idxSkip);
    expect(idxSkip).toBeLessThan(idxStrip);
  });
});
