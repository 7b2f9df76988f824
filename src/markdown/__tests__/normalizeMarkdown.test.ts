import { normalizeMarkdown, normalizeMarkdownDetailed, NORMALIZE_PASSES } from '../normalizeMarkdown';
import { runPasses } from '../failOpen';

const SAMPLES: string[] = [
  '',
  '\n\n\n',
  'Some text',
  '##NoSpace\ntext',
  '# Title\n\n\n\n## A\nbody\n#B\n',
  '\t# indented?\n\n```\n' + 'word '.repeat(60) + '\n```\n',
  '# T\n```py\n# c\n\n\n\nx\n```\n## After   \n\n',
  '## Intro\n## Intro\r\nText\t\twith tabs\n',
  '````md\n```\n#x\n````\n' + 'y '.repeat(80),
  '```\n' + 'z'.repeat(200) + ' ' + 'q'.repeat(5),
  '# T\n\n```text\n' + 'a '.repeat(59) + '```\n```\n\n' + 'p'.repeat(149) + '\n',
];

describe('normalizeMarkdown', () => {
  test('rewrites a heading missing its space', () => {
    expect(normalizeMarkdown('# Doc\n\n##NoSpace\n')).toBe('# Doc\n\n## NoSpace\n');
  });

  test('enforces a top-level heading', () => {
    expect(normalizeMarkdown('Some text')).toBe('# Source Code Export\n\nSome text\n');
  });

  test('adds spacing around headings and collapses blank runs', () => {
    expect(normalizeMarkdown('# T\ntext\n\n\n\nmore\n## S\nend\n\n\n')).toBe('# T\n\ntext\n\nmore\n\n## S\n\nend\n');
  });

  test('wraps long fenced lines without touching the fence markers', () => {
    const words = Array.from({ length: 40 }, (_, i) => `w${String(i).padStart(3, '0')}`).join(' ');
    expect(words.length).toBe(199);
    const out = normalizeMarkdown(`# T\n\n\`\`\`text\n${words}\n\`\`\`\n`);
    const lines = out.split('\n');
    expect(lines[2]).toBe('```text');
    const closing = lines.indexOf('```', 3);
    expect(closing).toBeGreaterThan(3);
    const wrapped = lines.slice(3, closing);
    expect(wrapped.length).toBeGreaterThan(1);
    for (const l of wrapped) expect(l.length).toBeLessThanOrEqual(120);
    expect(wrapped.join(' ')).toBe(words);
    expect(lines.slice(closing + 1)).toEqual(['']);
  });

  test('keeps a trailing backtick run on the wrapped code line', () => {
    const doc = `# T\n\n\`\`\`text\n${'a '.repeat(59)}\`\`\`\n\`\`\`\n\n${'p'.repeat(149)}\n`;
    expect(normalizeMarkdown(doc)).toBe(doc);
  });

  test.each(SAMPLES.map((s): [string, string] => [JSON.stringify(s).slice(0, 40), s]))('is idempotent: %s', (_label, sample) => {
    const once = normalizeMarkdown(sample);
    expect(normalizeMarkdown(once)).toBe(once);
  });

  test('ends with exactly one newline', () => {
    expect(normalizeMarkdown('# A\n\n\n')).toBe('# A\n');
  });

  test('reports no warnings on ordinary input', () => {
    expect(normalizeMarkdownDetailed('# A\n').warnings).toEqual([]);
  });
});

describe('fail-open passes', () => {
  test('a failing pass is skipped and the others still apply', () => {
    const broken = {
      name: 'broken',
      apply: (): string => {
        throw new Error('boom');
      },
    };
    const [first, ...rest] = NORMALIZE_PASSES;
    const r = runPasses([first, broken, ...rest], 'Some text\t');
    expect(r.content).toBe('# Source Code Export\n\nSome text\n');
    expect(r.warnings).toEqual(['broken failed: boom']);
  });
});
