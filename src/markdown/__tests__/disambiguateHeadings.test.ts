import { disambiguateHeadings } from '../disambiguateHeadings';
import { findHeadings } from '../headings';

describe('disambiguateHeadings', () => {
  test('suffixes the second occurrence', () => {
    expect(disambiguateHeadings('## Intro\n\n## Intro\n')).toBe('## Intro\n\n## Intro (1)\n');
  });

  test('counts further repeats', () => {
    expect(disambiguateHeadings('# A\n# A\n# A\n# B')).toBe('# A\n# A (1)\n# A (2)\n# B');
  });

  test('compares text regardless of level', () => {
    expect(disambiguateHeadings('# Overview\n\n## Overview\n')).toBe('# Overview\n\n## Overview (1)\n');
  });

  test('ignores lines inside code fences', () => {
    const src = '# A\n\n```sh\n# A\n```\n';
    expect(disambiguateHeadings(src)).toBe(src);
  });
});

describe('findHeadings', () => {
  test('returns level, text and line index', () => {
    expect(findHeadings(['# One', 'x', '### Three  ', '```', '## no', '```'])).toEqual([
      { level: 1, text: 'One', line: 0 },
      { level: 3, text: 'Three', line: 2 },
    ]);
  });
});
