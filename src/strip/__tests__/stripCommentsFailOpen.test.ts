import { stripCommentsDetailed, stripComments } from '../stripComments';

jest.mock('../lexers/cStyleLexer', () => ({
  stripCStyleLine: () => {
    throw new RangeError('scanner index out of range');
  },
}));

describe('stripComments fail-open', () => {
  test('returns the original content with a warning when a lexer throws', () => {
    const src = 'int a; // c\n';
    const r = stripCommentsDetailed(src, '.cs');
    expect(r.content).toBe(src);
    expect(r.grammar).toBe('CStyle');
    expect(r.warning).toBe('CStyle lexer failed: scanner index out of range');
  });

  test('the plain entry point never throws', () => {
    expect(stripComments('x // y', '.ts')).toBe('x // y');
  });

  test('other grammars are unaffected', () => {
    expect(stripComments('x = 1 # y', '.py')).toBe('x = 1');
  });
});
