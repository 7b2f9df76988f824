import { finishLine, type LexedLine, type LexerState } from '../lexerState';

const URL_SCHEME_SEPARATOR = '://';

/** `https://host/--path` keeps its dashes; the check is purely textual. */
function followsUrlScheme(line: string, index: number): boolean {
  return index >= URL_SCHEME_SEPARATOR.length && line.slice(index - URL_SCHEME_SEPARATOR.length, index) === URL_SCHEME_SEPARATOR;
}

/**
 * `--` line comments and `/* *\/` block comments. Quoted literals and identifiers are copied
 * verbatim; a doubled `''` inside a literal closes and reopens it, which leaves it intact.
 */
export function stripSqlLine(line: string, state: LexerState): LexedLine {
  let out = '';
  let inBlock = state.inBlockComment;
  let quote: '"' | "'" | undefined;
  let i = 0;

  while (i < line.length) {
    if (inBlock) {
      const close = line.indexOf('*/', i);
      if (close < 0) break;
      inBlock = false;
      i = close + 2;
      continue;
    }

    const ch = line[i];
    const next = line[i + 1];

    if (quote) {
      if (ch === '\\' && next !== undefined) {
        out += ch + next;
        i += 2;
        continue;
      }
      if (ch === quote) quote = undefined;
      out += ch;
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      out += ch;
      i++;
      continue;
    }
    if (ch === '/' && next === '*') {
      inBlock = true;
      i += 2;
      continue;
    }
    if (ch === '-' && next === '-' && !followsUrlScheme(line, i)) break;

    out += ch;
    i++;
  }

  return finishLine(out, { inBlockComment: inBlock, quote: 'none' });
}
