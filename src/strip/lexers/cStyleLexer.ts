import { finishLine, type LexedLine, type LexerState } from '../lexerState';

/**
 * `//` line comments and `/* *\/` block comments, shared by the curly-brace languages.
 * Single and double-quoted literals are copied verbatim, backslash escapes included.
 */
export function stripCStyleLine(line: string, state: LexerState): LexedLine {
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
    if (ch === '/' && next === '/') break;

    out += ch;
    i++;
  }

  return finishLine(out, { inBlockComment: inBlock, quote: 'none' });
}
