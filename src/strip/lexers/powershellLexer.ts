import { finishLine, type LexedLine, type LexerState } from '../lexerState';

const BLOCK_OPEN = '<#';
const BLOCK_CLOSE = '#>';

/**
 * PowerShell comments: `#` to end of line, and `<# … #>` blocks that may span lines.
 *
 * A `#` right after `[` is kept so type-literal syntax is not mistaken for a comment.
 * Double-quoted strings use a simplified backslash escape model (PowerShell's real escape
 * character is the backtick); single-quoted strings have no escapes.
 */
export function stripPowerShellLine(line: string, state: LexerState): LexedLine {
  let rest = line;
  if (state.inBlockComment) {
    const close = line.indexOf(BLOCK_CLOSE);
    if (close < 0) return { text: '', state };
    rest = line.slice(close + BLOCK_CLOSE.length);
  }

  let out = '';
  let inBlock = false;
  let quote: '"' | "'" | undefined;
  let i = 0;

  while (i < rest.length) {
    const ch = rest[i];
    const next = rest[i + 1];

    if (quote === '"') {
      if (ch === '\\' && next !== undefined) {
        out += ch + next;
        i += 2;
        continue;
      }
      if (ch === '"') quote = undefined;
      out += ch;
      i++;
      continue;
    }
    if (quote === "'") {
      if (ch === "'") quote = undefined;
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
    if (ch === '<' && next === '#') {
      const close = rest.indexOf(BLOCK_CLOSE, i + BLOCK_OPEN.length);
      if (close < 0) {
        inBlock = true;
        break;
      }
      i = close + BLOCK_CLOSE.length;
      continue;
    }
    if (ch === '#' && rest[i - 1] !== '[') break;

    out += ch;
    i++;
  }

  return finishLine(out, { inBlockComment: inBlock, quote: 'none' });
}
