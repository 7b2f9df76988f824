import { finishLine, type LexedLine, type LexerState } from '../lexerState';

const OPEN = '<!--';
const CLOSE = '-->';

/**
 * Removes `<!-- -->` spans. A comment spanning several lines leaves one blank line per
 * consumed line, so line numbers stay aligned with the source. Quotes are not tracked:
 * markup text is full of apostrophes.
 */
export function stripHtmlLine(line: string, state: LexerState): LexedLine {
  let out = '';
  let inBlock = state.inBlockComment;
  let i = 0;

  while (i < line.length) {
    if (inBlock) {
      const close = line.indexOf(CLOSE, i);
      if (close < 0) break;
      inBlock = false;
      i = close + CLOSE.length;
      continue;
    }
    const open = line.indexOf(OPEN, i);
    if (open < 0) {
      out += line.slice(i);
      break;
    }
    out += line.slice(i, open);
    inBlock = true;
    i = open + OPEN.length;
  }

  return finishLine(out, { inBlockComment: inBlock, quote: 'none' });
}
