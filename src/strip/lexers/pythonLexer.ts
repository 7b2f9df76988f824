import { finishLine, type LexedLine, type LexerState, type QuoteState } from '../lexerState';

function delimiterOf(quote: QuoteState): string {
  switch (quote) {
    case 'single':
      return "'";
    case 'double':
      return '"';
    case 'tripleSingle':
      return "'''";
    case 'tripleDouble':
      return '"""';
    case 'none':
      return '';
  }
}

function quoteAt(line: string, i: number): QuoteState {
  if (line.startsWith('"""', i)) return 'tripleDouble';
  if (line.startsWith("'''", i)) return 'tripleSingle';
  if (line[i] === '"') return 'double';
  if (line[i] === "'") return 'single';
  return 'none';
}

/**
 * `#` comments outside string literals. Triple-quoted literals may span lines and suspend
 * comment detection until their closing delimiter; single-line literals end with the line.
 */
export function stripPythonLine(line: string, state: LexerState): LexedLine {
  let out = '';
  let quote: QuoteState = state.quote === 'tripleSingle' || state.quote === 'tripleDouble' ? state.quote : 'none';
  let i = 0;

  while (i < line.length) {
    const ch = line[i];

    if (quote !== 'none') {
      const delimiter = delimiterOf(quote);
      if (ch === '\\' && i + 1 < line.length) {
        out += line.slice(i, i + 2);
        i += 2;
        continue;
      }
      if (line.startsWith(delimiter, i)) {
        out += delimiter;
        i += delimiter.length;
        quote = 'none';
        continue;
      }
      out += ch;
      i++;
      continue;
    }

    const opening = quoteAt(line, i);
    if (opening !== 'none') {
      const delimiter = delimiterOf(opening);
      out += delimiter;
      i += delimiter.length;
      quote = opening;
      continue;
    }
    if (ch === '#') break;

    out += ch;
    i++;
  }

  const carried: QuoteState = quote === 'tripleSingle' || quote === 'tripleDouble' ? quote : 'none';
  return finishLine(out, { inBlockComment: false, quote: carried });
}
