export type QuoteState = 'none' | 'single' | 'double' | 'tripleSingle' | 'tripleDouble';

/**
 * Scanner state carried from one line to the next within a single file.
 * A fresh value is created per stripping call; it is never shared between files.
 */
export type LexerState = {
  inBlockComment: boolean;
  quote: QuoteState;
};

export type LexedLine = {
  text: string;
  state: LexerState;
};

/** A line-oriented comment stripper: one input line in, one output line out. */
export type LineLexer = (line: string, state: LexerState) => LexedLine;

export function createLexerState(): LexerState {
  return { inBlockComment: false, quote: 'none' };
}

/** Trailing whitespace is dropped unless the line ends inside a literal that continues on the next line. */
export function finishLine(text: string, state: LexerState): LexedLine {
  const open = state.quote === 'tripleSingle' || state.quote === 'tripleDouble';
  return { text: open ? text : text.trimEnd(), state };
}
