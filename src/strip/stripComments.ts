import { grammarForExtension, type Grammar } from './grammar';
import { createLexerState, type LineLexer } from './lexerState';
import { stripCStyleLine } from './lexers/cStyleLexer';
import { stripHtmlLine } from './lexers/htmlLexer';
import { stripPowerShellLine } from './lexers/powershellLexer';
import { stripPythonLine } from './lexers/pythonLexer';
import { stripSqlLine } from './lexers/sqlLexer';

export type StripResult = {
  content: string;
  grammar: Grammar;
  /** Set when the lexer failed and `content` is the untouched input. */
  warning?: string;
};

const LEXERS: Record<Exclude<Grammar, 'None'>, LineLexer> = {
  PowerShellStyle: stripPowerShellLine,
  CStyle: stripCStyleLine,
  HtmlStyle: stripHtmlLine,
  SqlStyle: stripSqlLine,
  PythonStyle: stripPythonLine,
};

const LINE_BREAK_RE = /\r\n|\r|\n/;

/**
 * Runs one lexer over every line of a file, threading a state value created for this call only.
 * Output has exactly as many lines as the input. Lines are rejoined with the first terminator
 * found (CRLF, CR or LF).
 */
export function stripWithLexer(content: string, lexer: LineLexer): string {
  const eol = LINE_BREAK_RE.exec(content)?.[0] ?? '\n';
  const lines = content.split(LINE_BREAK_RE);
  let state = createLexerState();
  const out: string[] = [];
  for (const line of lines) {
    const r = lexer(line, state);
    out.push(r.text);
    state = r.state;
  }
  return out.join(eol);
}

/**
 * Strips comments and reports which grammar was used. Never throws: on a lexer failure the
 * original content comes back together with a warning.
 */
export function stripCommentsDetailed(content: string, extension: string): StripResult {
  const grammar = grammarForExtension(extension);
  if (grammar === 'None') return { content, grammar };
  try {
    return { content: stripWithLexer(content, LEXERS[grammar]), grammar };
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { content, grammar, warning: `${grammar} lexer failed: ${msg}` };
  }
}

/**
 * Removes comments from one file's text. `extension` includes the leading dot and is
 * case-insensitive; unknown extensions are treated as C-style.
 */
export function stripComments(content: string, extension: string): string {
  return stripCommentsDetailed(content, extension).content;
}
