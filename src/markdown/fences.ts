/** `text` is ordinary Markdown, `fence` an opening or closing marker, `code` a line inside a fence. */
export type LineKind = 'text' | 'fence' | 'code';

const FENCE_RE = /^(`{3,})(.*)$/;

/**
 * Classifies each line by fence state. A fence closes only on a bare backtick run at least as
 * long as the one that opened it, so a longer outer fence can carry ``` lines as content.
 * An unclosed fence runs to the end of the document.
 */
export function classifyLines(lines: readonly string[]): LineKind[] {
  const kinds: LineKind[] = [];
  let openLength: number | undefined;
  for (const line of lines) {
    const m = FENCE_RE.exec(line);
    if (openLength === undefined) {
      if (m && !m[2].includes('`')) {
        openLength = m[1].length;
        kinds.push('fence');
      } else {
        kinds.push('text');
      }
    } else if (m && m[1].length >= openLength && m[2].trim() === '') {
      openLength = undefined;
      kinds.push('fence');
    } else {
      kinds.push('code');
    }
  }
  return kinds;
}
