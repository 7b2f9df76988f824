import { classifyLines } from './fences';
import { HEADING_RE, TOP_LEVEL_HEADING_RE } from './headings';

export const DEFAULT_TITLE = 'Source Code Export';
/** Fenced lines longer than this are wrapped. */
export const WRAP_THRESHOLD = 120;
/** Maximum length of a wrapped segment. */
export const WRAP_WIDTH = 118;
const TAB = '    ';

function splitLines(content: string): string[] {
  return content.split('\n');
}

/** CRLF to LF, tabs to four spaces, no trailing spaces. */
export function cleanupWhitespace(content: string): string {
  return splitLines(content.replace(/\r\n?/g, '\n'))
    .map((line) => line.replace(/\t/g, TAB).trimEnd())
    .join('\n');
}

/** `##Text` becomes `## Text`. */
export function normalizeHeadingMarkers(content: string): string {
  const lines = splitLines(content);
  const kinds = classifyLines(lines);
  return lines.map((line, i) => (kinds[i] === 'text' ? line.replace(/^(#+)([^#\s])/, '$1 $2') : line)).join('\n');
}

/** One blank line before and after every heading, except at the document edges and between stacked headings. */
export function ensureHeadingSpacing(content: string): string {
  const lines = splitLines(content);
  const kinds = classifyLines(lines);
  const isHeading = (i: number): boolean => kinds[i] === 'text' && HEADING_RE.test(lines[i]);

  const out: string[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!isHeading(i)) {
      out.push(line);
      continue;
    }
    if (out.length > 0 && out[out.length - 1] !== '') out.push('');
    out.push(line);
    const last = i === lines.length - 1;
    if (!last && lines[i + 1] !== '' && !isHeading(i + 1)) out.push('');
  }
  return out.join('\n');
}

/** At most one blank line between blocks. */
export function collapseBlankLines(content: string): string {
  return content.replace(/\n{3,}/g, '\n\n');
}

/** Drops leading blank lines and prepends an H1 when the document does not open with one. */
export function ensureTopLevelHeading(content: string, title = DEFAULT_TITLE): string {
  const body = content.replace(/^(?:[ \t]*\n)+/, '');
  const lines = splitLines(body);
  if (lines.every((l) => l.trim() === '')) return body;
  const kinds = classifyLines(lines);
  if (kinds[0] === 'text' && TOP_LEVEL_HEADING_RE.test(lines[0])) return body;
  return `# ${title}\n\n${body}`;
}

/** A segment made only of backticks would read as a fence marker. */
const BARE_FENCE_RE = /^`{3,}$/;

/**
 * Greedy word wrap. Leading indentation stays on the first segment; a word longer than the
 * width gets a segment of its own and is never split. A bare backtick run never starts or
 * ends up alone on a segment: it stays on the previous segment, or takes the next word along.
 */
export function wrapLine(line: string, width = WRAP_WIDTH): string[] {
  const indent = /^ */.exec(line)?.[0] ?? '';
  const words = line.slice(indent.length).split(' ').filter((w) => w !== '');
  const segments: string[] = [];
  let current = indent;
  let empty = true;
  for (const word of words) {
    if (empty) {
      current += word;
      empty = false;
    } else if (current.length + 1 + word.length <= width || BARE_FENCE_RE.test(current) || BARE_FENCE_RE.test(word)) {
      current += ` ${word}`;
    } else {
      segments.push(current);
      current = word;
    }
  }
  segments.push(current);
  return segments;
}

/** Wraps over-long lines inside code fences; everything outside fences is left alone. */
export function wrapFencedLines(content: string): string {
  const lines = splitLines(content);
  const kinds = classifyLines(lines);
  const out: string[] = [];
  lines.forEach((line, i) => {
    if (kinds[i] === 'code' && line.length > WRAP_THRESHOLD) out.push(...wrapLine(line));
    else out.push(line);
  });
  return out.join('\n');
}

export function ensureTrailingNewline(content: string): string {
  return `${content.replace(/\s+$/, '')}\n`;
}
