import { classifyLines } from './fences';

export type Heading = {
  level: number;
  text: string;
  /** 0-based line index within the scanned document. */
  line: number;
};

export const HEADING_RE = /^#+\s/;
export const TOP_LEVEL_HEADING_RE = /^#\s/;
const HEADING_PARTS_RE = /^(#+)\s+(.*)$/;

export function parseHeading(line: string, index = 0): Heading | undefined {
  const m = HEADING_PARTS_RE.exec(line);
  if (!m) return undefined;
  return { level: m[1].length, text: m[2].trim(), line: index };
}

/** ATX headings outside code fences, top to bottom. */
export function findHeadings(lines: readonly string[]): Heading[] {
  const kinds = classifyLines(lines);
  const out: Heading[] = [];
  lines.forEach((line, i) => {
    if (kinds[i] !== 'text') return;
    const h = parseHeading(line, i);
    if (h) out.push(h);
  });
  return out;
}
