import { runPasses, type TransformResult } from './failOpen';
import { findHeadings } from './headings';

function appendOccurrenceSuffixes(content: string): string {
  const lines = content.split('\n');
  const seen = new Map<string, number>();
  for (const h of findHeadings(lines)) {
    const count = seen.get(h.text);
    if (count === undefined) {
      seen.set(h.text, 0);
      continue;
    }
    const n = count + 1;
    seen.set(h.text, n);
    lines[h.line] = `${'#'.repeat(h.level)} ${h.text} (${n})`;
  }
  return lines.join('\n');
}

export function disambiguateHeadingsDetailed(content: string): TransformResult {
  return runPasses([{ name: 'heading disambiguation', apply: appendOccurrenceSuffixes }], content);
}

/**
 * Suffixes repeated heading texts with ` (1)`, ` (2)`, … in document order. Headings are
 * compared by text only, so `# Overview` and `## Overview` collide.
 */
export function disambiguateHeadings(content: string): string {
  return disambiguateHeadingsDetailed(content).content;
}
