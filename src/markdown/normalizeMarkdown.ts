import { runPasses, type MarkdownPass, type TransformResult } from './failOpen';
import {
  cleanupWhitespace,
  collapseBlankLines,
  ensureHeadingSpacing,
  ensureTopLevelHeading,
  ensureTrailingNewline,
  normalizeHeadingMarkers,
  wrapFencedLines,
} from './passes';

/**
 * Rewrite order matters for idempotence: markers are fixed before spacing so that a
 * `##Text` line gets its blank lines in the same run that turns it into a heading.
 */
export const NORMALIZE_PASSES: readonly MarkdownPass[] = [
  { name: 'whitespace cleanup', apply: cleanupWhitespace },
  { name: 'heading markers', apply: normalizeHeadingMarkers },
  { name: 'heading spacing', apply: ensureHeadingSpacing },
  { name: 'blank-line collapse', apply: collapseBlankLines },
  { name: 'top-level heading', apply: (c) => ensureTopLevelHeading(c) },
  { name: 'fenced line wrapping', apply: wrapFencedLines },
  { name: 'trailing newline', apply: ensureTrailingNewline },
];

export function normalizeMarkdownDetailed(content: string): TransformResult {
  return runPasses(NORMALIZE_PASSES, content);
}

/**
 * Rewrites an assembled document into its canonical, lint-clean form.
 * Never throws, and `normalizeMarkdown(normalizeMarkdown(x)) === normalizeMarkdown(x)`.
 */
export function normalizeMarkdown(content: string): string {
  return normalizeMarkdownDetailed(content).content;
}
