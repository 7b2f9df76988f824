/**
 * GitHub-style heading anchor: lower case, punctuation dropped, spaces to dashes.
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, '')
    .replace(/\s/g, '-');
}

/** One link per exported file, in the order given. Colliding anchors get `-1`, `-2`, … */
export function renderTableOfContents(relPaths: readonly string[]): string {
  const used = new Map<string, number>();
  return relPaths
    .map((rel) => {
      const base = slugify(rel);
      const n = used.get(base);
      used.set(base, (n ?? -1) + 1);
      const anchor = n === undefined ? base : `${base}-${n + 1}`;
      return `- [${rel}](#${anchor})`;
    })
    .join('\n');
}
