/** A single rewrite step over a whole Markdown buffer. */
export type MarkdownPass = {
  name: string;
  apply: (content: string) => string;
};

export type TransformResult = {
  content: string;
  /** One entry per pass that failed and was skipped. */
  warnings: string[];
};

/**
 * Applies one pass; if it throws, the input comes back unchanged and a warning is recorded.
 * Each pass is guarded on its own so earlier passes keep their effect.
 */
export function runPass(pass: MarkdownPass, content: string, warnings: string[]): string {
  try {
    return pass.apply(content);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    warnings.push(`${pass.name} failed: ${msg}`);
    return content;
  }
}

export function runPasses(passes: readonly MarkdownPass[], content: string): TransformResult {
  const warnings: string[] = [];
  let current = content;
  for (const pass of passes) current = runPass(pass, current, warnings);
  return { content: current, warnings };
}
