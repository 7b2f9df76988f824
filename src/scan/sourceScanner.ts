import fg from 'fast-glob';
import path from 'node:path';
import { knownExtensions, normalizeExtension } from '../strip/grammar';

export type SourceScanOptions = {
  sourceRoot: string;
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** When false, common test locations/patterns are excluded. Tests are included by default. */
  includeTests?: boolean;
  /** File extensions to export (case-insensitive, dot optional). Defaults to every known extension. */
  extensions?: string[];
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
  /** Specific files to leave out, such as the export's own output; paths outside the root are ignored. */
  excludeFiles?: string[];
};

const DEFAULT_EXCLUDES = [
  '**/node_modules/**',
  '**/.git/**',
  '**/.hg/**',
  '**/.svn/**',
  '**/dist/**',
  '**/build/**',
  '**/out/**',
  '**/bin/**',
  '**/obj/**',
  '**/target/**',
  '**/coverage/**',
  '**/.next/**',
  '**/.cache/**',
  '**/.venv/**',
  '**/venv/**',
  '**/__pycache__/**',
  '**/.idea/**',
  '**/.vs/**',
  '**/.vscode/**',
  '**/*.min.js',
  '**/*.min.css',
  '**/package-lock.json',
  '**/yarn.lock',
  '**/pnpm-lock.yaml',
];

const DEFAULT_TEST_EXCLUDES = [
  '**/__tests__/**',
  '**/*.test.*',
  '**/*.spec.*',
  '**/test/**',
  '**/tests/**',
  '**/test_*.py',
  '**/*_test.go',
  '**/*.Tests.ps1',
];

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/** `**\/*.{ts,py}` style include pattern for a list of extensions. */
export function includePatternFor(extensions: readonly string[]): string {
  const given = extensions.map(normalizeExtension).filter((e) => e.length > 1);
  const bare = [...new Set(given.length > 0 ? given : knownExtensions())].map((e) => e.slice(1));
  if (bare.length === 1) return `**/*.${bare[0]}`;
  return `**/*.{${bare.join(',')}}`;
}

/**
 * Deterministically discovers exportable files under one root.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanSourceFiles(opts: SourceScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const exclude = [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])];
  if (opts.includeTests === false) exclude.push(...DEFAULT_TEST_EXCLUDES);

  const extensions = opts.extensions && opts.extensions.length > 0 ? opts.extensions : knownExtensions();
  const matches = await fg(includePatternFor(extensions), {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
    ignore: exclude,
  });

  const skipped = new Set(
    (opts.excludeFiles ?? [])
      .map((f) => path.relative(sourceRoot, path.resolve(f)))
      .filter((r) => r !== '' && r !== '..' && !r.startsWith(`..${path.sep}`) && !path.isAbsolute(r))
      .map(toPosix),
  );

  // fast-glob usually returns posix paths even on Windows, but normalize anyway
  const rel = matches.map((p) => toPosix(p)).filter((p) => !skipped.has(p));

  rel.sort((a, b) => a.localeCompare(b));
  if (opts.maxFiles && opts.maxFiles > 0 && rel.length > opts.maxFiles) {
    return rel.slice(0, opts.maxFiles);
  }
  return rel;
}
