/**
 * Comment-syntax families. `None` marks data formats that have no comments to strip.
 */
export type Grammar = 'PowerShellStyle' | 'CStyle' | 'HtmlStyle' | 'SqlStyle' | 'PythonStyle' | 'None';

const GRAMMAR_EXTENSIONS: Record<Grammar, readonly string[]> = {
  PowerShellStyle: ['.ps1', '.psm1', '.psd1'],
  CStyle: [
    '.cs',
    '.java',
    '.js',
    '.jsx',
    '.mjs',
    '.cjs',
    '.ts',
    '.tsx',
    '.mts',
    '.cts',
    '.c',
    '.h',
    '.cpp',
    '.cc',
    '.cxx',
    '.hpp',
    '.hh',
    '.go',
    '.rs',
    '.swift',
    '.kt',
    '.kts',
    '.dart',
    '.php',
    '.rb',
    '.css',
    '.scss',
    '.less',
    '.scala',
    '.groovy',
  ],
  HtmlStyle: ['.html', '.htm', '.xml', '.xaml', '.svg', '.vue', '.csproj', '.props', '.targets', '.config'],
  SqlStyle: ['.sql'],
  PythonStyle: ['.py', '.pyw', '.pyi'],
  None: ['.json', '.yml', '.yaml', '.md', '.markdown', '.toml', '.ini', '.cfg', '.conf', '.txt', '.csv', '.lock'],
};

export const GRAMMARS: readonly Grammar[] = ['PowerShellStyle', 'CStyle', 'HtmlStyle', 'SqlStyle', 'PythonStyle', 'None'];

const EXTENSION_TO_GRAMMAR: ReadonlyMap<string, Grammar> = new Map(
  GRAMMARS.flatMap((g) => GRAMMAR_EXTENSIONS[g].map((ext) => [ext, g] as const)),
);

/** Lower-cases and ensures a leading dot, so `TS`, `.Ts` and `.ts` all look the same. */
export function normalizeExtension(extension: string): string {
  const e = extension.trim().toLowerCase();
  if (e === '') return '';
  return e.startsWith('.') ? e : `.${e}`;
}

/**
 * Grammar for a file extension. Unknown extensions fall back to `CStyle`.
 */
export function grammarForExtension(extension: string): Grammar {
  return EXTENSION_TO_GRAMMAR.get(normalizeExtension(extension)) ?? 'CStyle';
}

export function isKnownExtension(extension: string): boolean {
  return EXTENSION_TO_GRAMMAR.has(normalizeExtension(extension));
}

/** Every extension in the table, sorted. */
export function knownExtensions(): string[] {
  return [...EXTENSION_TO_GRAMMAR.keys()].sort((a, b) => a.localeCompare(b));
}
