import { normalizeExtension } from '../strip/grammar';
import { DEFAULT_TITLE } from '../markdown/passes';
import { buildDirectoryTree, renderDirectoryTree } from './directoryTree';
import { renderTableOfContents } from './tableOfContents';

export type ExportedFile = {
  /** Posix path relative to the export root. */
  relPath: string;
  extension: string;
  content: string;
};

export type AssembleOptions = {
  rootName: string;
  files: readonly ExportedFile[];
  includeTree?: boolean;
  includeToc?: boolean;
  lineNumbers?: boolean;
};

const FENCE_LANGUAGES: Record<string, string> = {
  '.ps1': 'powershell',
  '.psm1': 'powershell',
  '.psd1': 'powershell',
  '.cs': 'csharp',
  '.java': 'java',
  '.js': 'javascript',
  '.jsx': 'jsx',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'tsx',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.cc': 'cpp',
  '.cxx': 'cpp',
  '.hpp': 'cpp',
  '.hh': 'cpp',
  '.go': 'go',
  '.rs': 'rust',
  '.swift': 'swift',
  '.kt': 'kotlin',
  '.kts': 'kotlin',
  '.dart': 'dart',
  '.php': 'php',
  '.rb': 'ruby',
  '.css': 'css',
  '.scss': 'scss',
  '.less': 'less',
  '.scala': 'scala',
  '.groovy': 'groovy',
  '.html': 'html',
  '.htm': 'html',
  '.xml': 'xml',
  '.xaml': 'xml',
  '.svg': 'xml',
  '.vue': 'vue',
  '.csproj': 'xml',
  '.props': 'xml',
  '.targets': 'xml',
  '.config': 'xml',
  '.sql': 'sql',
  '.py': 'python',
  '.pyw': 'python',
  '.pyi': 'python',
  '.json': 'json',
  '.yml': 'yaml',
  '.yaml': 'yaml',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.toml': 'toml',
  '.ini': 'ini',
  '.cfg': 'ini',
  '.conf': 'ini',
  '.csv': 'csv',
};

/** Fence info string for an extension; `text` when there is no better name. */
export function languageForExtension(extension: string): string {
  return FENCE_LANGUAGES[normalizeExtension(extension)] ?? 'text';
}

/** Right-aligned 1-based line numbers followed by ` | `. */
export function numberLines(content: string): string {
  const lines = content.split('\n');
  const width = String(lines.length).length;
  return lines.map((line, i) => `${String(i + 1).padStart(width)} | ${line}`).join('\n');
}

/** A backtick fence longer than any backtick run that starts a line of `content`, and at least three. */
export function fenceFor(content: string): string {
  let longest = 0;
  for (const m of content.matchAll(/^ {0,3}(`+)/gm)) longest = Math.max(longest, m[1].length);
  return '`'.repeat(Math.max(3, longest + 1));
}

function withoutTrailingNewlines(content: string): string {
  return content.replace(/(?:\r?\n)+$/, '');
}

/**
 * Lays out one root's files as a single Markdown document. The result is raw: the normalizer
 * is expected to run over it afterwards.
 */
export function assembleDocument(opts: AssembleOptions): string {
  const relPaths = opts.files.map((f) => f.relPath);
  const parts: string[] = [`# ${DEFAULT_TITLE}: ${opts.rootName}`, ''];

  if (opts.includeTree ?? true) {
    const tree = renderDirectoryTree(buildDirectoryTree(relPaths, opts.rootName));
    parts.push('## Directory Structure', '', '```text', tree, '```', '');
  }

  if ((opts.includeToc ?? true) && relPaths.length > 0) {
    parts.push('## Table of Contents', '', renderTableOfContents(relPaths), '');
  }

  parts.push('## Files', '');
  if (opts.files.length === 0) parts.push('_No files exported._', '');
  for (const f of opts.files) {
    const body = withoutTrailingNewlines(f.content);
    const code = opts.lineNumbers ? numberLines(body) : body;
    const fence = fenceFor(code);
    parts.push(`### ${f.relPath}`, '', `${fence}${languageForExtension(f.extension)}`, code, fence, '');
  }

  return parts.join('\n');
}
