export type DirectoryNode = {
  name: string;
  dirs: Map<string, DirectoryNode>;
  files: string[];
};

function emptyNode(name: string): DirectoryNode {
  return { name, dirs: new Map(), files: [] };
}

/** Builds a nested tree from posix relative file paths. */
export function buildDirectoryTree(relPaths: readonly string[], rootName = '.'): DirectoryNode {
  const root = emptyNode(rootName);
  for (const rel of relPaths) {
    const parts = rel.split('/').filter((p) => p !== '');
    const file = parts.pop();
    if (file === undefined) continue;
    let node = root;
    for (const part of parts) {
      let child = node.dirs.get(part);
      if (!child) {
        child = emptyNode(part);
        node.dirs.set(part, child);
      }
      node = child;
    }
    node.files.push(file);
  }
  return root;
}

const byName = (a: string, b: string): number => a.localeCompare(b);

function renderChildren(node: DirectoryNode, prefix: string, out: string[]): void {
  const dirs = [...node.dirs.keys()].sort(byName);
  const files = [...node.files].sort(byName);
  const entries: Array<{ label: string; dir?: DirectoryNode }> = [
    ...dirs.map((d) => {
      const dir = node.dirs.get(d);
      return { label: `${d}/`, dir };
    }),
    ...files.map((f) => ({ label: f })),
  ];
  entries.forEach((entry, i) => {
    const last = i === entries.length - 1;
    out.push(`${prefix}${last ? '└── ' : '├── '}${entry.label}`);
    if (entry.dir) renderChildren(entry.dir, `${prefix}${last ? '    ' : '│   '}`, out);
  });
}

/**
 * Renders the tree with box-drawing connectors, directories first, each group sorted by name.
 */
export function renderDirectoryTree(tree: DirectoryNode): string {
  const out: string[] = [`${tree.name}/`];
  renderChildren(tree, '', out);
  return out.join('\n');
}
