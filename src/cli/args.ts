import path from 'node:path';

/** Lenient boolean coercion for `--flag [bool]` options. */
export function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

export function parseIntish(v: unknown): number | undefined {
  if (v === undefined || v === null || v === '') return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) return undefined;
  return Math.trunc(n);
}

/** Kilobyte option to bytes; zero or negative means "no limit". */
export function kbToBytes(v: unknown): number | undefined {
  const n = parseIntish(v);
  if (n === undefined || n <= 0) return undefined;
  return n * 1024;
}

export type OutputPlan = {
  source: string;
  out: string;
  report?: string;
};

function rootStem(source: string): string {
  const resolved = path.resolve(source);
  return path.basename(resolved) || 'root';
}

/**
 * One root writes straight to `out`. Several roots treat `out` as a folder and write
 * `<root-name>.md` into it; repeated names get `-2`, `-3`, … The report path gets the same
 * name inserted before its extension.
 */
export function planOutputs(sources: readonly string[], out: string, report?: string): OutputPlan[] {
  if (sources.length === 1) return [{ source: sources[0], out, report }];

  const used = new Map<string, number>();
  return sources.map((source) => {
    const base = rootStem(source);
    const seen = (used.get(base) ?? 0) + 1;
    used.set(base, seen);
    const stem = seen === 1 ? base : `${base}-${seen}`;
    const plan: OutputPlan = { source, out: path.join(out, `${stem}.md`) };
    if (report) {
      const ext = path.extname(report);
      plan.report = `${report.slice(0, report.length - ext.length)}.${stem}${ext}`;
    }
    return plan;
  });
}
