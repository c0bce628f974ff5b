import { hasFaraday, type Run } from '../dat/index.js';

export interface ReconciledSource {
  sourceIdentity: string;
  acquiredAt: number;
  scanCount: number;
}

export interface ReconciledRow {
  source: string;
  scanIndex: number;
  scanNumber: number;
  timestamp: number;
  acf: number;
  fcf: number;
  /** Aligned to `columns`; null where the source run has no such channel. */
  values: ReadonlyArray<number | null>;
  /** Aligned to `columns`. */
  flagged: readonly boolean[];
}

export interface ReconciledTable {
  columns: readonly string[];
  sources: readonly ReconciledSource[];
  rows: readonly ReconciledRow[];
  /** True when any source run has Faraday readings. */
  faraday: boolean;
}

/**
 * Union of channel labels in first-appearance order. Labels match by exact
 * string equality only.
 */
export function unionColumns(runs: readonly Run[]): string[] {
  const seen = new Set<string>();
  const columns: string[] = [];
  for (const run of runs) {
    for (const channel of run.channels) {
      if (seen.has(channel)) continue;
      seen.add(channel);
      columns.push(channel);
    }
  }
  return columns;
}

/**
 * Aligns every scan of every run onto one column list. Rows keep run order,
 * then scan order; the input runs are not modified.
 */
export function reconcile(runs: readonly Run[]): ReconciledTable {
  const columns = unionColumns(runs);
  const position = new Map(columns.map((column, i) => [column, i] as const));
  const rows: ReconciledRow[] = [];

  for (const run of runs) {
    const targets = run.channels.map(channel => position.get(channel) ?? -1);
    for (const scan of run.scans) {
      const values: Array<number | null> = new Array<number | null>(columns.length).fill(null);
      const flagged: boolean[] = new Array<boolean>(columns.length).fill(false);
      scan.values.forEach((value, i) => {
        const target = targets[i];
        if (target === undefined || target < 0) return;
        values[target] = value;
        flagged[target] = scan.flagged[i] ?? false;
      });
      rows.push({
        source: run.sourceIdentity,
        scanIndex: scan.index,
        scanNumber: scan.number,
        timestamp: scan.timestamp,
        acf: scan.acf,
        fcf: scan.fcf,
        values,
        flagged,
      });
    }
  }

  return {
    columns,
    sources: runs.map(run => ({
      sourceIdentity: run.sourceIdentity,
      acquiredAt: run.header.acquiredAt,
      scanCount: run.scans.length,
    })),
    rows,
    faraday: runs.some(hasFaraday),
  };
}
