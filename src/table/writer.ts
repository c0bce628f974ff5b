import { hasFaraday, type Run } from '../dat/index.js';
import type { ReconciledTable } from './reconcile.js';

export interface WriterOptions {
  delimiter: string;
  /** Text written where a run never measured a column. */
  missing: string;
  /** Adds Scan, Time and ACF columns, plus FCF when there are Faraday readings. */
  scanColumns: boolean;
  /** Adds a `#` provenance line per run. */
  comments: boolean;
}

export const DEFAULT_WRITER_OPTIONS: WriterOptions = {
  delimiter: ',',
  missing: '',
  scanColumns: false,
  comments: false,
};

const TABLE_PROVENANCE_HEADERS = ['Source', 'Scan', 'Time'];

/** Shortest text that parses back to the same double. */
export function formatNumber(value: number): string {
  return String(value);
}

/** A flagged reading keeps its value and gains a trailing `*`. */
export function formatReading(value: number, flagged: boolean): string {
  return flagged ? `${formatNumber(value)}*` : formatNumber(value);
}

function factorHeaders(faraday: boolean): string[] {
  return faraday ? ['ACF', 'FCF'] : ['ACF'];
}

function factorFields(acf: number, fcf: number, faraday: boolean): string[] {
  return faraday ? [formatNumber(acf), formatNumber(fcf)] : [formatNumber(acf)];
}

export function escapeField(field: string, delimiter: string): string {
  if (field.includes(delimiter) || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replaceAll('"', '""')}"`;
  }
  return field;
}

function joinLine(fields: readonly string[], delimiter: string): string {
  return fields.map(field => escapeField(field, delimiter)).join(delimiter);
}

function commentLine(source: string, acquiredAt: number): string {
  return `# ${source} ${acquiredAt} ${new Date(acquiredAt * 1000).toISOString()}`;
}

function resolve(options: Partial<WriterOptions>): WriterOptions {
  return { ...DEFAULT_WRITER_OPTIONS, ...options };
}

export function writeRun(run: Run, options: Partial<WriterOptions> = {}): string {
  const opts = resolve(options);
  const lines: string[] = [];
  const faraday = hasFaraday(run);

  if (opts.comments) lines.push(commentLine(run.sourceIdentity, run.header.acquiredAt));
  const lead = opts.scanColumns ? ['Scan', 'Time', ...factorHeaders(faraday)] : [];
  lines.push(joinLine([...lead, ...run.channels], opts.delimiter));

  for (const scan of run.scans) {
    const fields: string[] = opts.scanColumns
      ? [String(scan.number), formatNumber(scan.timestamp), ...factorFields(scan.acf, scan.fcf, faraday)]
      : [];
    scan.values.forEach((value, i) => fields.push(formatReading(value, scan.flagged[i] ?? false)));
    lines.push(joinLine(fields, opts.delimiter));
  }

  return lines.map(line => `${line}\n`).join('');
}

export function writeTable(table: ReconciledTable, options: Partial<WriterOptions> = {}): string {
  const opts = resolve(options);
  const lines: string[] = [];
  const headers = [
    ...TABLE_PROVENANCE_HEADERS,
    ...(opts.scanColumns ? factorHeaders(table.faraday) : []),
    ...table.columns,
  ];
  lines.push(joinLine(headers, opts.delimiter));

  let rowIndex = 0;
  for (const source of table.sources) {
    if (opts.comments) lines.push(commentLine(source.sourceIdentity, source.acquiredAt));
    const end = rowIndex + source.scanCount;
    for (; rowIndex < end && rowIndex < table.rows.length; rowIndex += 1) {
      const row = table.rows[rowIndex]!;
      const fields = [
        row.source,
        String(row.scanNumber),
        formatNumber(row.timestamp),
        ...(opts.scanColumns ? factorFields(row.acf, row.fcf, table.faraday) : []),
        ...row.values.map((value, i) => (value === null ? opts.missing : formatReading(value, row.flagged[i] ?? false))),
      ];
      lines.push(joinLine(fields, opts.delimiter));
    }
  }

  return lines.map(line => `${line}\n`).join('');
}
