export { reconcile, unionColumns } from './reconcile.js';
export type { ReconciledRow, ReconciledSource, ReconciledTable } from './reconcile.js';
export { writeRun, writeTable, formatNumber, escapeField, DEFAULT_WRITER_OPTIONS } from './writer.js';
export type { WriterOptions } from './writer.js';
