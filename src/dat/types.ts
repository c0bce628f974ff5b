/** 0 = native layout, 1 = indexed container, 2 = streamed container. */
export type DatRevision = 0 | 1 | 2;
export type ContainerRevision = 1 | 2;
export type AcquisitionMode = 'escan' | 'bscan' | 'mixed';

export interface RunHeader {
  revision: DatRevision;
  /** Null for native files, which do not record it where it is known. */
  acquisitionMode: AcquisitionMode | null;
  /** Acquisition start, Unix seconds. */
  acquiredAt: number;
  /** Scan count from the header or index; null when the file is read to its end. */
  declaredScanCount: number | null;
  massCount: number;
}

/** Readings per detector for one mass, in the order of every scan of the run. */
export interface MassLayout {
  readonly label: string;
  readonly pulse: number;
  readonly analog: number;
  readonly faraday: number;
}

export interface ScanRecord {
  readonly index: number;
  /** 1-based scan number as stored by the instrument. */
  readonly number: number;
  readonly elapsedMs: number;
  /** acquiredAt + elapsedMs / 1000, in seconds. */
  readonly timestamp: number;
  /** Analog conversion factor. */
  readonly acf: number;
  /** Faraday conversion factor. */
  readonly fcf: number;
  readonly values: readonly number[];
  /** Aligned with values; true where the instrument flagged the reading. */
  readonly flagged: readonly boolean[];
}

export type DataQualityWarning =
  | { kind: 'timestamp_decrease'; scanIndex: number; previous: number; current: number }
  | { kind: 'resync'; offset: number; skippedBytes: number }
  | { kind: 'trailing_bytes'; offset: number; bytes: number }
  | { kind: 'skipped_scan'; scanNumber: number; offset: number; reason: string };

export interface Run {
  readonly sourceIdentity: string;
  readonly header: Readonly<RunHeader>;
  readonly masses: readonly MassLayout[];
  /** One identifier per reading column, derived from masses. */
  readonly channels: readonly string[];
  readonly scans: readonly ScanRecord[];
  readonly warnings: readonly DataQualityWarning[];
}

export interface DecodeOptions {
  /** Streamed and native files: skip damaged records instead of failing. */
  recover?: boolean;
}

export function hasFaraday(run: Run): boolean {
  return run.masses.some(mass => mass.faraday > 0);
}

export function describeWarning(warning: DataQualityWarning): string {
  switch (warning.kind) {
    case 'timestamp_decrease':
      return `scan ${warning.scanIndex + 1} timestamp ${warning.current} is earlier than ${warning.previous}`;
    case 'resync':
      return `skipped ${warning.skippedBytes} bytes at offset ${warning.offset} to find the next scan`;
    case 'trailing_bytes':
      return `${warning.bytes} undecodable bytes at offset ${warning.offset}`;
    case 'skipped_scan':
      return `skipped scan ${warning.scanNumber} at offset ${warning.offset}: ${warning.reason}`;
  }
}
