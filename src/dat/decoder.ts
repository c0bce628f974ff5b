/**
 * DAT decoder: bytes → Run.
 *
 * Every revision shares the scan record (see layout.ts). They differ in the
 * header and in how scans are located:
 *   - native (0): the instrument's own header; scans are found through its
 *     index, or read back to back from the end of the header when the index
 *     is empty or the caller asks for recovery;
 *   - indexed (1): a container header declaring the scan count and pointing
 *     at an index of absolute scan offsets;
 *   - streamed (2): scans follow the mass table back to back and the file
 *     ends exactly at a record boundary.
 *
 * A scan holding an unknown tag or detector is skipped up to its end-of-scan
 * word and reported as a `skipped_scan` warning; decoding goes on.
 */

import { BinaryReader } from './binaryReader.js';
import {
  ACQUISITION_MODES,
  CONTAINER_REVISIONS,
  DETECTORS,
  DETECTOR_ORDER,
  DETECTOR_SUFFIX,
  FILE_SIGNATURE,
  HEADER_SIZE,
  NATIVE_HEADER_END,
  NATIVE_HEADER_OFFSET,
  NATIVE_HEADER_WORDS,
  NATIVE_INDEX_LENGTH_WORD,
  NATIVE_INDEX_OFFSET_WORD,
  NATIVE_INDEX_SKIP,
  NATIVE_TIMESTAMP_WORD,
  REVISION_INDEXED,
  REVISION_NATIVE,
  REVISION_STREAMED,
  SCAN_ACF_WORD,
  SCAN_FCF_WORD,
  SCAN_HEADER_SIZE,
  SCAN_NUMBER_WORD,
  SCAN_SYNC,
  SCAN_SYNC_WORD,
  SCAN_TIME_WORD,
  SKIPPED_TAGS,
  TAG_DATA,
  TAG_END_OF_MASS,
  TAG_END_OF_SCAN,
  defaultChannelLabel,
  payloadOf,
  tagOf,
  unpackDataWord,
  type Detector,
} from './layout.js';
import type {
  ContainerRevision,
  DataQualityWarning,
  DatRevision,
  DecodeOptions,
  MassLayout,
  Run,
  RunHeader,
  ScanRecord,
} from './types.js';
import { DatError, malformedHeader, malformedRecord, truncated, unsupportedVersion } from '../shared/index.js';

interface ParsedHeader {
  revision: DatRevision;
  acquisitionMode: RunHeader['acquisitionMode'];
  acquiredAt: number;
  declaredScanCount: number | null;
  /** Mass labels from a container's mass table; null for native files. */
  labels: string[] | null;
  /** Position of the scan index (container: its entry count; native: its first entry). */
  indexOffset: number;
  /** Where back-to-back scan records start. */
  scansStart: number;
}

interface Reading {
  value: number;
  flagged: boolean;
}

type MassReadings = Record<Detector, Reading[]>;

interface RawScan {
  offset: number;
  number: number;
  elapsedMs: number;
  acf: number;
  fcf: number;
  masses: MassReadings[];
}

type SkippedScan = Extract<DataQualityWarning, { kind: 'skipped_scan' }>;

type ScanOutcome = { kind: 'scan'; scan: RawScan } | { kind: 'skipped'; warning: SkippedScan };

type MassOutcome =
  | { kind: 'mass'; readings: MassReadings }
  | { kind: 'end' }
  | { kind: 'unreadable'; reason: string; endConsumed: boolean };

interface ScanResult {
  scans: RawScan[];
  warnings: DataQualityWarning[];
}

type ScanStrategy = (reader: BinaryReader, header: ParsedHeader, options: DecodeOptions) => ScanResult;

function isContainerRevision(value: number): value is ContainerRevision {
  return CONTAINER_REVISIONS.some(revision => revision === value);
}

function hex(value: number): string {
  return `0x${value.toString(16)}`;
}

/** u32 word `index` of a block read into its own reader. */
function wordAt(block: BinaryReader, index: number): number {
  block.seek(index * 4);
  return block.readU32();
}

/** Seeks to an offset stored in the file; one past the end means the file was cut short. */
function seekStored(reader: BinaryReader, offset: number, what: string): void {
  if (offset > reader.length) {
    throw truncated(`${what} at offset ${offset} lies past the end of the file (${reader.length} bytes)`, {
      offset,
      length: reader.length,
    });
  }
  reader.seek(offset);
}

// ── Header ──────────────────────────────────────────────────────────────────

function hasContainerSignature(reader: BinaryReader): boolean {
  if (reader.length < FILE_SIGNATURE.length) return false;
  reader.seek(0);
  const signature = reader.readFixedString(FILE_SIGNATURE.length);
  reader.seek(0);
  return signature === FILE_SIGNATURE;
}

function readContainerHeader(reader: BinaryReader): ParsedHeader {
  reader.seek(FILE_SIGNATURE.length);
  const revision = reader.readU16();
  if (!isContainerRevision(revision)) {
    throw unsupportedVersion(`Unsupported DAT revision ${revision}`, {
      revision,
      supported: [REVISION_NATIVE, ...CONTAINER_REVISIONS],
    });
  }

  const modeCode = reader.readU16();
  const acquisitionMode = ACQUISITION_MODES.get(modeCode);
  if (acquisitionMode === undefined) {
    throw malformedHeader(`Unknown acquisition mode ${modeCode}`, { mode: modeCode });
  }

  const acquiredAt = reader.readU32();
  const scanCount = reader.readU32();
  const indexOffset = reader.readU32();
  const massCount = reader.readU16();
  reader.skip(HEADER_SIZE - reader.position);

  if (massCount === 0) {
    throw malformedHeader('Header declares no masses', { massCount });
  }
  if (revision === REVISION_STREAMED && (scanCount !== 0 || indexOffset !== 0)) {
    throw malformedHeader('Streamed file carries scan index fields', { scanCount, indexOffset });
  }

  const labels = readMassTable(reader, massCount);
  return {
    revision,
    acquisitionMode,
    acquiredAt,
    declaredScanCount: revision === REVISION_INDEXED ? scanCount : null,
    labels,
    indexOffset,
    scansStart: reader.position,
  };
}

function readNativeHeader(reader: BinaryReader): ParsedHeader {
  reader.seek(0);
  reader.skip(NATIVE_HEADER_OFFSET);
  const block = new BinaryReader(reader.readBytes(NATIVE_HEADER_WORDS * 4));
  const indexOffset = wordAt(block, NATIVE_INDEX_OFFSET_WORD);
  const indexLength = wordAt(block, NATIVE_INDEX_LENGTH_WORD);
  const acquiredAt = wordAt(block, NATIVE_TIMESTAMP_WORD);

  if (indexLength > 0 && indexOffset + NATIVE_INDEX_SKIP < NATIVE_HEADER_END) {
    throw malformedHeader(`Scan index offset ${indexOffset} points into the file header`, {
      indexOffset,
      indexLength,
    });
  }

  return {
    revision: REVISION_NATIVE,
    acquisitionMode: null,
    acquiredAt,
    declaredScanCount: indexLength > 0 ? indexLength : null,
    labels: null,
    indexOffset: indexOffset + NATIVE_INDEX_SKIP,
    scansStart: NATIVE_HEADER_END,
  };
}

function assertUnique(labels: readonly string[], noun: string): void {
  const firstSeen = new Map<string, number>();
  labels.forEach((label, i) => {
    const previous = firstSeen.get(label);
    if (previous !== undefined) {
      throw malformedHeader(`Duplicate ${noun} "${label}" at positions ${previous + 1} and ${i + 1}`, {
        label,
        positions: [previous, i],
      });
    }
    firstSeen.set(label, i);
  });
}

function resolveLabels(labels: readonly string[]): string[] {
  const resolved = labels.map((label, i) => (label.length === 0 ? defaultChannelLabel(i) : label));
  assertUnique(resolved, 'mass');
  return resolved;
}

function readMassTable(reader: BinaryReader, count: number): string[] {
  const stored: string[] = [];
  for (let i = 0; i < count; i += 1) {
    stored.push(reader.readPrefixedString(1));
  }
  return resolveLabels(stored);
}

/**
 * Reading columns for a run. A mass with a single reading keeps its bare
 * label; otherwise each reading becomes label + p/a/f, with `#n` from the
 * second reading of a detector on.
 */
export function channelIds(masses: readonly MassLayout[]): string[] {
  const ids: string[] = [];
  for (const mass of masses) {
    if (mass.pulse + mass.analog + mass.faraday === 1) {
      ids.push(mass.label);
      continue;
    }
    for (const detector of DETECTOR_ORDER) {
      for (let k = 0; k < mass[detector]; k += 1) {
        ids.push(`${mass.label}${DETECTOR_SUFFIX[detector]}${k === 0 ? '' : `#${k + 1}`}`);
      }
    }
  }
  assertUnique(ids, 'channel');
  return ids;
}

// ── Scan records ────────────────────────────────────────────────────────────

function emptyReadings(): MassReadings {
  return { pulse: [], analog: [], faraday: [] };
}

function readMassBlock(reader: BinaryReader): MassOutcome {
  const readings = emptyReadings();
  let started = false;
  for (;;) {
    const offset = reader.position;
    const word = reader.readU32();
    const tag = tagOf(word);

    if (tag === TAG_END_OF_SCAN) {
      return started
        ? { kind: 'unreadable', reason: `scan ended inside a mass block at offset ${offset}`, endConsumed: true }
        : { kind: 'end' };
    }
    started = true;

    if (tag === TAG_END_OF_MASS) return { kind: 'mass', readings };

    if (tag === TAG_DATA) {
      const data = unpackDataWord(payloadOf(word));
      const detector = DETECTORS.get(data.detector);
      if (detector === undefined) {
        return {
          kind: 'unreadable',
          reason: `unknown detector type ${hex(data.detector)} at offset ${offset}`,
          endConsumed: false,
        };
      }
      readings[detector].push({ value: data.value, flagged: data.flagged });
      continue;
    }

    if (!SKIPPED_TAGS.has(tag)) {
      return { kind: 'unreadable', reason: `unknown tag ${hex(tag)} at offset ${offset}`, endConsumed: false };
    }
  }
}

function skipToEndOfScan(reader: BinaryReader): void {
  let word = reader.readU32();
  while (tagOf(word) !== TAG_END_OF_SCAN) word = reader.readU32();
}

function readScan(reader: BinaryReader, expectedNumber: number): ScanOutcome {
  const offset = reader.position;
  const block = new BinaryReader(reader.readBytes(SCAN_HEADER_SIZE));

  const sync = SCAN_SYNC.map((_, i) => wordAt(block, SCAN_SYNC_WORD + i));
  if (sync.some((word, i) => word !== SCAN_SYNC[i])) {
    throw malformedRecord(`No scan header at offset ${offset}`, { offset, expectedNumber });
  }
  const number = wordAt(block, SCAN_NUMBER_WORD);
  if (number !== expectedNumber) {
    throw malformedRecord(`Expected scan ${expectedNumber} at offset ${offset}, found ${number}`, { offset, number });
  }

  const masses: MassReadings[] = [];
  for (;;) {
    const mass = readMassBlock(reader);
    if (mass.kind === 'end') break;
    if (mass.kind === 'mass') {
      masses.push(mass.readings);
      continue;
    }
    if (!mass.endConsumed) skipToEndOfScan(reader);
    return { kind: 'skipped', warning: { kind: 'skipped_scan', scanNumber: number, offset, reason: mass.reason } };
  }

  return {
    kind: 'scan',
    scan: {
      offset,
      number,
      elapsedMs: wordAt(block, SCAN_TIME_WORD),
      acf: wordAt(block, SCAN_ACF_WORD),
      fcf: wordAt(block, SCAN_FCF_WORD),
      masses,
    },
  };
}

/** Offset of the next plausible header for scan `number` at or after `from`, or null. */
function findScanHeader(reader: BinaryReader, from: number, number: number): number | null {
  for (let offset = from; offset + SCAN_HEADER_SIZE <= reader.length; offset += 1) {
    reader.seek(offset + SCAN_SYNC_WORD * 4);
    const synced = SCAN_SYNC.every(expected => reader.readU32() === expected);
    if (synced) {
      reader.seek(offset + SCAN_NUMBER_WORD * 4);
      if (reader.readU32() === number) return offset;
    }
  }
  return null;
}

function readOffsets(reader: BinaryReader, count: number): number[] {
  const offsets: number[] = [];
  for (let i = 0; i < count; i += 1) {
    offsets.push(reader.readU32());
  }
  return offsets;
}

function readScansAt(reader: BinaryReader, offsets: readonly number[]): ScanResult {
  const result: ScanResult = { scans: [], warnings: [] };
  offsets.forEach((offset, position) => {
    seekStored(reader, offset, `Scan ${position + 1}`);
    const outcome = readScan(reader, position + 1);
    if (outcome.kind === 'scan') result.scans.push(outcome.scan);
    else result.warnings.push(outcome.warning);
  });
  return result;
}

function readContainerIndex(reader: BinaryReader, header: ParsedHeader): number[] {
  const declared = header.declaredScanCount ?? 0;
  seekStored(reader, header.indexOffset, 'Scan index');
  const entries = reader.readU32();
  if (entries !== declared) {
    throw malformedHeader(`Scan index lists ${entries} scans, header declares ${declared}`, {
      declared,
      indexed: entries,
    });
  }
  return readOffsets(reader, entries);
}

function readNativeIndex(reader: BinaryReader, header: ParsedHeader): number[] {
  seekStored(reader, header.indexOffset, 'Scan index');
  return readOffsets(reader, header.declaredScanCount ?? 0);
}

const readSequentialScans: ScanStrategy = (reader, header, options) => {
  const result: ScanResult = { scans: [], warnings: [] };
  reader.seek(header.scansStart);
  let expected = 1;

  while (reader.remaining > 0) {
    const start = reader.position;
    try {
      const outcome = readScan(reader, expected);
      if (outcome.kind === 'scan') result.scans.push(outcome.scan);
      else result.warnings.push(outcome.warning);
      expected += 1;
    } catch (err) {
      if (!options.recover || !(err instanceof DatError)) throw err;

      const next = findScanHeader(reader, start + 1, expected);
      if (next === null) {
        result.warnings.push({ kind: 'trailing_bytes', offset: start, bytes: reader.length - start });
        reader.seek(reader.length);
        break;
      }
      result.warnings.push({ kind: 'resync', offset: start, skippedBytes: next - start });
      reader.seek(next);
    }
  }
  return result;
};

const SCAN_STRATEGIES: Record<DatRevision, ScanStrategy> = {
  0: (reader, header, options) =>
    header.declaredScanCount === null || options.recover
      ? readSequentialScans(reader, header, options)
      : readScansAt(reader, readNativeIndex(reader, header)),
  1: (reader, header) => readScansAt(reader, readContainerIndex(reader, header)),
  2: readSequentialScans,
};

// ── Run assembly ────────────────────────────────────────────────────────────

function layoutOf(label: string, readings: MassReadings): MassLayout {
  return {
    label,
    pulse: readings.pulse.length,
    analog: readings.analog.length,
    faraday: readings.faraday.length,
  };
}

/** Mass labels come from the header or MassNN; reading counts from the first scan that fits. */
function buildLayout(header: ParsedHeader, scans: readonly RawScan[]): MassLayout[] {
  const declared = header.labels;
  if (declared === null) {
    const first = scans.find(scan => scan.masses.length > 0);
    if (first === undefined) {
      throw malformedHeader('No scan carries a mass block to take the mass list from', { scans: scans.length });
    }
    return first.masses.map((readings, i) => layoutOf(defaultChannelLabel(i), readings));
  }

  const template = scans.find(scan => scan.masses.length === declared.length);
  if (template === undefined) {
    const carried = scans[0]?.masses.length;
    if (carried !== undefined) {
      throw malformedHeader(`Header declares ${declared.length} masses, scans carry ${carried}`, {
        declared: declared.length,
        carried,
      });
    }
    return declared.map(label => ({ label, pulse: 1, analog: 0, faraday: 0 }));
  }
  return declared.map((label, i) => {
    const readings = template.masses[i];
    return readings === undefined ? { label, pulse: 1, analog: 0, faraday: 0 } : layoutOf(label, readings);
  });
}

/** Why a scan does not fit the run's layout, or null when it does. */
function layoutMismatch(scan: RawScan, masses: readonly MassLayout[]): string | null {
  if (scan.masses.length !== masses.length) {
    return `mass block count ${scan.masses.length} differs from the run's ${masses.length}`;
  }
  for (let i = 0; i < masses.length; i += 1) {
    const expected = masses[i];
    const readings = scan.masses[i];
    if (expected === undefined || readings === undefined) continue;
    const actual = DETECTOR_ORDER.map(detector => readings[detector].length).join('/');
    const wanted = DETECTOR_ORDER.map(detector => expected[detector]).join('/');
    if (actual !== wanted) {
      return `mass ${expected.label} has ${actual} pulse/analog/faraday readings, run has ${wanted}`;
    }
  }
  return null;
}

function toRecord(scan: RawScan, index: number, acquiredAt: number): ScanRecord {
  const values: number[] = [];
  const flagged: boolean[] = [];
  for (const readings of scan.masses) {
    for (const detector of DETECTOR_ORDER) {
      for (const reading of readings[detector]) {
        values.push(reading.value);
        flagged.push(reading.flagged);
      }
    }
  }
  return {
    index,
    number: scan.number,
    elapsedMs: scan.elapsedMs,
    timestamp: acquiredAt + scan.elapsedMs / 1000,
    acf: scan.acf,
    fcf: scan.fcf,
    values,
    flagged,
  };
}

function timestampWarnings(scans: readonly ScanRecord[]): DataQualityWarning[] {
  const warnings: DataQualityWarning[] = [];
  for (let i = 1; i < scans.length; i += 1) {
    const previous = scans[i - 1]!.timestamp;
    const current = scans[i]!.timestamp;
    if (current < previous) {
      warnings.push({ kind: 'timestamp_decrease', scanIndex: i, previous, current });
    }
  }
  return warnings;
}

function warningOffset(warning: DataQualityWarning): number {
  return warning.kind === 'timestamp_decrease' ? 0 : warning.offset;
}

// ── Entry point ─────────────────────────────────────────────────────────────

export function decodeDat(bytes: Uint8Array, sourceIdentity: string, options: DecodeOptions = {}): Run {
  const reader = new BinaryReader(bytes, 'le');
  const parsed = hasContainerSignature(reader) ? readContainerHeader(reader) : readNativeHeader(reader);
  const result = SCAN_STRATEGIES[parsed.revision](reader, parsed, options);

  const masses = buildLayout(parsed, result.scans);
  const channels = channelIds(masses);
  if (channels.length === 0) {
    throw malformedHeader('Scans carry no readings', { masses: masses.length });
  }

  const scans: ScanRecord[] = [];
  const warnings = [...result.warnings];
  for (const scan of result.scans) {
    const mismatch = layoutMismatch(scan, masses);
    if (mismatch !== null) {
      warnings.push({ kind: 'skipped_scan', scanNumber: scan.number, offset: scan.offset, reason: mismatch });
      continue;
    }
    scans.push(toRecord(scan, scans.length, parsed.acquiredAt));
  }
  warnings.sort((a, b) => warningOffset(a) - warningOffset(b));

  return {
    sourceIdentity,
    header: {
      revision: parsed.revision,
      acquisitionMode: parsed.acquisitionMode,
      acquiredAt: parsed.acquiredAt,
      declaredScanCount: parsed.declaredScanCount,
      massCount: masses.length,
    },
    masses,
    channels,
    scans,
    warnings: [...warnings, ...timestampWarnings(scans)],
  };
}

/**
 * Same run under different mass labels, e.g. from an element list. The
 * labels go through the same checks as the ones stored in the file, and the
 * reading columns are derived again.
 */
export function relabelRun(run: Run, labels: readonly string[]): Run {
  if (labels.length !== run.masses.length) {
    throw malformedHeader(`Mass label list has ${labels.length} entries, run has ${run.masses.length}`, {
      expected: run.masses.length,
      actual: labels.length,
    });
  }
  const resolved = resolveLabels(labels);
  const masses = run.masses.map((mass, i) => ({ ...mass, label: resolved[i] ?? mass.label }));
  return { ...run, masses, channels: channelIds(masses) };
}
