/**
 * DAT file layouts.
 *
 * All integers are little-endian u32 unless noted.
 *
 * Native layout (revision 0), as the acquisition software writes it. There is
 * no signature; anything not starting with "EDAT" is read this way.
 *   0x10     85 header words: word 33 scan index offset, word 39 scan index
 *            length, word 40 acquisition start (Unix seconds)
 *   index    one absolute scan offset per scan, starting 4 bytes past the
 *            stored index offset
 *   0x164    first scan record
 * Masses are counted from the first scan and labelled from a .FIN2 list or
 * as MassNN.
 *
 * Container layout (revisions 1 and 2), header of 32 bytes:
 *   0x00  char[4]  signature "EDAT"
 *   0x04  u16      format revision (1 = indexed, 2 = streamed)
 *   0x06  u16      acquisition mode (0 E-scan, 1 B-scan, 2 mixed)
 *   0x08  u32      acquisition start, Unix seconds
 *   0x0C  u32      declared scan count (indexed only)
 *   0x10  u32      scan index offset (indexed only)
 *   0x14  u16      mass count
 *   0x16  10 bytes reserved
 * Mass table at 0x20: one u8-length-prefixed label per mass.
 * Scan index (indexed only): u32 entry count, then one u32 offset per scan.
 *
 * Scan record (every revision): 47 header words, then mass blocks until an
 * end-of-scan word.
 *   word 3-5   sync 0x0D 0x0E 0x0F
 *   word 9     scan number (1-based)
 *   word 12    analog conversion factor (ACF)
 *   word 19    elapsed ms
 *   word 35    Faraday conversion factor (FCF)
 * Mass block: tagged words up to and including an end-of-mass word. Each
 * data word is one reading; a mass may carry several per detector.
 *
 * Tagged word: tag in bits 28-31, payload in bits 0-27.
 * Data payload: flag 24-27, detector 20-23, exponent 16-19, mantissa 0-15.
 */

import type { AcquisitionMode, ContainerRevision } from './types.js';

export const FILE_SIGNATURE = 'EDAT';
export const HEADER_SIZE = 0x20;

export const HDR_INDEX_OFFSET = 0x10;

export const REVISION_NATIVE = 0;
export const REVISION_INDEXED = 1;
export const REVISION_STREAMED = 2;
export const CONTAINER_REVISIONS: readonly ContainerRevision[] = [REVISION_INDEXED, REVISION_STREAMED];

export const NATIVE_HEADER_OFFSET = 0x10;
export const NATIVE_HEADER_WORDS = 85;
export const NATIVE_HEADER_END = NATIVE_HEADER_OFFSET + NATIVE_HEADER_WORDS * 4;
export const NATIVE_INDEX_OFFSET_WORD = 33;
export const NATIVE_INDEX_LENGTH_WORD = 39;
export const NATIVE_TIMESTAMP_WORD = 40;
/** The stored index offset points 4 bytes before the first entry. */
export const NATIVE_INDEX_SKIP = 4;

export const ACQUISITION_MODES: ReadonlyMap<number, AcquisitionMode> = new Map<number, AcquisitionMode>([
  [0, 'escan'],
  [1, 'bscan'],
  [2, 'mixed'],
]);

export const SCAN_HEADER_WORDS = 47;
export const SCAN_HEADER_SIZE = SCAN_HEADER_WORDS * 4;
export const SCAN_SYNC_WORD = 3;
export const SCAN_SYNC: readonly number[] = [0x0d, 0x0e, 0x0f];
export const SCAN_NUMBER_WORD = 9;
export const SCAN_ACF_WORD = 12;
export const SCAN_TIME_WORD = 19;
export const SCAN_FCF_WORD = 35;

export const TAG_DATA = 0x1;
export const TAG_MASS = 0x2;
export const TAG_TIME = 0x3;
export const TAG_VOLT = 0x4;
export const TAG_END_OF_MASS = 0x8;
export const TAG_B = 0xb;
export const TAG_BSCAN = 0xc;
export const TAG_END_OF_SCAN = 0xf;

/** Tags carrying settings the tables do not report. */
export const SKIPPED_TAGS: ReadonlySet<number> = new Set([TAG_MASS, TAG_TIME, TAG_VOLT, TAG_B, TAG_BSCAN]);

export type Detector = 'pulse' | 'analog' | 'faraday';

/** Column order within a mass. */
export const DETECTOR_ORDER: readonly Detector[] = ['pulse', 'analog', 'faraday'];

export const DETECTORS: ReadonlyMap<number, Detector> = new Map<number, Detector>([
  [0x0, 'analog'],
  [0x1, 'pulse'],
  [0x8, 'faraday'],
]);

export const DETECTOR_SUFFIX: Readonly<Record<Detector, string>> = {
  pulse: 'p',
  analog: 'a',
  faraday: 'f',
};

export function tagOf(word: number): number {
  return (word >>> 28) & 0xf;
}

export function payloadOf(word: number): number {
  return word & 0x0fffffff;
}

export interface DataWord {
  detector: number;
  value: number;
  flagged: boolean;
}

/** The flag marks a suspect reading; the value stays its magnitude. A zero reading is never flagged. */
export function unpackDataWord(payload: number): DataWord {
  const flag = (payload >>> 24) & 0xf;
  const detector = (payload >>> 20) & 0xf;
  const exponent = (payload >>> 16) & 0xf;
  const mantissa = payload & 0xffff;
  const value = mantissa * 2 ** exponent;
  return { detector, value, flagged: flag !== 0 && value !== 0 };
}

export function defaultChannelLabel(position: number): string {
  return `Mass${String(position + 1).padStart(2, '0')}`;
}
