import { describe, it, expect } from 'vitest';
import { decodeDat, describeWarning, relabelRun } from '../src/dat/index.js';
import { TAG_END_OF_MASS, TAG_MASS } from '../src/dat/layout.js';
import { DatError } from '../src/shared/index.js';
import { writeRun } from '../src/table/index.js';
import {
  DETECTOR_ANALOG,
  DETECTOR_FARADAY,
  buildDat,
  buildNativeDat,
  channelBlock,
  concatBytes,
  dataWord,
  encodeScan,
  massBlock,
  scanSize,
  tagWord,
} from './helpers/datFixture.js';

const ACQUIRED_AT = 1_700_000_000;

function decodeError(bytes: Uint8Array, options: { recover?: boolean } = {}): DatError {
  try {
    decodeDat(bytes, 'test.dat', options);
  } catch (err) {
    if (err instanceof DatError) return err;
    throw err;
  }
  throw new Error('expected decodeDat to fail');
}

// Header 32 bytes + mass table 12 bytes; scans of 240 bytes at 44 and 284;
// the revision 1 index follows at 524.
function sampleDat(revision: number): Uint8Array {
  return buildDat({
    revision,
    acquiredAt: ACQUIRED_AT,
    masses: ['Li7', 'Be9', 'B11'],
    scans: [
      { elapsedMs: 0, values: [1200, 35, 0] },
      { elapsedMs: 500, acf: 3, values: [1180, 35, 200000] },
    ],
  });
}

function pulseOnly(label: string) {
  return { label, pulse: 1, analog: 0, faraday: 0 };
}

describe('decodeDat', () => {
  for (const revision of [1, 2]) {
    it(`decodes a three-mass run (revision ${revision})`, () => {
      const run = decodeDat(sampleDat(revision), 'sample.dat');

      expect(run.sourceIdentity).toBe('sample.dat');
      expect(run.channels).toEqual(['Li7', 'Be9', 'B11']);
      expect(run.masses).toEqual([pulseOnly('Li7'), pulseOnly('Be9'), pulseOnly('B11')]);
      expect(run.header).toEqual({
        revision,
        acquisitionMode: 'escan',
        acquiredAt: ACQUIRED_AT,
        declaredScanCount: revision === 1 ? 2 : null,
        massCount: 3,
      });
      expect(run.scans).toEqual([
        {
          index: 0,
          number: 1,
          elapsedMs: 0,
          timestamp: ACQUIRED_AT,
          acf: 6,
          fcf: 0,
          values: [1200, 35, 0],
          flagged: [false, false, false],
        },
        {
          index: 1,
          number: 2,
          elapsedMs: 500,
          timestamp: ACQUIRED_AT + 0.5,
          acf: 3,
          fcf: 0,
          values: [1180, 35, 200000],
          flagged: [false, false, false],
        },
      ]);
      expect(run.warnings).toEqual([]);
    });
  }

  it('writes a table that parses back to the decoded run', () => {
    const run = decodeDat(sampleDat(2), 'sample.dat');
    const [header, ...rows] = writeRun(run).trimEnd().split('\n');

    expect(header?.split(',')).toEqual(run.channels);
    expect(rows.map(row => row.split(',').map(Number))).toEqual(run.scans.map(scan => scan.values));
    for (const scan of run.scans) expect(scan.values).toHaveLength(run.channels.length);
  });

  it('reads acquisition modes', () => {
    const run = decodeDat(buildDat({ mode: 2, masses: ['X'], scans: [] }), 'm.dat');
    expect(run.header.acquisitionMode).toBe('mixed');
    expect(run.scans).toEqual([]);
    expect(run.channels).toEqual(['X']);
  });

  it('accepts analog and faraday readings', () => {
    const bytes = buildDat({
      masses: ['A', 'F'],
      scans: [{ elapsedMs: 0, massWords: [channelBlock(12, DETECTOR_ANALOG), channelBlock(8, DETECTOR_FARADAY)] }],
    });
    const run = decodeDat(bytes, 'd.dat');
    expect(run.scans[0]?.values).toEqual([12, 8]);
    expect(run.masses).toEqual([
      { label: 'A', pulse: 0, analog: 1, faraday: 0 },
      { label: 'F', pulse: 0, analog: 0, faraday: 1 },
    ]);
  });

  it('keeps every reading of a mass, pulse before analog before faraday', () => {
    const bytes = buildDat({
      masses: ['Li7', 'Be9'],
      scans: [
        {
          elapsedMs: 0,
          fcf: 2,
          massWords: [
            massBlock(dataWord(40, DETECTOR_ANALOG), dataWord(100), dataWord(101)),
            massBlock(dataWord(7, DETECTOR_FARADAY)),
          ],
        },
      ],
    });
    const run = decodeDat(bytes, 'multi.dat');

    expect(run.masses).toEqual([
      { label: 'Li7', pulse: 2, analog: 1, faraday: 0 },
      { label: 'Be9', pulse: 0, analog: 0, faraday: 1 },
    ]);
    expect(run.channels).toEqual(['Li7p', 'Li7p#2', 'Li7a', 'Be9']);
    expect(run.scans[0]?.values).toEqual([100, 101, 40, 7]);
    expect(run.scans[0]?.fcf).toBe(2);
  });

  it('keeps the magnitude of a flagged reading and marks it', () => {
    const bytes = buildDat({
      masses: ['X', 'Y', 'Z'],
      scans: [
        {
          elapsedMs: 0,
          massWords: [massBlock(dataWord(35, undefined, true)), channelBlock(12), massBlock(dataWord(0, undefined, true))],
        },
      ],
    });
    const scan = decodeDat(bytes, 'f.dat').scans[0];
    expect(scan?.values).toEqual([35, 12, 0]);
    expect(scan?.flagged).toEqual([true, false, false]);
  });

  it('names unlabeled masses by position', () => {
    const run = decodeDat(buildDat({ masses: ['', 'Be9', ''], scans: [] }), 'n.dat');
    expect(run.channels).toEqual(['Mass01', 'Be9', 'Mass03']);
  });

  it('warns when timestamps go backwards and keeps decoding', () => {
    const run = decodeDat(
      buildDat({
        acquiredAt: ACQUIRED_AT,
        masses: ['X'],
        scans: [
          { elapsedMs: 0, values: [1] },
          { elapsedMs: 2000, values: [2] },
          { elapsedMs: 1000, values: [3] },
        ],
      }),
      't.dat',
    );

    expect(run.scans).toHaveLength(3);
    expect(run.warnings).toEqual([
      { kind: 'timestamp_decrease', scanIndex: 2, previous: ACQUIRED_AT + 2, current: ACQUIRED_AT + 1 },
    ]);
    expect(describeWarning(run.warnings[0]!)).toBe('scan 3 timestamp 1700000001 is earlier than 1700000002');
  });

  it('does not warn on equal timestamps', () => {
    const run = decodeDat(
      buildDat({ masses: ['X'], scans: [{ elapsedMs: 10, values: [1] }, { elapsedMs: 10, values: [1] }] }),
      'e.dat',
    );
    expect(run.warnings).toEqual([]);
  });
});

describe('decodeDat native layout', () => {
  // Header ends at 0x164 (356); two-mass scans are 224 bytes, so scans sit at
  // 356 and 580 and the index marker at 804, with entries from 808.
  const scans = [
    { elapsedMs: 0, values: [10, 20] },
    { elapsedMs: 250, acf: 9, values: [11, 21] },
  ];

  it('reads scans through the index and numbers masses by position', () => {
    const run = decodeDat(buildNativeDat({ acquiredAt: ACQUIRED_AT, scans }), 'native.dat');

    expect(run.header).toEqual({
      revision: 0,
      acquisitionMode: null,
      acquiredAt: ACQUIRED_AT,
      declaredScanCount: 2,
      massCount: 2,
    });
    expect(run.channels).toEqual(['Mass01', 'Mass02']);
    expect(run.scans.map(scan => [scan.number, scan.timestamp, scan.acf, ...scan.values])).toEqual([
      [1, ACQUIRED_AT, 6, 10, 20],
      [2, ACQUIRED_AT + 0.25, 9, 11, 21],
    ]);
    expect(run.warnings).toEqual([]);
  });

  it('reads scans back to back when the index is empty', () => {
    const run = decodeDat(buildNativeDat({ acquiredAt: ACQUIRED_AT, scans, indexed: false }), 'native.dat');
    expect(run.header.declaredScanCount).toBeNull();
    expect(run.scans.map(scan => scan.values)).toEqual([
      [10, 20],
      [11, 21],
    ]);
  });

  it('takes mass labels from relabelRun', () => {
    const run = relabelRun(decodeDat(buildNativeDat({ scans }), 'native.dat'), ['Li7', 'Be9']);
    expect(run.channels).toEqual(['Li7', 'Be9']);
  });

  it('treats a file without the container signature as native', () => {
    expect(decodeError(new Uint8Array(40)).code).toBe('TRUNCATED');
  });

  it('rejects an index offset inside the header', () => {
    const bytes = buildNativeDat({ scans });
    new DataView(bytes.buffer).setUint32(0x10 + 33 * 4, 100, true);
    const err = decodeError(bytes);
    expect(err.code).toBe('MALFORMED_HEADER');
    expect(err.message).toBe('Scan index offset 100 points into the file header');
  });

  it('reports a file cut before its index as truncated', () => {
    const err = decodeError(buildNativeDat({ scans }).slice(0, 700));
    expect(err.code).toBe('TRUNCATED');
    expect(err.message).toBe('Scan index at offset 808 lies past the end of the file (700 bytes)');
  });

  it('rejects a file whose scans carry no mass blocks', () => {
    const err = decodeError(buildNativeDat({ scans: [{ elapsedMs: 0, values: [] }] }));
    expect(err.code).toBe('MALFORMED_HEADER');
  });

  it('walks the scans and ignores the index when recovering', () => {
    const run = decodeDat(buildNativeDat({ scans }), 'native.dat', { recover: true });
    expect(run.scans).toHaveLength(2);
    expect(run.warnings).toEqual([{ kind: 'trailing_bytes', offset: 804, bytes: 12 }]);
  });

  it('skips junk between scans when recovering', () => {
    const first = buildNativeDat({ scans: scans.slice(0, 1), indexed: false });
    const bytes = concatBytes(first, new Uint8Array(5).fill(0xaa), encodeScan({ elapsedMs: 250, values: [11, 21] }, 1));

    expect(decodeError(bytes).code).toBe('MALFORMED_RECORD');

    const run = decodeDat(bytes, 'native.dat', { recover: true });
    expect(run.scans.map(scan => scan.number)).toEqual([1, 2]);
    expect(run.warnings).toEqual([{ kind: 'resync', offset: 580, skippedBytes: 5 }]);
  });
});

describe('decodeDat header errors', () => {
  it('rejects an unknown revision', () => {
    const err = decodeError(buildDat({ revision: 3, masses: ['X'], scans: [] }));
    expect(err.code).toBe('UNSUPPORTED_VERSION');
    expect(err.data).toEqual({ revision: 3, supported: [0, 1, 2] });
  });

  it('rejects an unknown acquisition mode', () => {
    expect(decodeError(buildDat({ mode: 7, masses: ['X'], scans: [] })).code).toBe('MALFORMED_HEADER');
  });

  it('rejects a header with no masses', () => {
    expect(decodeError(buildDat({ masses: [], scans: [] })).message).toBe('Header declares no masses');
  });

  it('rejects duplicate mass labels', () => {
    const err = decodeError(buildDat({ masses: ['Li7', 'Be9', 'Li7'], scans: [] }));
    expect(err.code).toBe('MALFORMED_HEADER');
    expect(err.message).toBe('Duplicate mass "Li7" at positions 1 and 3');
  });

  it('rejects a stored label that collides with a positional name', () => {
    expect(decodeError(buildDat({ masses: ['', 'Mass01'], scans: [] })).code).toBe('MALFORMED_HEADER');
  });

  it('rejects reading columns that collide', () => {
    const bytes = buildDat({
      masses: ['Li7', 'Li7p'],
      scans: [{ elapsedMs: 0, massWords: [massBlock(dataWord(1), dataWord(2, DETECTOR_ANALOG)), channelBlock(3)] }],
    });
    expect(decodeError(bytes).message).toBe('Duplicate channel "Li7p" at positions 1 and 3');
  });

  it('rejects a header whose mass count no scan matches', () => {
    const err = decodeError(buildDat({ masses: ['X', 'Y'], scans: [{ elapsedMs: 0, values: [1] }] }));
    expect(err.code).toBe('MALFORMED_HEADER');
    expect(err.message).toBe('Header declares 2 masses, scans carry 1');
  });

  it('rejects scans without readings', () => {
    const bytes = buildDat({
      masses: ['X'],
      scans: [{ elapsedMs: 0, massWords: [[tagWord(TAG_MASS, 1), tagWord(TAG_END_OF_MASS)]] }],
    });
    expect(decodeError(bytes).message).toBe('Scans carry no readings');
  });

  it('rejects a truncated header', () => {
    expect(decodeError(sampleDat(1).slice(0, 20)).code).toBe('TRUNCATED');
  });

  it('rejects a truncated mass table', () => {
    const bytes = buildDat({ revision: 2, masses: ['Li7', 'Be9'], scans: [] });
    expect(decodeError(bytes.slice(0, bytes.length - 2)).code).toBe('TRUNCATED');
  });

  it('rejects a streamed file that declares a scan count', () => {
    const bytes = buildDat({ revision: 2, declaredScanCount: 1, masses: ['X'], scans: [{ elapsedMs: 0, values: [1] }] });
    expect(decodeError(bytes).code).toBe('MALFORMED_HEADER');
  });

  it('rejects an index whose count disagrees with the header', () => {
    const err = decodeError(
      buildDat({ indexEntryCount: 3, masses: ['X'], scans: [{ elapsedMs: 0, values: [1] }, { elapsedMs: 1, values: [2] }] }),
    );
    expect(err.code).toBe('MALFORMED_HEADER');
    expect(err.message).toBe('Scan index lists 3 scans, header declares 2');
  });

  it('reports an index offset past the end of the file as truncated', () => {
    const err = decodeError(buildDat({ indexOffset: 10_000, masses: ['X'], scans: [{ elapsedMs: 0, values: [1] }] }));
    expect(err.code).toBe('TRUNCATED');
  });
});

describe('decodeDat record errors', () => {
  function singleScan(scan: Parameters<typeof encodeScan>[0], masses = ['X']): Uint8Array {
    return buildDat({ masses, scans: [scan] });
  }

  it('rejects a scan stored under the wrong number', () => {
    const err = decodeError(singleScan({ elapsedMs: 0, number: 5, values: [1] }));
    expect(err.code).toBe('MALFORMED_RECORD');
    expect(err.message).toBe('Expected scan 1 at offset 34, found 5');
  });

  it('rejects a scan header without sync words', () => {
    const err = decodeError(singleScan({ elapsedMs: 0, sync: [0, 0, 0], values: [1] }));
    expect(err.message).toBe('No scan header at offset 34');
  });

  it('fails on a revision 1 record cut short', () => {
    const err = decodeError(sampleDat(1).slice(0, 300));
    expect(err.code).toBe('TRUNCATED');
    expect(err.message).toBe('Scan index at offset 524 lies past the end of the file (300 bytes)');
    expect(err.data).toEqual({ offset: 524, length: 300 });
  });

  it('fails on a scan offset past the end of the file', () => {
    const bytes = sampleDat(1);
    new DataView(bytes.buffer).setUint32(532, 5000, true);
    const err = decodeError(bytes);
    expect(err.code).toBe('TRUNCATED');
    expect(err.message).toBe('Scan 2 at offset 5000 lies past the end of the file (536 bytes)');
  });

  it('fails on a revision 2 record cut short', () => {
    const bytes = sampleDat(2);
    expect(decodeError(bytes.slice(0, bytes.length - 6)).code).toBe('TRUNCATED');
  });

  it('fails when a skipped scan has no end-of-scan word', () => {
    const err = decodeError(singleScan({ elapsedMs: 0, massWords: [[tagWord(0x5), dataWord(1)]], endWord: null }));
    expect(err.code).toBe('TRUNCATED');
  });
});

describe('decodeDat skipped scans', () => {
  // One-mass scans are 208 bytes from 34; the damaged second scan has one
  // extra word, so its unknown tag sits at 242 + 188.
  for (const revision of [1, 2]) {
    it(`skips a scan with an unknown tag and keeps decoding (revision ${revision})`, () => {
      const bytes = buildDat({
        revision,
        masses: ['X'],
        scans: [
          { elapsedMs: 0, values: [1] },
          { elapsedMs: 10, massWords: [[tagWord(0x5), ...channelBlock(2)]] },
          { elapsedMs: 20, values: [3] },
        ],
      });
      const run = decodeDat(bytes, 's.dat');

      expect(run.scans.map(scan => [scan.index, scan.number, ...scan.values])).toEqual([
        [0, 1, 1],
        [1, 3, 3],
      ]);
      expect(run.warnings).toEqual([
        { kind: 'skipped_scan', scanNumber: 2, offset: 242, reason: 'unknown tag 0x5 at offset 430' },
      ]);
      expect(describeWarning(run.warnings[0]!)).toBe('skipped scan 2 at offset 242: unknown tag 0x5 at offset 430');
    });
  }

  it('skips a scan with an unknown detector', () => {
    const run = decodeDat(singleScanFile([massBlock(dataWord(5, 0x3))]), 'd.dat');
    expect(run.scans).toEqual([]);
    expect(run.warnings).toEqual([
      { kind: 'skipped_scan', scanNumber: 1, offset: 34, reason: 'unknown detector type 0x3 at offset 230' },
    ]);
  });

  it('skips a scan that ends inside a mass block', () => {
    const run = decodeDat(singleScanFile([[tagWord(TAG_MASS, 1), dataWord(1)]]), 'e.dat');
    expect(run.warnings).toEqual([
      { kind: 'skipped_scan', scanNumber: 1, offset: 34, reason: 'scan ended inside a mass block at offset 230' },
    ]);
  });

  it('skips a scan whose readings differ from the run layout', () => {
    const bytes = buildDat({
      masses: ['X'],
      scans: [
        { elapsedMs: 0, values: [1] },
        { elapsedMs: 10, massWords: [massBlock(dataWord(2), dataWord(3, DETECTOR_ANALOG))] },
      ],
    });
    const run = decodeDat(bytes, 'l.dat');
    expect(run.scans).toHaveLength(1);
    expect(run.warnings).toEqual([
      {
        kind: 'skipped_scan',
        scanNumber: 2,
        offset: 34 + scanSize(1),
        reason: 'mass X has 1/1/0 pulse/analog/faraday readings, run has 1/0/0',
      },
    ]);
  });

  it('skips a scan with a different number of masses', () => {
    const bytes = buildDat({
      masses: ['X', 'Y'],
      scans: [
        { elapsedMs: 0, values: [1, 2] },
        { elapsedMs: 10, values: [3] },
      ],
    });
    const run = decodeDat(bytes, 'm.dat');
    expect(run.scans).toHaveLength(1);
    expect(run.warnings[0]).toMatchObject({
      kind: 'skipped_scan',
      scanNumber: 2,
      reason: "mass block count 1 differs from the run's 2",
    });
  });

  function singleScanFile(massWords: number[][]): Uint8Array {
    return buildDat({ masses: ['X'], scans: [{ elapsedMs: 0, massWords }] });
  }
});

describe('decodeDat recovery', () => {
  // Mass table for ['X'] is 2 bytes, a one-mass scan 208 bytes.
  const FIRST_SCAN = 34;
  const SCAN_SIZE = scanSize(1);

  function streamed(...scans: Parameters<typeof encodeScan>[0][]): Uint8Array {
    return buildDat({ revision: 2, acquiredAt: ACQUIRED_AT, masses: ['X'], scans });
  }

  it('skips junk between scans', () => {
    const junk = new Uint8Array(5).fill(0xaa);
    const bytes = concatBytes(streamed({ elapsedMs: 0, values: [1] }), junk, encodeScan({ elapsedMs: 100, values: [2] }, 1));

    expect(decodeError(bytes).code).toBe('MALFORMED_RECORD');

    const run = decodeDat(bytes, 'r.dat', { recover: true });
    expect(run.scans.map(scan => scan.values[0])).toEqual([1, 2]);
    expect(run.warnings).toEqual([{ kind: 'resync', offset: FIRST_SCAN + SCAN_SIZE, skippedBytes: 5 }]);
    expect(describeWarning(run.warnings[0]!)).toBe('skipped 5 bytes at offset 242 to find the next scan');
  });

  it('reports undecodable trailing bytes', () => {
    const bytes = concatBytes(streamed({ elapsedMs: 0, values: [1] }), new Uint8Array(10).fill(0xaa));
    const run = decodeDat(bytes, 'r.dat', { recover: true });
    expect(run.scans).toHaveLength(1);
    expect(run.warnings).toEqual([{ kind: 'trailing_bytes', offset: 242, bytes: 10 }]);
  });

  it('keeps the scans before a record cut short', () => {
    const full = streamed({ elapsedMs: 0, values: [1] }, { elapsedMs: 10, values: [2] });
    const run = decodeDat(full.slice(0, full.length - 6), 'r.dat', { recover: true });
    expect(run.scans).toHaveLength(1);
    expect(run.warnings).toEqual([{ kind: 'trailing_bytes', offset: 242, bytes: 202 }]);
  });

  it('never applies to header errors', () => {
    const bytes = buildDat({ revision: 2, masses: ['X', 'X'], scans: [] });
    expect(decodeError(bytes, { recover: true }).code).toBe('MALFORMED_HEADER');
  });

  it('does not apply to indexed files', () => {
    const bytes = buildDat({ masses: ['X'], scans: [{ elapsedMs: 0, number: 4, values: [1] }] });
    expect(decodeError(bytes, { recover: true }).code).toBe('MALFORMED_RECORD');
  });
});

describe('relabelRun', () => {
  const run = decodeDat(sampleDat(1), 'sample.dat');

  it('replaces the mass labels only', () => {
    const relabeled = relabelRun(run, ['7Li', '9Be', '11B']);
    expect(relabeled.channels).toEqual(['7Li', '9Be', '11B']);
    expect(relabeled.scans).toBe(run.scans);
    expect(run.channels).toEqual(['Li7', 'Be9', 'B11']);
  });

  it('derives reading columns from the new labels', () => {
    const multi = decodeDat(
      buildDat({
        masses: ['Mass01'],
        scans: [{ elapsedMs: 0, massWords: [massBlock(dataWord(1), dataWord(2, DETECTOR_ANALOG))] }],
      }),
      'm.dat',
    );
    expect(relabelRun(multi, ['Li7']).channels).toEqual(['Li7p', 'Li7a']);
  });

  it('rejects a label count mismatch', () => {
    expect(() => relabelRun(run, ['a', 'b'])).toThrow('Mass label list has 2 entries, run has 3');
  });

  it('rejects duplicate labels', () => {
    expect(() => relabelRun(run, ['a', 'b', 'a'])).toThrow(DatError);
  });
});
