import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { handleToolCall, type ToolCallResult } from '../src/tools/index.js';
import { getLogLevel, setLogLevel, type LogLevel } from '../src/shared/index.js';
import { buildDat } from './helpers/datFixture.js';

let dir: string;
let savedLevel: LogLevel;

function payload(result: ToolCallResult): unknown {
  const [first] = result.content;
  if (first === undefined) throw new Error('empty tool result');
  return JSON.parse(first.text);
}

beforeAll(() => {
  savedLevel = getLogLevel();
  setLogLevel('quiet');
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'icp-dat-tools-'));
  fs.writeFileSync(
    path.join(dir, 'a.dat'),
    buildDat({
      acquiredAt: 1_700_000_000,
      masses: ['X', 'Y'],
      scans: [
        { elapsedMs: 0, values: [1, 2] },
        { elapsedMs: 250, values: [3, 4] },
      ],
    }),
  );
  fs.writeFileSync(
    path.join(dir, 'b.dat'),
    buildDat({ acquiredAt: 1_700_000_100, masses: ['Y', 'Z'], scans: [{ elapsedMs: 0, values: [5, 6] }] }),
  );
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  setLogLevel(savedLevel);
});

describe('dat_inspect', () => {
  it('reports header, masses, channels and leading scans', async () => {
    const file = path.join(dir, 'a.dat');
    const result = await handleToolCall('dat_inspect', { path: file, scans: 1 });

    expect(result.isError).toBeUndefined();
    expect(payload(result)).toEqual({
      source: file,
      header: {
        revision: 1,
        acquisitionMode: 'escan',
        acquiredAt: 1_700_000_000,
        declaredScanCount: 2,
        massCount: 2,
      },
      masses: [
        { label: 'X', pulse: 1, analog: 0, faraday: 0 },
        { label: 'Y', pulse: 1, analog: 0, faraday: 0 },
      ],
      channels: ['X', 'Y'],
      scan_count: 2,
      warnings: [],
      scans: [
        {
          index: 0,
          number: 1,
          elapsedMs: 0,
          timestamp: 1_700_000_000,
          acf: 6,
          fcf: 0,
          values: [1, 2],
          flagged: [false, false],
        },
      ],
    });
  });

  it('reports decode errors by code', async () => {
    const result = await handleToolCall('dat_inspect', { path: path.join(dir, 'none.dat') });
    expect(result.isError).toBe(true);
    expect(payload(result)).toMatchObject({ error: { code: 'READ_FAILED' } });
  });

  it('rejects invalid parameters', async () => {
    const result = await handleToolCall('dat_inspect', { path: path.join(dir, 'a.dat'), scans: 500 });
    expect(result.isError).toBe(true);
    expect(payload(result)).toMatchObject({ error: { code: 'INVALID_PARAMS', message: 'Invalid parameters for dat_inspect' } });
  });
});

describe('dat_convert', () => {
  it('is hidden in standard mode', async () => {
    const result = await handleToolCall('dat_convert', { paths: [path.join(dir, 'a.dat')] });
    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      error: { code: 'INVALID_PARAMS', message: 'Tool not exposed in standard mode: dat_convert' },
    });
  });

  it('writes tables in full mode', async () => {
    const paths = [path.join(dir, 'a.dat'), path.join(dir, 'b.dat'), path.join(dir, 'none.dat')];
    const result = await handleToolCall('dat_convert', { paths, options: { missing: 'NA' } }, 'full');

    expect(payload(result)).toMatchObject({
      outputs: [
        { kind: 'run', path: path.join(dir, 'a.csv'), status: 'written' },
        { kind: 'run', path: path.join(dir, 'b.csv'), status: 'written' },
        { kind: 'combined', path: path.join(dir, 'acombined.csv'), status: 'written' },
      ],
      failures: [{ path: path.join(dir, 'none.dat'), code: 'READ_FAILED' }],
    });
    expect(fs.readFileSync(path.join(dir, 'acombined.csv'), 'utf-8')).toBe(
      [
        'Source,Scan,Time,X,Y,Z',
        `${path.join(dir, 'a.dat')},1,1700000000,1,2,NA`,
        `${path.join(dir, 'a.dat')},2,1700000000.25,3,4,NA`,
        `${path.join(dir, 'b.dat')},1,1700000100,NA,5,6`,
        '',
      ].join('\n'),
    );
  });
});

describe('unknown tools', () => {
  it('are reported as invalid parameters', async () => {
    const result = await handleToolCall('dat_nothing', {});
    expect(payload(result)).toEqual({ error: { code: 'INVALID_PARAMS', message: 'Unknown tool: dat_nothing' } });
  });
});
