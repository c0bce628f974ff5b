import * as fs from 'fs';
import * as path from 'path';
import { COMBINED_TAG, OUTPUT_SUFFIX, type ConvertOptions } from '../config.js';
import {
  ELEMENT_LIST_SUFFIX,
  decodeDat,
  describeWarning,
  parseElementList,
  relabelRun,
  type Run,
} from '../dat/index.js';
import { nameFor, splitInputPath } from '../output/namer.js';
import { DatError, logDebug, logInfo, logWarn, readFailed, toDatError } from '../shared/index.js';
import { reconcile, writeRun, writeTable } from '../table/index.js';

/** Where input bytes come from and how existing paths are detected. */
export interface DatSource {
  readFile(filePath: string): Uint8Array;
  /** Text content, or null when the file does not exist. */
  readText(filePath: string): string | null;
  exists(filePath: string): boolean;
}

export const nodeDatSource: DatSource = {
  readFile: filePath => fs.readFileSync(filePath),
  readText: filePath => (fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf-8') : null),
  exists: filePath => fs.existsSync(filePath),
};

export type OutputKind = 'run' | 'combined';

export interface ConversionOutput {
  kind: OutputKind;
  /** Input the table came from; absent for the combined table. */
  inputPath?: string;
  outputPath: string;
  text: string;
}

export interface ConversionFailure {
  inputPath: string;
  error: DatError;
}

export interface ConversionPlan {
  runs: Run[];
  outputs: ConversionOutput[];
  failures: ConversionFailure[];
}

export interface WriteResult {
  kind: OutputKind;
  outputPath: string;
  status: 'written' | 'failed';
  error?: string;
}

function readInput(inputPath: string, source: DatSource): Uint8Array {
  try {
    return source.readFile(inputPath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw readFailed(`Cannot read ${inputPath}: ${message}`, { path: inputPath });
  }
}

function elementLabelsFor(inputPath: string, source: DatSource): string[] | null {
  const { directory, base } = splitInputPath(inputPath);
  const listPath = path.join(directory, `${base}${ELEMENT_LIST_SUFFIX}`);
  const content = source.readText(listPath);
  if (content === null) return null;
  logDebug(`Reading element list ${listPath}`);
  return parseElementList(content);
}

/** Decodes one input, applying its element list when the label count fits. */
export function decodeInput(inputPath: string, options: ConvertOptions, source: DatSource = nodeDatSource): Run {
  const bytes = readInput(inputPath, source);
  const run = decodeDat(bytes, inputPath, { recover: options.recover });
  logDebug(
    `${inputPath}: revision ${run.header.revision}, ${run.masses.length} masses, ${run.channels.length} channels, ${run.scans.length} scans`,
  );

  for (const warning of run.warnings) {
    logWarn(`${inputPath}: ${describeWarning(warning)}`);
  }

  const labels = elementLabelsFor(inputPath, source);
  if (labels === null) return run;
  if (labels.length !== run.masses.length) {
    logWarn(
      `${inputPath}: element list has ${labels.length} labels for ${run.masses.length} masses; keeping stored labels`,
    );
    return run;
  }
  return relabelRun(run, labels);
}

/**
 * Decodes every input and lays out the text of every output file.
 *
 * Inputs that fail to decode are reported in `failures` and left out of the
 * combined table. Output paths never collide with existing files or with each
 * other; `overwrite` lets per-file tables reuse their plain name.
 */
export function planConversion(
  inputPaths: readonly string[],
  options: ConvertOptions,
  source: DatSource = nodeDatSource,
): ConversionPlan {
  const decoded: Run[] = [];
  const failures: ConversionFailure[] = [];

  for (const inputPath of inputPaths) {
    try {
      decoded.push(decodeInput(inputPath, options, source));
    } catch (err) {
      const error = toDatError(err);
      logWarn(`${inputPath}: ${error.code}: ${error.message}`);
      failures.push({ inputPath, error });
    }
  }

  const runs = options.order === 'acquired'
    ? [...decoded].sort((a, b) => a.header.acquiredAt - b.header.acquiredAt)
    : decoded;

  const planned = new Set<string>();
  const takenInBatch = (candidate: string): boolean => planned.has(candidate);
  const taken = (candidate: string): boolean => planned.has(candidate) || source.exists(candidate);
  const outputs: ConversionOutput[] = [];

  for (const run of runs) {
    const { directory, base } = splitInputPath(run.sourceIdentity);
    const outputPath = nameFor(base, OUTPUT_SUFFIX, directory, options.overwrite ? takenInBatch : taken);
    planned.add(outputPath);
    outputs.push({ kind: 'run', inputPath: run.sourceIdentity, outputPath, text: writeRun(run, options) });
  }

  const first = runs[0];
  if (first !== undefined && runs.length >= 2) {
    const { directory, base } = splitInputPath(first.sourceIdentity);
    const outputPath = nameFor(`${base}${COMBINED_TAG}`, OUTPUT_SUFFIX, directory, taken);
    planned.add(outputPath);
    outputs.push({ kind: 'combined', outputPath, text: writeTable(reconcile(runs), options) });
  }

  return { runs, outputs, failures };
}

/**
 * Writes every planned output. Files are created exclusively so a name taken
 * since planning fails that write instead of replacing someone else's file;
 * only per-file tables under `overwrite` may replace an existing file.
 */
export function writeConversion(plan: ConversionPlan, options: Pick<ConvertOptions, 'overwrite'>): WriteResult[] {
  return plan.outputs.map((output): WriteResult => {
    const flag = output.kind === 'run' && options.overwrite ? 'w' : 'wx';
    try {
      fs.writeFileSync(output.outputPath, output.text, { encoding: 'utf-8', flag });
      logInfo(`Writing to ${output.outputPath}`);
      return { kind: output.kind, outputPath: output.outputPath, status: 'written' };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logWarn(`Failed to write ${output.outputPath}: ${message}`);
      return { kind: output.kind, outputPath: output.outputPath, status: 'failed', error: message };
    }
  });
}
