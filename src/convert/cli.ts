import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { resolveConvertOptions, type ConvertOptions, type ConvertOptionsInput } from '../config.js';
import { logError, logInfo, setLogLevel } from '../shared/index.js';
import { planConversion, writeConversion } from './convert.js';

interface ConvertArgs {
  options: ConvertOptionsInput;
  logLevel?: 'quiet' | 'debug';
  inputs: string[];
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) throw new Error(`Missing value for ${flag}`);
  return value;
}

function parseArgs(argv: string[]): ConvertArgs {
  const out: ConvertArgs = { options: {}, inputs: [] };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]!;
    if (arg === '--scan-columns') out.options.scanColumns = true;
    else if (arg === '--comments' || arg === '-c') out.options.comments = true;
    else if (arg === '--overwrite') out.options.overwrite = true;
    else if (arg === '--recover') out.options.recover = true;
    else if (arg === '--delimiter') {
      const value = requireValue(arg, argv[++index]);
      out.options.delimiter = value === '\\t' ? '\t' : value;
    }
    else if (arg === '--missing') out.options.missing = requireValue(arg, argv[++index]);
    else if (arg === '--order') {
      const value = requireValue(arg, argv[++index]);
      if (value !== 'input' && value !== 'acquired') throw new Error(`Invalid --order: ${value}`);
      out.options.order = value;
    }
    else if (arg === '--debug' || arg === '-d') out.logLevel = 'debug';
    else if (arg === '--quiet' || arg === '-q') out.logLevel = 'quiet';
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg.startsWith('-') && arg.length > 1) throw new Error(`Unknown arg: ${arg}`);
    else out.inputs.push(arg);
  }
  return out;
}

function usage(): string {
  return [
    'Usage:',
    '  icp-dat convert [options] <file.dat|directory> [...]',
    '',
    'Writes <name>.csv beside each input. With several inputs, also writes',
    '<first name>combined.csv beside the first one with all runs aligned on',
    'the union of their channels. Existing files are never replaced unless',
    '--overwrite is given (per-file tables only); a -1, -2, ... suffix is used.',
    '',
    'Options:',
    '  --delimiter <c>        field delimiter (default ",", "\\t" for tab)',
    '  --missing <text>       text for channels a run never measured (default empty)',
    '  --scan-columns         add Scan, Time, ACF (and FCF) columns to per-file tables',
    '  -c, --comments         add a provenance comment line per run',
    '  --overwrite            replace existing per-file tables',
    '  --order input|acquired order of runs in the combined table',
    '  --recover              skip damaged scan records in streamed and native files',
    '  -d, --debug            verbose diagnostics',
    '  -q, --quiet            errors only',
  ].join('\n');
}

/** Expands directories into their .dat files, sorted by name. */
export function expandInputs(args: readonly string[]): string[] {
  const files: string[] = [];
  for (const arg of args) {
    const isDirectory = fs.existsSync(arg) && fs.statSync(arg).isDirectory();
    if (!isDirectory) {
      files.push(arg);
      continue;
    }
    const entries = fs.readdirSync(arg)
      .filter(name => name.toLowerCase().endsWith('.dat'))
      .sort()
      .map(name => path.join(arg, name))
      .filter(entry => fs.statSync(entry).isFile());
    if (entries.length === 0) logInfo(`No .dat files in ${arg}`);
    files.push(...entries);
  }
  return files;
}

/** Runs `convert`; resolves to the process exit code. */
export async function runConvertCli(argv: string[]): Promise<number> {
  let args: ConvertArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return 0;
    }
    throw new Error(`${message}\n${usage()}`);
  }

  if (args.logLevel) setLogLevel(args.logLevel);
  if (args.inputs.length === 0) {
    throw new Error(`No input files given.\n${usage()}`);
  }

  let options: ConvertOptions;
  try {
    options = resolveConvertOptions(args.options);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(`Invalid options: ${err.issues.map(issue => issue.message).join('; ')}`);
    }
    throw err;
  }

  const inputs = expandInputs(args.inputs);
  if (inputs.length === 0) {
    logError('Nothing to convert');
    return 1;
  }

  const plan = planConversion(inputs, options);
  const results = writeConversion(plan, options);

  const written = results.filter(result => result.status === 'written').length;
  logInfo(`Converted ${plan.runs.length} of ${inputs.length} files, wrote ${written} tables`);

  return plan.failures.length > 0 || written < results.length ? 1 : 0;
}
