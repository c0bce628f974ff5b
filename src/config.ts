import { z } from 'zod';
import type { LogLevel } from './shared/index.js';

export const DELIMITER_ENV = 'ICP_DAT_DELIMITER';
export const MISSING_ENV = 'ICP_DAT_MISSING';
export const LOG_LEVEL_ENV = 'ICP_DAT_LOG_LEVEL';
export const TOOL_MODE_ENV = 'ICP_DAT_TOOL_MODE';

export const OUTPUT_SUFFIX = '.csv';
export const COMBINED_TAG = 'combined';

export const LogLevelSchema = z.enum(['quiet', 'info', 'debug']);
export const ToolModeSchema = z.enum(['standard', 'full']);
export type ToolMode = z.infer<typeof ToolModeSchema>;

/** Text a CSV reader takes for a number, including NaN, Infinity and a flagged reading's trailing `*`. */
const NUMERIC_TEXT = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?|inf(?:inity)?|nan)\*?$/i;

const ConvertOptionFields = {
  delimiter: z.string().length(1).describe('Single-character field delimiter'),
  missing: z.string().describe('Text written where a run never measured a column'),
  scanColumns: z.boolean().describe('Add Scan, Time and ACF (and FCF with Faraday readings) columns to per-file tables'),
  comments: z.boolean().describe('Add a provenance comment line per run'),
  overwrite: z.boolean().describe('Reuse <name>.csv for per-file output even if it exists'),
  order: z.enum(['input', 'acquired']).describe('Combined row order: as given, or by acquisition time'),
  recover: z.boolean().describe('Skip damaged scan records in streamed and native files'),
};

/** Every field optional; what callers and tools pass in. */
export const ConvertOptionsOverridesSchema = z.object(ConvertOptionFields).partial();

export const ConvertOptionsSchema = z.object(ConvertOptionFields).refine(
  v => !/["\r\n]/.test(v.delimiter),
  { message: 'Delimiter cannot be a quote or line break', path: ['delimiter'] }
).refine(
  v => !v.missing.includes(v.delimiter) && !/["\r\n]/.test(v.missing),
  { message: 'Missing marker cannot contain the delimiter, a quote or a line break', path: ['missing'] }
).refine(
  v => !NUMERIC_TEXT.test(v.missing.trim()),
  { message: 'Missing marker must not read as a number', path: ['missing'] }
);

export type ConvertOptions = z.output<typeof ConvertOptionsSchema>;
export type ConvertOptionsInput = z.input<typeof ConvertOptionsOverridesSchema>;

export const DEFAULT_CONVERT_OPTIONS: ConvertOptions = {
  delimiter: ',',
  missing: '',
  scanColumns: false,
  comments: false,
  overwrite: false,
  order: 'input',
  recover: false,
};

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.length === 0 ? undefined : raw;
}

/**
 * Defaults, then the environment, then explicit overrides. Throws ZodError
 * when the merged options are invalid.
 */
export function resolveConvertOptions(
  overrides: ConvertOptionsInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ConvertOptions {
  const fromEnv: ConvertOptionsInput = {};
  const delimiter = envValue(env, DELIMITER_ENV);
  if (delimiter !== undefined) fromEnv.delimiter = delimiter === '\\t' ? '\t' : delimiter;
  const missing = env[MISSING_ENV];
  if (missing !== undefined) fromEnv.missing = missing;

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return ConvertOptionsSchema.parse({ ...DEFAULT_CONVERT_OPTIONS, ...fromEnv, ...defined });
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = LogLevelSchema.safeParse(envValue(env, LOG_LEVEL_ENV)?.toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

export function resolveToolMode(env: NodeJS.ProcessEnv = process.env): ToolMode {
  const parsed = ToolModeSchema.safeParse(envValue(env, TOOL_MODE_ENV)?.toLowerCase());
  return parsed.success ? parsed.data : 'standard';
}
