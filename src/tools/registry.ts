import { z } from 'zod';
import { zodToMcpInputSchema, type McpInputSchema } from './mcpSchema.js';
import { ConvertOptionsOverridesSchema, resolveConvertOptions, type ToolMode } from '../config.js';
import { decodeInput, planConversion, writeConversion } from '../convert/convert.js';
import { describeWarning } from '../dat/index.js';
import { DAT_CONVERT, DAT_INSPECT } from '../constants.js';

export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>, ctx: ToolHandlerContext): Promise<unknown>;
}

export function isToolExposed(spec: ToolSpec, mode: ToolMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec {
  return spec;
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const DatInspectSchema = z.object({
  path: z.string().min(1).describe('Absolute path of a .dat file'),
  scans: z.number().int().min(0).max(100).optional().default(5).describe('Number of leading scans to include'),
  recover: z.boolean().optional().default(false).describe('Skip damaged scan records in streamed and native files'),
});

const DatConvertSchema = z.object({
  paths: z.array(z.string().min(1)).min(1).describe('Absolute paths of .dat files, in combined-table order'),
  options: ConvertOptionsOverridesSchema.optional().describe('Output options; unset fields come from the environment'),
});

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: DAT_INSPECT,
    description: 'Decode one ICP-MS .dat file and report its header, masses, channel labels, scan count, data-quality warnings and leading scans. Read-only.',
    exposure: 'standard',
    zodSchema: DatInspectSchema,
    handler: async (params) => {
      const run = decodeInput(params.path, resolveConvertOptions({ recover: params.recover }));
      return {
        source: run.sourceIdentity,
        header: run.header,
        masses: run.masses,
        channels: run.channels,
        scan_count: run.scans.length,
        warnings: run.warnings.map(warning => ({ ...warning, message: describeWarning(warning) })),
        scans: run.scans.slice(0, params.scans),
      };
    },
  }),
  defineTool({
    name: DAT_CONVERT,
    description: 'Convert .dat files to CSV beside each input; with several inputs also writes <first>combined.csv aligning all runs on the union of their channels. Never replaces existing files unless options.overwrite is set (per-file tables only).',
    exposure: 'full',
    zodSchema: DatConvertSchema,
    handler: async (params) => {
      const options = resolveConvertOptions(params.options ?? {});
      const plan = planConversion(params.paths, options);
      const results = writeConversion(plan, options);
      return {
        outputs: results.map(result => ({
          kind: result.kind,
          path: result.outputPath,
          status: result.status,
          ...(result.error !== undefined ? { error: result.error } : {}),
        })),
        failures: plan.failures.map(failure => ({ path: failure.inputPath, ...failure.error.toJSON() })),
      };
    },
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: McpInputSchema;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
