import { ZodError } from 'zod';
import type { ToolMode } from '../config.js';
import { DatError, invalidParams } from '../shared/index.js';
import { getToolSpec, isToolExposed } from './registry.js';

export type ToolCallResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function parseToolArgs<T>(toolName: string, schema: { parse: (input: unknown) => T }, args: unknown): T {
  try {
    return schema.parse(args);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidParams(`Invalid parameters for ${toolName}`, {
        issues: err.issues,
      });
    }
    throw err;
  }
}

function formatToolError(err: unknown): ToolCallResult {
  const payload = (() => {
    if (err instanceof DatError) {
      return {
        error: {
          code: err.code,
          message: err.message,
          ...(err.data && Object.keys(err.data).length > 0 ? { data: err.data } : {}),
        },
      };
    }

    const message = err instanceof Error ? err.message : String(err);
    return {
      error: {
        code: 'INTERNAL_ERROR',
        message,
      },
    };
  })();

  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  mode: ToolMode = 'standard',
): Promise<ToolCallResult> {
  try {
    const spec = getToolSpec(name);
    if (!spec) {
      throw invalidParams(`Unknown tool: ${name}`);
    }
    if (!isToolExposed(spec, mode)) {
      throw invalidParams(`Tool not exposed in ${mode} mode: ${name}`);
    }

    const parsedArgs = parseToolArgs(name, spec.zodSchema, args);
    const result = await spec.handler(parsedArgs, {});
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    return formatToolError(err);
  }
}
