import { z, toJSONSchema } from 'zod';

export interface McpInputSchema {
  type: 'object';
  [key: string]: unknown;
}

export function zodToMcpInputSchema(schema: z.ZodType): McpInputSchema {
  const { $schema: _schema, ['~standard']: _standard, ...rest } = toJSONSchema(schema, {
    target: 'draft-07',
    reused: 'inline',
    unrepresentable: 'any',
    io: 'input',
  });

  if (rest.type !== undefined && rest.type !== 'object') {
    throw new Error(`Invalid MCP inputSchema: expected top-level type "object", got ${JSON.stringify(rest.type)}`);
  }

  return { ...rest, type: 'object' };
}
