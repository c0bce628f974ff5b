#!/usr/bin/env node

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { resolveLogLevel, resolveToolMode } from './config.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { runConvertCli } from './convert/cli.js';
import { logError, logInfo, setLogLevel } from './shared/index.js';
import { getTools, handleToolCall } from './tools/index.js';
import { routeConsoleToStderr } from './utils/stdioHygiene.js';

async function serve(): Promise<void> {
  routeConsoleToStderr();
  const mode = resolveToolMode();

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getTools(mode) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(request.params.name, request.params.arguments ?? {}, mode);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`Server started (${mode} tools)`);
}

async function main(): Promise<void> {
  setLogLevel(resolveLogLevel());

  const command = process.argv[2];
  if (command === 'convert') {
    process.exitCode = await runConvertCli(process.argv.slice(3));
    return;
  }
  if (command === '--version' || command === '-v') {
    console.error(`${SERVER_NAME} ${SERVER_VERSION}`);
    return;
  }
  if (command !== undefined && command !== 'serve') {
    throw new Error(`Unknown command: ${command}\nUsage: icp-dat [serve] | icp-dat convert [options] <path...>`);
  }

  await serve();
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    logError('Fatal:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
