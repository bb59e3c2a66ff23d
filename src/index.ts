#!/usr/bin/env node

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall } from './tools/index.js';
import { loadServerConfig, type ServerConfig } from './config.js';
import { runRenderCli } from './cli.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { logPrefix, routeConsoleToStderr } from './utils/stdioHygiene.js';

export function createServer(config: ServerConfig): Server {
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
    return { tools: getTools(config.toolMode) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(request.params.name, request.params.arguments ?? {}, config.toolMode, {
      renderDefaults: config.renderDefaults,
    });
  });

  return server;
}

export interface SimpleJsonRpcRequest {
  jsonrpc?: string;
  id?: string | number | null;
  method?: string;
  params?: Record<string, unknown>;
}

function simpleJsonRpcResult(
  id: string | number | null | undefined,
  result: unknown,
): Record<string, unknown> {
  return {
    jsonrpc: '2.0',
    id: id ?? null,
    result,
  };
}

function simpleJsonRpcError(
  id: string | number | null | undefined,
  code: number,
  message: string,
): Record<string, unknown> {
  return {
    jsonrpc: '2.0',
    id: id ?? null,
    error: { code, message },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function handleSimpleJsonRpcRequest(
  request: SimpleJsonRpcRequest,
  config: ServerConfig,
): Promise<Record<string, unknown>> {
  if (request.method === 'tools/list') {
    return simpleJsonRpcResult(request.id, { tools: getTools(config.toolMode) });
  }

  if (request.method === 'tools/call') {
    const params = request.params ?? {};
    const name = typeof params.name === 'string' ? params.name : '';
    const args = isPlainObject(params.arguments) ? params.arguments : {};
    if (name.length === 0) {
      return simpleJsonRpcError(request.id, -32602, 'Invalid params: tools/call requires name');
    }
    const response = await handleToolCall(name, args, config.toolMode, { renderDefaults: config.renderDefaults });
    return simpleJsonRpcResult(request.id, response);
  }

  return simpleJsonRpcError(request.id, -32601, `Method not found: ${request.method ?? '(missing)'}`);
}

function toSimpleRequest(parsed: Record<string, unknown>): SimpleJsonRpcRequest {
  const { jsonrpc, id, method, params } = parsed;
  return {
    jsonrpc: typeof jsonrpc === 'string' ? jsonrpc : undefined,
    id: typeof id === 'string' || typeof id === 'number' ? id : null,
    method: typeof method === 'string' ? method : undefined,
    params: isPlainObject(params) ? params : undefined,
  };
}

async function maybeServeSimpleJsonRpcOnce(config: ServerConfig): Promise<boolean> {
  if (process.stdin.isTTY) return false;

  const firstChunk = await new Promise<Buffer | null>((resolve) => {
    let settled = false;
    const onData = (chunk: string | Buffer): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    };
    const onEnd = (): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(null);
    };
    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(Buffer.alloc(0));
    }, 30);
    const cleanup = (): void => {
      clearTimeout(timer);
      process.stdin.off('data', onData);
      process.stdin.off('end', onEnd);
    };

    process.stdin.on('data', onData);
    process.stdin.on('end', onEnd);
    process.stdin.resume();
  });

  if (firstChunk === null || firstChunk.length === 0) {
    return false;
  }

  const firstText = firstChunk.toString('utf-8');
  if (!firstText.trimStart().startsWith('{')) {
    process.stdin.unshift(firstChunk);
    return false;
  }

  let payload = firstText;
  for await (const chunk of process.stdin) {
    payload += (typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8'));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.trim());
  } catch {
    const error = simpleJsonRpcError(null, -32700, 'Parse error');
    process.stdout.write(`${JSON.stringify(error)}\n`);
    return true;
  }
  if (!isPlainObject(parsed)) {
    const error = simpleJsonRpcError(null, -32600, 'Invalid Request');
    process.stdout.write(`${JSON.stringify(error)}\n`);
    return true;
  }

  const response = await handleSimpleJsonRpcRequest(toSimpleRequest(parsed), config);
  process.stdout.write(`${JSON.stringify(response)}\n`);
  return true;
}

async function main() {
  routeConsoleToStderr();

  let config: ServerConfig;
  try {
    config = loadServerConfig();
  } catch (err) {
    console.error(`${logPrefix()} Invalid configuration:`,
      err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
    return;
  }

  if (process.argv[2] === 'render') {
    runRenderCli(process.argv.slice(3), config.renderDefaults);
    return;
  }

  if (await maybeServeSimpleJsonRpcOnce(config)) {
    console.error(`${logPrefix()} Served one-shot simple JSON-RPC request`);
    return;
  }

  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${logPrefix()} Server started (${config.toolMode} tools)`);
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
    console.error(`${logPrefix()} Fatal:`, err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
