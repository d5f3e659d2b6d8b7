#!/usr/bin/env node
/**
 * Calculator MCP server
 * Serves the in-process calculator tools over MCP (stdio), so plans can be run
 * against a real provider:
 *
 *   { "mcpServers": { "calculator": { "transport": "stdio", "command": "node", "args": ["dist/servers/calculator.js"] } } }
 */

import { pathToFileURL } from 'node:url';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolSpec } from '../types/tools.js';
import { calculatorTools } from '../tools/math/calculator.js';

type JsonSchema = Record<string, unknown>;

/** "integer[]" → array of integers; "number (radians)" → number with a description. */
export function toInputSchema(input_schema: Record<string, string>): Tool['inputSchema'] {
  const properties: Record<string, JsonSchema> = {};
  for (const [name, doc] of Object.entries(input_schema)) {
    const m = /^(\w+)(\[\])?/.exec(doc);
    const base = m?.[1] ?? 'string';
    const type = ['number', 'integer', 'string', 'boolean', 'object'].includes(base) ? base : 'string';
    properties[name] = m?.[2]
      ? { type: 'array', items: { type }, description: doc }
      : { type, description: doc };
  }
  return { type: 'object', properties, required: Object.keys(input_schema) };
}

export function createCalculatorServer(tools: ToolSpec[] = calculatorTools): Server {
  const server = new Server(
    { name: 'calculator', version: '0.1.0' },
    { capabilities: { tools: {} } }
  );
  const byName = new Map(tools.map((t) => [t.name, t]));

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: toInputSchema(t.input_schema),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    const spec = byName.get(name);
    if (!spec) {
      return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true };
    }
    const result = await spec.invoke(args);
    if (!result.ok) {
      return { content: [{ type: 'text', text: result.error ?? `${name} failed` }], isError: true };
    }
    return { content: [{ type: 'text', text: JSON.stringify({ result: result.output }) }] };
  });

  return server;
}

async function main() {
  const server = createCalculatorServer();
  await server.connect(new StdioServerTransport());
  console.error('Calculator MCP server running on stdio');
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((e) => {
    console.error('[fatal]', e);
    process.exit(1);
  });
}
