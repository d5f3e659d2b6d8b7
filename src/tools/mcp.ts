import { readFileSync } from "node:fs";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema, ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { InvokeOptions, ToolDescriptor, ToolProviderRegistry, ToolResult } from "../types/tools.js";
import { ToolTimeoutError, errorMessage } from "../errors.js";
import { MAX_TIMER_MS } from "../config.js";
import { COLOR } from "../orchestrator/log.js";

const httpServerSchema = z.object({
  transport: z.enum(["streamable-http", "sse"]).optional().default("streamable-http"),
  url: z.string().url(),
  description: z.string().optional(),
});

const stdioServerSchema = z.object({
  transport: z.literal("stdio"),
  command: z.string().min(1),
  args: z.array(z.string()).optional().default([]),
  env: z.record(z.string()).optional(),
  description: z.string().optional(),
});

export const serverConfigSchema = z.object({
  mcpServers: z.record(z.union([httpServerSchema, stdioServerSchema])),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ServerEntry = ServerConfig["mcpServers"][string];

export function loadServerConfig(path: string): ServerConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new Error(`Failed to read MCP server config '${path}': ${errorMessage(e)}`);
  }
  const parsed = serverConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid MCP server config '${path}': ${issues}`);
  }
  return parsed.data;
}

export function createTransport(entry: ServerEntry): Transport {
  switch (entry.transport) {
    case "stdio":
      return new StdioClientTransport({ command: entry.command, args: entry.args, env: entry.env });
    case "sse":
      return new SSEClientTransport(new URL(entry.url));
    case "streamable-http":
      return new StreamableHTTPClientTransport(new URL(entry.url));
  }
}

/**
 * Turn an MCP tool result into a plain value. Structured content wins over text;
 * a lone `{ result: x }` is unwrapped to `x`; text that parses as JSON is parsed.
 */
export function normalizeToolResult(name: string, raw: unknown): ToolResult {
  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) return { name, ok: false, output: null, error: "malformed tool result" };
  const result = parsed.data;
  const texts = result.content.flatMap((c) => (c.type === "text" ? [c.text] : []));

  if (result.isError) {
    return { name, ok: false, output: null, error: texts.join("\n") || `Tool ${name} reported an error` };
  }
  if (result.structuredContent) {
    return { name, ok: true, output: unwrapResult(result.structuredContent) };
  }
  if (texts.length === 0) return { name, ok: true, output: result.content };
  const values = texts.map(parseText);
  return { name, ok: true, output: values.length === 1 ? values[0] : values };
}

function parseText(text: string): unknown {
  try {
    return unwrapResult(JSON.parse(text));
  } catch {
    return text;
  }
}

function unwrapResult(v: unknown): unknown {
  if (v && typeof v === "object" && !Array.isArray(v)) {
    const entries = Object.entries(v);
    if (entries.length === 1 && entries[0][0] === "result") return entries[0][1];
  }
  return v;
}

/** Registry over connected MCP clients, one provider id per server. */
export class McpToolRegistry implements ToolProviderRegistry {
  constructor(private readonly clients: Map<string, Client>) {}

  /** Connect every configured server. A server that fails to connect is reported and left out. */
  static async connect(config: ServerConfig, clientName = "planflow"): Promise<McpToolRegistry> {
    const clients = new Map<string, Client>();
    for (const [id, entry] of Object.entries(config.mcpServers)) {
      const client = new Client({ name: clientName, version: "0.1.0" });
      try {
        await client.connect(createTransport(entry));
        clients.set(id, client);
      } catch (e) {
        console.error(COLOR.red(`[mcp] could not connect to '${id}': ${errorMessage(e)}`));
      }
    }
    return new McpToolRegistry(clients);
  }

  providers(): string[] {
    return Array.from(this.clients.keys());
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const out: ToolDescriptor[] = [];
    for (const [providerId, client] of this.clients) {
      const tools: ToolDescriptor[] = [];
      let cursor: string | undefined;
      try {
        do {
          const page = await client.listTools(cursor ? { cursor } : undefined);
          for (const t of page.tools) tools.push({ toolName: t.name, providerId, description: t.description ?? "" });
          cursor = page.nextCursor;
        } while (cursor);
      } catch (e) {
        console.error(COLOR.red(`[mcp] could not list tools of '${providerId}': ${errorMessage(e)}`));
        continue;
      }
      out.push(...tools);
    }
    return out;
  }

  async invoke(providerId: string, toolName: string, args: Record<string, unknown>, opts: InvokeOptions): Promise<ToolResult> {
    const client = this.clients.get(providerId);
    if (!client) throw new Error(`Unknown provider '${providerId}'`);
    let raw: unknown;
    try {
      raw = await client.callTool({ name: toolName, arguments: args }, undefined, {
        timeout: Math.min(opts.timeoutMs, MAX_TIMER_MS),
        signal: opts.signal,
      });
    } catch (e) {
      if (e instanceof McpError && e.code === ErrorCode.RequestTimeout) throw new ToolTimeoutError(toolName, opts.timeoutMs);
      throw e;
    }
    return normalizeToolResult(toolName, raw);
  }

  async close(): Promise<void> {
    const closing = Array.from(this.clients.entries()).map(async ([id, client]) => {
      try {
        await client.close();
      } catch (e) {
        console.error(COLOR.gray(`[mcp] error closing '${id}': ${errorMessage(e)}`));
      }
    });
    await Promise.all(closing);
    this.clients.clear();
  }
}
