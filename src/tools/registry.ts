import type { InvokeOptions, ToolDescriptor, ToolProviderRegistry, ToolResult, ToolSpec } from "../types/tools.js";
import { calculatorTools } from "./math/calculator.js";
import { searchWeb } from "./web/search.js";
import { fetchWebpage } from "./web/fetch.js";
import { errorMessage } from "../errors.js";
import { COLOR } from "../orchestrator/log.js";

/** Registry backed by in-process ToolSpecs, all under one provider id. */
export class LocalToolRegistry implements ToolProviderRegistry {
  private readonly tools = new Map<string, ToolSpec>();

  constructor(readonly providerId: string, tools: ToolSpec[] = []) {
    for (const t of tools) this.register(t);
  }

  register(tool: ToolSpec): this {
    if (this.tools.has(tool.name)) throw new Error(`Tool ${tool.name} is already registered with ${this.providerId}`);
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  async listTools(): Promise<ToolDescriptor[]> {
    return Array.from(this.tools.values()).map(t => ({
      toolName: t.name,
      providerId: this.providerId,
      description: t.description
    }));
  }

  async invoke(providerId: string, toolName: string, args: Record<string, unknown>, opts: InvokeOptions): Promise<ToolResult> {
    if (providerId !== this.providerId) throw new Error(`Unknown provider '${providerId}'`);
    const spec = this.tools.get(toolName);
    if (!spec) throw new Error(`Tool '${toolName}' not found on ${providerId}`);
    return spec.invoke(args, opts);
  }
}

/** Merges registries. Listing order decides which provider serves a tool name exposed twice. */
export class CompositeToolRegistry implements ToolProviderRegistry {
  private readonly byProvider = new Map<string, ToolProviderRegistry>();

  constructor(private readonly registries: ToolProviderRegistry[]) {}

  async listTools(): Promise<ToolDescriptor[]> {
    this.byProvider.clear();
    const out: ToolDescriptor[] = [];
    for (const reg of this.registries) {
      let tools: ToolDescriptor[];
      try {
        tools = await reg.listTools();
      } catch (e) {
        console.error(COLOR.red(`[registry] skipping a provider whose tools could not be listed: ${errorMessage(e)}`));
        continue;
      }
      for (const t of tools) {
        if (!this.byProvider.has(t.providerId)) this.byProvider.set(t.providerId, reg);
        out.push(t);
      }
    }
    return out;
  }

  async invoke(providerId: string, toolName: string, args: Record<string, unknown>, opts: InvokeOptions): Promise<ToolResult> {
    if (!this.byProvider.size) await this.listTools();
    const reg = this.byProvider.get(providerId);
    if (!reg) throw new Error(`Unknown provider '${providerId}'`);
    return reg.invoke(providerId, toolName, args, opts);
  }
}

export function buildToolRegistry(): LocalToolRegistry {
  return new LocalToolRegistry("local", [...calculatorTools, searchWeb, fetchWebpage]);
}

export function buildCalculatorRegistry(providerId = "calculator"): LocalToolRegistry {
  return new LocalToolRegistry(providerId, calculatorTools);
}
