export interface ToolResult {
  name: string;
  output: unknown;
  ok: boolean;
  error?: string;
}

export interface ToolDescriptor {
  toolName: string;
  providerId: string;
  description: string;
}

export interface InvokeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** In-process tool. `invoke` may resolve `{ ok: false }` or throw; both count as a tool failure. */
export interface ToolSpec {
  name: string;
  description: string;
  input_schema: Record<string, string>;
  output_schema: Record<string, string>;
  invoke(args: Record<string, unknown>, opts?: InvokeOptions): Promise<ToolResult>;
}

export interface ToolProviderRegistry {
  listTools(): Promise<ToolDescriptor[]>;
  invoke(
    providerId: string,
    toolName: string,
    args: Record<string, unknown>,
    opts: InvokeOptions
  ): Promise<ToolResult>;
}
