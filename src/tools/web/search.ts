import { z } from "zod";
import type { ToolSpec } from "../../types/tools.js";
import { loadConfig } from "../../config.js";

interface SearchItem {
  url: string;
  title?: string;
  snippet?: string;
}

const text = z.string().optional().catch(undefined);
const rawItemSchema = z.object({ url: text, link: text, title: text, name: text, content: text, snippet: text });
const responseSchema = z.object({
  results: z.array(z.unknown()).optional(),
  data: z.array(z.unknown()).optional()
});

export function toSearchItems(data: unknown): SearchItem[] {
  const parsed = responseSchema.safeParse(data);
  if (!parsed.success) return [];
  const items: SearchItem[] = [];
  for (const r of parsed.data.results ?? parsed.data.data ?? []) {
    const item = rawItemSchema.safeParse(r);
    if (!item.success) continue;
    const o = item.data;
    const url = o.url || o.link;
    if (url) items.push({ url, title: o.title || o.name || undefined, snippet: o.content || o.snippet || undefined });
  }
  return items;
}

/**
 * Tavily web search adapter.
 * Env:
 *  - TAVILY_API_KEY (required)
 *  - TAVILY_BASE_URL (optional, default: https://api.tavily.com/search)
 */
export const searchWeb: ToolSpec = {
  name: "search_web",
  description: "Search the web and return result links with snippets",
  input_schema: {
    query: "string (search query)",
    max_results: "integer (max results, default 5)"
  },
  output_schema: {
    items: "array<{url:string,title?:string,snippet?:string}>"
  },
  async invoke(args, opts) {
    const query = String(args.query ?? "").trim();
    const k = Number(args.max_results ?? 5);
    const { TAVILY_API_KEY: apiKey, TAVILY_BASE_URL: baseUrl } = loadConfig();
    if (!query) return { name: this.name, ok: false, output: { items: [] }, error: "missing query" };
    if (!apiKey) return { name: this.name, ok: false, output: { items: [] }, error: "TAVILY_API_KEY not set" };

    const res = await fetch(baseUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ api_key: apiKey, query, max_results: k }),
      signal: opts?.signal
    });
    if (!res.ok) return { name: this.name, ok: false, output: { items: [] }, error: `HTTP ${res.status}` };
    const data: unknown = await res.json();
    return { name: this.name, ok: true, output: { items: toSearchItems(data) } };
  }
};
