import type { ToolSpec } from "../../types/tools.js";

const MAX_BODY_CHARS = 20_000;

export const fetchWebpage: ToolSpec = {
  name: "fetch_webpage",
  description: "Fetch a URL and return its status, headers and (truncated) body",
  input_schema: {
    url: "string (absolute URL)",
    method: "string (GET,POST,...)",
    headers: "object (optional)",
    body: "string or object (optional)"
  },
  output_schema: {
    status: "number",
    headers: "object",
    body: "string"
  },
  async invoke(args, opts) {
    const url = String(args.url ?? "");
    const method = String(args.method ?? "GET").toUpperCase();
    const headers: Record<string, string> = {};
    if (args.headers && typeof args.headers === "object") {
      for (const [k, v] of Object.entries(args.headers)) headers[k] = String(v);
    }
    const body = typeof args.body === "string" ? args.body : (args.body ? JSON.stringify(args.body) : undefined);
    if (!/^https?:\/\//i.test(url)) return { name: this.name, ok: false, output: {}, error: "url must be an absolute http(s) URL" };

    const res = await fetch(url, { method, headers, body, signal: opts?.signal });
    const text = await res.text();
    const hdrs: Record<string, string> = {};
    res.headers.forEach((v, k) => { hdrs[k] = v; });
    return {
      name: this.name,
      ok: res.ok,
      output: { status: res.status, headers: hdrs, body: text.slice(0, MAX_BODY_CHARS) },
      error: res.ok ? undefined : `HTTP ${res.status}`
    };
  }
};
