import { loadLogFlags, type LogFlags } from "../config.js";

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

// Read on first use, not at import.
let flags: LogFlags | undefined;
const logFlags = () => (flags ??= loadLogFlags());

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function preview(v: unknown, max = 140): string {
  let s: string;
  try { s = typeof v === "string" ? v : JSON.stringify(v); } catch { s = String(v); }
  if (s === undefined) s = String(v);
  return s.length > max ? s.slice(0, max) + "…" : s;
}

/**
 * Collects the plain-text execution log kept on the result and mirrors it to the
 * console when step logging is on.
 */
export class RunLog {
  readonly lines: string[] = [];

  step(line: string, colored?: string) {
    this.lines.push(line);
    if (logFlags().steps) console.log(colored ?? line);
  }

  tool(line: string) {
    if (logFlags().tools) console.log(COLOR.yellow(`    ↳ ${line}`));
  }
}
