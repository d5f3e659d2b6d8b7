import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

// Idempotent; values already in process.env win.
dotenvConfig();

const flag = (fallback: "0" | "1") =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === "" ? fallback : v))
    .transform((v) => v === "1" || v.toLowerCase() === "true");

/** Largest delay `setTimeout` honours; Node fires anything above it after 1ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

const optionalPositiveInt = (max = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === "" ? undefined : Number(v)))
    .pipe(z.number().int().positive().max(max).optional());

const logFlagShape = {
  QUIET: flag("0"),
  LOG_STEPS: flag("1"),
  LOG_TOOLS: flag("0"),
};
const logFlagSchema = z.object(logFlagShape);

const configSchema = z.object({
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).optional().default(30_000),
  PLAN_TIMEOUT_MS: optionalPositiveInt(MAX_TIMER_MS),
  MAX_CONCURRENCY: optionalPositiveInt(),
  MCP_SERVERS_FILE: z.string().optional().default("mcp.servers.json"),
  TAVILY_API_KEY: z.string().optional().default(""),
  TAVILY_BASE_URL: z.string().url().optional().default("https://api.tavily.com/search"),
  ...logFlagShape,
});

export type EngineConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return configSchema.parse(env);
}

export interface LogFlags {
  steps: boolean;
  tools: boolean;
}

/** Console gating flags, parsed apart from the rest of the config. */
export function loadLogFlags(env: NodeJS.ProcessEnv = process.env): LogFlags {
  const { QUIET, LOG_STEPS, LOG_TOOLS } = logFlagSchema.parse({
    QUIET: env.QUIET,
    LOG_STEPS: env.LOG_STEPS,
    LOG_TOOLS: env.LOG_TOOLS,
  });
  return { steps: !QUIET && LOG_STEPS, tools: !QUIET && LOG_TOOLS };
}
