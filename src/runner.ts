#!/usr/bin/env node
// src/runner.ts
// Plan runner:
// - Plan unwrap (plain or wrapped {plan|execution_plan|decision})
// - Providers from an MCP server config (--servers, default MCP_SERVERS_FILE) and/or
//   the in-process tools (--local)
// - Per-call and whole-plan timeouts from env, overridable with --timeout / --plan-timeout
// Exit code: 0 all calls succeeded, 1 some call failed, 2 usage or invalid plan.
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { compilePlan } from './orchestrator/compiler.js';
import { PlanExecutor } from './orchestrator/run.js';
import { COLOR, fmtMs, preview } from './orchestrator/log.js';
import { buildToolRegistry, CompositeToolRegistry } from './tools/registry.js';
import { loadServerConfig, McpToolRegistry } from './tools/mcp.js';
import { loadConfig, MAX_TIMER_MS } from './config.js';
import { InvalidPlanError, errorMessage } from './errors.js';
import type { ExecutionResult } from './types/plan.js';
import type { ToolProviderRegistry } from './types/tools.js';

export interface RunnerArgs {
  planPath?: string;
  serversPath?: string;
  local: boolean;
  timeoutMs?: number;
  planTimeoutMs?: number;
  maxConcurrency?: number;
  json: boolean;
}

export function parseArgs(argv: string[]): RunnerArgs {
  const out: RunnerArgs = { local: false, json: false };
  const num = (v: string | undefined, flag: string, max = Number.MAX_SAFE_INTEGER) => {
    const n = Number(v);
    if (!Number.isInteger(n) || n <= 0 || n > max) throw new Error(`${flag} expects a positive integer up to ${max}, got '${v}'`);
    return n;
  };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const eq = a.indexOf('=');
    const flag = eq > 0 ? a.slice(0, eq) : a;
    const value = () => (eq > 0 ? a.slice(eq + 1) : argv[++i]);
    if (flag === '--plan') out.planPath = value();
    else if (flag === '--servers') out.serversPath = value();
    else if (flag === '--local') out.local = true;
    else if (flag === '--json') out.json = true;
    else if (flag === '--timeout') out.timeoutMs = num(value(), flag, MAX_TIMER_MS);
    else if (flag === '--plan-timeout') out.planTimeoutMs = num(value(), flag, MAX_TIMER_MS);
    else if (flag === '--max-concurrency') out.maxConcurrency = num(value(), flag);
    else throw new Error(`Unknown argument '${a}'`);
  }
  return out;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Accept a bare plan or one wrapped by the planner under a single key. */
export function unwrapPlan(candidate: unknown): { plan: unknown; unwrappedFrom?: string } {
  if (!isObject(candidate)) throw new Error('Provided JSON is not an object.');
  if ('strategy' in candidate) return { plan: candidate };
  for (const key of ['plan', 'execution_plan', 'decision']) {
    const inner = candidate[key];
    if (isObject(inner) && 'strategy' in inner) return { plan: inner, unwrappedFrom: key };
  }
  for (const [k, v] of Object.entries(candidate)) {
    if (isObject(v) && 'strategy' in v) return { plan: v, unwrappedFrom: k };
  }
  throw new Error('No plan found: expected {strategy, calls|tool_calls} or a wrapper that contains it.');
}

export function printResult(result: ExecutionResult) {
  console.log('\n[Outcomes]');
  for (const o of result.outcomes) {
    const mark = o.success ? COLOR.green('✓') : o.status === 'skipped' ? COLOR.gray('↷') : COLOR.red('✗');
    const detail = o.success ? preview(o.value, 120) : `${o.errorKind}: ${o.message ?? ''}`;
    console.log(`${mark} step ${o.step} ${o.toolName} ${COLOR.gray(`[${o.status}, ${fmtMs(o.durationMs)}]`)} ${detail}`);
  }
  console.log(`\n[Final value] ${result.overallSuccess ? COLOR.green('ok') : COLOR.red('incomplete')}`);
  console.log(JSON.stringify(result.finalValue ?? null, null, 2));
}

export async function runPlanFile(args: RunnerArgs): Promise<ExecutionResult> {
  if (!args.planPath) throw new Error('--plan is required');
  const cfg = loadConfig();
  const { plan: raw, unwrappedFrom } = unwrapPlan(JSON.parse(fs.readFileSync(args.planPath, 'utf8')));
  if (unwrappedFrom) console.log(`[Runner] Unwrapped plan from field '${unwrappedFrom}'.`);
  const plan = compilePlan(raw);

  const registries: ToolProviderRegistry[] = [];
  let mcp: McpToolRegistry | undefined;
  const serversPath = args.serversPath ?? cfg.MCP_SERVERS_FILE;
  if (args.serversPath || fs.existsSync(serversPath)) {
    mcp = await McpToolRegistry.connect(loadServerConfig(serversPath));
    console.log(`[Runner] Connected MCP providers: ${mcp.providers().join(', ') || '(none)'}`);
    registries.push(mcp);
  }
  if (args.local) registries.push(buildToolRegistry());
  if (registries.length === 0) {
    throw new Error(`No tool providers: ${serversPath} not found and --local not given.`);
  }

  try {
    const executor = new PlanExecutor({
      registry: registries.length === 1 ? registries[0] : new CompositeToolRegistry(registries),
      toolTimeoutMs: args.timeoutMs ?? cfg.TOOL_TIMEOUT_MS,
      planTimeoutMs: args.planTimeoutMs ?? cfg.PLAN_TIMEOUT_MS,
      maxConcurrency: args.maxConcurrency ?? cfg.MAX_CONCURRENCY
    });
    return await executor.execute(plan);
  } finally {
    await mcp?.close();
  }
}

if (process.argv[1] && (import.meta.url === pathToFileURL(process.argv[1]).href || path.basename(process.argv[1]) === 'planflow')) {
  (async () => {
    let args: RunnerArgs;
    try {
      args = parseArgs(process.argv);
    } catch (e) {
      console.error(errorMessage(e));
      args = { local: false, json: false };
    }
    if (!args.planPath) {
      console.error('Usage: planflow --plan path/to/plan.json [--servers mcp.servers.json] [--local] [--timeout ms] [--plan-timeout ms] [--max-concurrency n] [--json]');
      process.exit(2);
    }
    try {
      const result = await runPlanFile(args);
      if (args.json) console.log(JSON.stringify(result, null, 2));
      else printResult(result);
      process.exit(result.overallSuccess ? 0 : 1);
    } catch (e) {
      if (e instanceof InvalidPlanError) {
        console.error(COLOR.red('[invalid plan]'));
        for (const issue of e.issues) console.error(`  - ${issue}`);
        process.exit(2);
      }
      throw e;
    }
  })().catch(e => { console.error('[fatal]', e); process.exit(1); });
}
