import type { ErrorKind, JsonValue, StepOutcome, ToolCall } from "../types/plan.js";
import type { ToolDescriptor, ToolProviderRegistry, ToolResult } from "../types/tools.js";
import type { Blackboard } from "../blackboard/index.js";
import { write } from "../blackboard/index.js";
import { EngineError, ToolTimeoutError, errorMessage } from "../errors.js";
import { MAX_TIMER_MS } from "../config.js";
import { resolveParameters } from "./resolve.js";
import { COLOR, fmtMs, preview, type RunLog } from "./log.js";

export interface StepContext {
  registry: ToolProviderRegistry;
  /** toolName → provider, built once per execution from `listTools()`. */
  toolIndex: Map<string, ToolDescriptor>;
  blackboard: Blackboard;
  toolTimeoutMs: number;
  log: RunLog;
}

export async function withTimeout<T>(
  p: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return await p;
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      p,
      new Promise<T>((_resolve, reject) => {
        timer = setTimeout(() => { reject(onTimeout()); }, Math.min(timeoutMs, MAX_TIMER_MS));
      })
    ]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}

/**
 * Run one call: resolve, invoke once, publish on success. Never rejects;
 * every failure is reported on the returned outcome.
 */
export async function executeStep(call: ToolCall, layer: number, ctx: StepContext): Promise<StepOutcome> {
  const start = Date.now();
  const base = { step: call.step, toolName: call.toolName, resultVariable: call.resultVariable, layer };
  const fail = (errorKind: ErrorKind, message: string, parameters?: Record<string, JsonValue>): StepOutcome => {
    ctx.log.step(
      `step ${call.step} ${call.toolName} failed (${errorKind}): ${message}`,
      `${COLOR.red("✗ fail")} step ${call.step} ${call.toolName} ${COLOR.gray(`${errorKind}: ${message}`)}`
    );
    return { ...base, status: "failed", success: false, errorKind, message, durationMs: Date.now() - start, parameters };
  };

  const tool = ctx.toolIndex.get(call.toolName);
  if (!tool) return fail("UnknownTool", `No provider exposes tool '${call.toolName}'`);

  let args: Record<string, JsonValue>;
  try {
    args = resolveParameters(call.parameters, ctx.blackboard);
  } catch (e) {
    return fail(e instanceof EngineError ? e.kind : "UnresolvedVariable", errorMessage(e));
  }

  ctx.log.tool(`tool ${tool.providerId}/${call.toolName}(${preview(args)})`);
  const controller = new AbortController();
  let result: ToolResult;
  try {
    result = await withTimeout(
      ctx.registry.invoke(tool.providerId, call.toolName, args, {
        timeoutMs: ctx.toolTimeoutMs,
        signal: controller.signal
      }),
      ctx.toolTimeoutMs,
      () => new ToolTimeoutError(call.toolName, ctx.toolTimeoutMs)
    );
  } catch (e) {
    if (e instanceof ToolTimeoutError) {
      controller.abort(e);
      return fail("Timeout", e.message, args);
    }
    return fail("ToolExecutionError", errorMessage(e), args);
  }

  if (!result.ok) return fail("ToolExecutionError", result.error ?? `Tool ${call.toolName} reported failure`, args);

  if (call.resultVariable && !ctx.blackboard.closed) {
    write(ctx.blackboard, call.resultVariable, result.output, call.step);
  }
  const durationMs = Date.now() - start;
  ctx.log.step(
    `step ${call.step} ${call.toolName} succeeded in ${fmtMs(durationMs)}: ${preview(result.output, 96)}`,
    `${COLOR.green("✓ done")} step ${call.step} ${call.toolName} ${COLOR.gray(`(${fmtMs(durationMs)}) → ${preview(result.output, 96)}`)}`
  );
  return { ...base, status: "succeeded", success: true, value: result.output, durationMs, parameters: args };
}
