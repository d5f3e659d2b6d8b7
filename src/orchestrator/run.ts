// src/orchestrator/run.ts
// Strategy coordinator: validates a plan, shapes it into concurrent groups
// (one per call for SEQUENTIAL, one for PARALLEL, dependency layers for HYBRID)
// and drives the step executor group by group. A group is a barrier: the next
// one starts only after every call in it is terminal.

import type { ExecutionPlan, ExecutionResult, StepNo, StepOutcome, ToolCall } from "../types/plan.js";
import type { ToolDescriptor, ToolProviderRegistry } from "../types/tools.js";
import { close, createBlackboard } from "../blackboard/index.js";
import { validatePlan } from "./verify.js";
import { buildDependencyMap, computeLayers, topoSort, type DependencyMap } from "./topo.js";
import { executeStep, type StepContext } from "./step.js";
import { aggregate } from "./aggregate.js";
import { canStartCall, elapsed, initBudget, timeLeft, type BudgetState } from "./budget.js";
import { Semaphore } from "./semaphore.js";
import { COLOR, fmtMs, RunLog } from "./log.js";
import { MAX_TIMER_MS } from "../config.js";
import { errorMessage } from "../errors.js";

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface RunOptions {
  registry: ToolProviderRegistry;
  toolTimeoutMs?: number;
  /** Deadline for the whole plan. Unstarted calls are cancelled; in-flight ones drain unobserved. */
  planTimeoutMs?: number;
  /** Cap on simultaneous calls within one group. */
  maxConcurrency?: number;
}

interface RunState {
  deps: DependencyMap;
  ctx: StepContext;
  budget: BudgetState;
  outcomes: Map<StepNo, StepOutcome>;
  completionOrder: StepNo[];
  halted: boolean;
}

export class PlanExecutor {
  constructor(private readonly opts: RunOptions) {}

  async execute(plan: ExecutionPlan): Promise<ExecutionResult> {
    validatePlan(plan);

    const deps = buildDependencyMap(plan);
    const order = topoSort(deps);
    const groups = shapeGroups(plan, deps, order);
    const log = new RunLog();
    const budget = initBudget({ plan_timeout_ms: this.opts.planTimeoutMs });

    log.step(
      `${plan.strategy} plan with ${plan.calls.length} call(s) in ${groups.length} group(s)`,
      `\n${COLOR.cyan("▶ plan")} ${plan.strategy} ${COLOR.gray(`— ${plan.calls.length} call(s), ${groups.length} group(s)`)}`
    );

    const state: RunState = {
      deps,
      budget,
      outcomes: new Map(),
      completionOrder: [],
      halted: false,
      ctx: {
        registry: this.opts.registry,
        toolIndex: await indexTools(this.opts.registry, log),
        blackboard: createBlackboard(),
        toolTimeoutMs: this.opts.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
        log
      }
    };

    const byStep = new Map(plan.calls.map(c => [c.step, c]));
    for (let gi = 0; gi < groups.length; gi++) {
      const calls = groups[gi].map(s => byStep.get(s)).filter((c): c is ToolCall => c !== undefined);
      if (groups.length > 1 && plan.strategy === "HYBRID") {
        log.step(`layer ${gi}: steps ${groups[gi].join(", ")}`, COLOR.magenta(`  layer ${gi} — steps ${groups[gi].join(", ")}`));
      }
      await this.runGroup(calls, gi, state);
    }
    close(state.ctx.blackboard);

    const outcomes = Array.from(state.outcomes.values()).sort((a, b) => a.step - b.step);
    const { overallSuccess, finalValue } = aggregate(plan, outcomes, order);
    const durationMs = elapsed(budget);
    const ok = outcomes.filter(o => o.success).length;
    log.step(
      `plan ${overallSuccess ? "completed" : "failed"}: ${ok}/${outcomes.length} succeeded in ${fmtMs(durationMs)}`,
      `${overallSuccess ? COLOR.green("✓ plan completed") : COLOR.red("✗ plan failed")} ${COLOR.gray(`${ok}/${outcomes.length} succeeded (${fmtMs(durationMs)})`)}`
    );

    return {
      strategy: plan.strategy,
      outcomes,
      completionOrder: [...state.completionOrder],
      overallSuccess,
      finalValue,
      durationMs,
      log: [...log.lines]
    };
  }

  private async runGroup(calls: ToolCall[], layer: number, state: RunState): Promise<void> {
    const runnable: ToolCall[] = [];
    for (const call of calls) {
      const failedDep = (state.deps.get(call.step) ?? []).find(d => state.outcomes.get(d)?.success !== true);
      if (state.halted || !canStartCall(state.budget)) {
        cancel(state, call, layer);
      } else if (failedDep !== undefined) {
        settle(state, {
          step: call.step,
          toolName: call.toolName,
          resultVariable: call.resultVariable,
          layer,
          status: "skipped",
          success: false,
          errorKind: "UpstreamFailure",
          message: `depends on step ${failedDep}, which did not succeed`,
          durationMs: 0
        });
        state.ctx.log.step(`step ${call.step} ${call.toolName} skipped: upstream step ${failedDep} did not succeed`);
      } else {
        runnable.push(call);
      }
    }
    if (runnable.length === 0) return;

    const startedAt = new Map<StepNo, number>();
    const sem = this.opts.maxConcurrency ? new Semaphore(this.opts.maxConcurrency) : undefined;
    const launch = async (call: ToolCall): Promise<void> => {
      // Queued behind the semaphore past the deadline: never start.
      if (state.halted) return;
      startedAt.set(call.step, Date.now());
      const outcome = await executeStep(call, layer, state.ctx);
      if (!state.outcomes.has(call.step)) settle(state, outcome);
    };
    const all = Promise.all(runnable.map(c => (sem ? sem.run(() => launch(c)) : launch(c))));

    if (state.budget.deadline === undefined) {
      await all;
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<"deadline">((resolve) => {
      timer = setTimeout(() => resolve("deadline"), Math.min(timeLeft(state.budget), MAX_TIMER_MS));
    });
    try {
      const winner = await Promise.race([all.then(() => "done" as const), deadline]);
      if (winner === "deadline") {
        state.halted = true;
        close(state.ctx.blackboard);
        for (const call of runnable) {
          if (state.outcomes.has(call.step)) continue;
          const t0 = startedAt.get(call.step);
          if (t0 !== undefined) {
            settle(state, {
              step: call.step,
              toolName: call.toolName,
              resultVariable: call.resultVariable,
              layer,
              status: "failed",
              success: false,
              errorKind: "Timeout",
              message: "plan deadline passed while the call was in flight",
              durationMs: Date.now() - t0
            });
          } else {
            cancel(state, call, layer);
          }
        }
        state.ctx.log.step("plan deadline passed; pending calls cancelled", COLOR.red("  plan deadline passed"));
      }
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }
}

export function runPlan(plan: ExecutionPlan, opts: RunOptions): Promise<ExecutionResult> {
  return new PlanExecutor(opts).execute(plan);
}

export function shapeGroups(plan: ExecutionPlan, deps: DependencyMap, order: StepNo[]): StepNo[][] {
  switch (plan.strategy) {
    case "SINGLE":
    case "SEQUENTIAL":
      return order.map(s => [s]);
    case "PARALLEL":
      return [plan.calls.map(c => c.step).sort((a, b) => a - b)];
    case "HYBRID":
      return computeLayers(deps);
  }
}

async function indexTools(registry: ToolProviderRegistry, log: RunLog): Promise<Map<string, ToolDescriptor>> {
  const index = new Map<string, ToolDescriptor>();
  let tools: ToolDescriptor[];
  try {
    tools = await registry.listTools();
  } catch (e) {
    log.step(`tool listing failed: ${errorMessage(e)}`, COLOR.red(`  tool listing failed: ${errorMessage(e)}`));
    return index;
  }
  for (const t of tools) {
    if (!index.has(t.toolName)) index.set(t.toolName, t);
  }
  return index;
}

function settle(state: RunState, outcome: StepOutcome) {
  state.outcomes.set(outcome.step, outcome);
  state.completionOrder.push(outcome.step);
}

function cancel(state: RunState, call: ToolCall, layer: number) {
  settle(state, {
    step: call.step,
    toolName: call.toolName,
    resultVariable: call.resultVariable,
    layer,
    status: "cancelled",
    success: false,
    errorKind: "Cancelled",
    message: "plan deadline passed before the call started",
    durationMs: 0
  });
  state.ctx.log.step(`step ${call.step} ${call.toolName} cancelled: plan deadline passed`);
}
