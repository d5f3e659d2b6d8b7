import type { ExecutionPlan, StepNo, StepOutcome } from "../types/plan.js";

export interface Aggregate {
  overallSuccess: boolean;
  finalValue?: unknown;
}

/**
 * SINGLE and SEQUENTIAL yield the terminal value, and only when every call succeeded.
 * PARALLEL and HYBRID yield every outcome under a label, failures included.
 */
export function aggregate(plan: ExecutionPlan, outcomes: StepOutcome[], order: StepNo[]): Aggregate {
  const overallSuccess = outcomes.length > 0 && outcomes.every(o => o.success);
  const byStep = new Map(outcomes.map(o => [o.step, o]));

  if (plan.strategy === "SINGLE" || plan.strategy === "SEQUENTIAL") {
    if (!overallSuccess) return { overallSuccess };
    const last = order.length ? byStep.get(order[order.length - 1]) : undefined;
    return { overallSuccess, finalValue: last?.value };
  }

  return { overallSuccess, finalValue: labelOutcomes(outcomes) };
}

export function labelOutcomes(outcomes: StepOutcome[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const o of [...outcomes].sort((a, b) => a.step - b.step)) {
    let label = o.resultVariable ?? o.toolName;
    if (Object.hasOwn(out, label)) label = `step_${o.step}_${o.toolName}`;
    out[label] = o.success ? o.value : { error: o.errorKind, message: o.message };
  }
  return out;
}
