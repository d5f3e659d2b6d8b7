import type { ExecutionPlan } from "../types/plan.js";
import { InvalidPlanError } from "../errors.js";
import { buildDependencyMap, explicitDependencies, findCycle } from "./topo.js";
import { referencedVariables } from "./resolve.js";

export interface Verdict {
  pass: boolean;
  issues: string[];
}

/** Structural checks done once before any tool runs. Collects every violation. */
export function verifyPlan(plan: ExecutionPlan): Verdict {
  const issues: string[] = [];
  const { calls } = plan;

  if (calls.length === 0) issues.push("plan has no calls");

  const steps = new Set<number>();
  for (const c of calls) {
    if (!Number.isInteger(c.step) || c.step < 1) issues.push(`step ${c.step} is not a positive integer`);
    if (steps.has(c.step)) issues.push(`duplicate step ${c.step}`);
    steps.add(c.step);
    if (!c.toolName.trim()) issues.push(`step ${c.step} has an empty tool name`);
  }

  const producers = new Map<string, number>();
  for (const c of calls) {
    if (c.resultVariable === undefined) continue;
    const prev = producers.get(c.resultVariable);
    if (prev !== undefined) {
      issues.push(`result variable '${c.resultVariable}' declared by steps ${prev} and ${c.step}`);
    } else {
      producers.set(c.resultVariable, c.step);
    }
  }

  for (const c of calls) {
    for (const d of explicitDependencies(c)) {
      if (d === c.step) issues.push(`step ${c.step} depends on itself`);
      else if (!steps.has(d)) issues.push(`step ${c.step} depends on missing step ${d}`);
    }
    for (const name of referencedVariables(c.parameters)) {
      const p = producers.get(name);
      if (p === undefined) issues.push(`step ${c.step} references unknown variable '${name}'`);
      else if (p === c.step) issues.push(`step ${c.step} references its own result '${name}'`);
    }
  }

  // Edges only make sense once steps are unique.
  if (issues.length === 0) {
    const deps = buildDependencyMap(plan);
    const cycle = findCycle(deps);
    if (cycle) issues.push(`dependency cycle: ${cycle.join(" -> ")}`);

    if (plan.strategy === "SINGLE" && calls.length !== 1) {
      issues.push(`SINGLE strategy expects exactly 1 call, got ${calls.length}`);
    }
    if (plan.strategy === "PARALLEL") {
      for (const [step, froms] of deps) {
        if (froms.length) issues.push(`PARALLEL step ${step} depends on steps ${froms.join(", ")}`);
      }
    }
  } else if (plan.strategy === "SINGLE" && calls.length !== 1) {
    issues.push(`SINGLE strategy expects exactly 1 call, got ${calls.length}`);
  }

  return { pass: issues.length === 0, issues };
}

export function validatePlan(plan: ExecutionPlan): void {
  const verdict = verifyPlan(plan);
  if (!verdict.pass) throw new InvalidPlanError(verdict.issues);
}
