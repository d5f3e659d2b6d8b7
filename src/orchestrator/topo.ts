import type { ExecutionPlan, StepNo, ToolCall } from "../types/plan.js";
import { referencedVariables } from "./resolve.js";

export type DependencyMap = Map<StepNo, StepNo[]>;

export function explicitDependencies(call: ToolCall): StepNo[] {
  if (call.dependency === "none") return [];
  return Array.isArray(call.dependency) ? call.dependency : [call.dependency];
}

/**
 * Steps each call waits for: its declared dependencies plus the producers of every
 * variable it references. Unknown steps and names are left out; validation reports them.
 */
export function buildDependencyMap(plan: ExecutionPlan): DependencyMap {
  const producer = new Map<string, StepNo>();
  for (const c of plan.calls) if (c.resultVariable) producer.set(c.resultVariable, c.step);
  const known = new Set(plan.calls.map(c => c.step));

  const deps: DependencyMap = new Map();
  for (const c of plan.calls) {
    const set = new Set<StepNo>();
    for (const d of explicitDependencies(c)) if (known.has(d)) set.add(d);
    for (const name of referencedVariables(c.parameters)) {
      const p = producer.get(name);
      if (p !== undefined) set.add(p);
    }
    deps.set(c.step, Array.from(set).sort((a, b) => a - b));
  }
  return deps;
}

/** Kahn's algorithm; among ready steps the lowest number goes first. */
export function topoSort(deps: DependencyMap): StepNo[] {
  const indeg = new Map<StepNo, number>();
  const adj = new Map<StepNo, StepNo[]>();
  for (const id of deps.keys()) {
    indeg.set(id, 0); adj.set(id, []);
  }
  for (const [to, froms] of deps) {
    for (const from of froms) {
      indeg.set(to, (indeg.get(to) ?? 0) + 1);
      adj.get(from)?.push(to);
    }
  }
  const ready = Array.from(indeg.keys()).filter(k => indeg.get(k) === 0).sort((a, b) => a - b);
  const out: StepNo[] = [];
  while (ready.length) {
    const u = ready.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of adj.get(u) ?? []) {
      const d = (indeg.get(v) ?? 0) - 1;
      indeg.set(v, d);
      if (d === 0) insertSorted(ready, v);
    }
  }
  if (out.length !== deps.size) {
    const stuck = Array.from(deps.keys()).filter(k => !out.includes(k)).sort((a, b) => a - b);
    throw new Error(`Dependency cycle among steps ${stuck.join(", ")}`);
  }
  return out;
}

/** Layer 0 has no dependencies; layer k depends only on layers below k. Steps ascend within a layer. */
export function computeLayers(deps: DependencyMap): StepNo[][] {
  const order = topoSort(deps);
  const depth = new Map<StepNo, number>();
  for (const id of order) {
    const d = Math.max(-1, ...(deps.get(id) ?? []).map(p => depth.get(p) ?? 0)) + 1;
    depth.set(id, d);
  }
  const layers: StepNo[][] = [];
  for (const id of order) {
    const d = depth.get(id) ?? 0;
    (layers[d] ??= []).push(id);
  }
  return layers.map(l => l.sort((a, b) => a - b));
}

export function findCycle(deps: DependencyMap): StepNo[] | null {
  try {
    topoSort(deps);
    return null;
  } catch {
    const state = new Map<StepNo, "open" | "done">();
    const path: StepNo[] = [];
    const visit = (id: StepNo): StepNo[] | null => {
      state.set(id, "open");
      path.push(id);
      for (const p of deps.get(id) ?? []) {
        if (state.get(p) === "open") return path.slice(path.indexOf(p)).concat(p);
        if (!state.has(p)) {
          const found = visit(p);
          if (found) return found;
        }
      }
      path.pop();
      state.set(id, "done");
      return null;
    };
    for (const id of Array.from(deps.keys()).sort((a, b) => a - b)) {
      if (!state.has(id)) {
        const found = visit(id);
        if (found) return found;
      }
    }
    return null;
  }
}

function insertSorted(arr: StepNo[], v: StepNo) {
  const ix = arr.findIndex(x => x > v);
  if (ix === -1) arr.push(v); else arr.splice(ix, 0, v);
}
