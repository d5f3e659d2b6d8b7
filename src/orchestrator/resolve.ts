import type { JsonValue, ParamValue } from "../types/plan.js";
import type { Blackboard } from "../blackboard/index.js";
import { exists, read } from "../blackboard/index.js";
import { UnresolvedVariableError } from "../errors.js";

/**
 * Turn declared parameters into the literal arguments sent to a provider.
 * Pure: neither the store nor `params` is touched, and nothing returned aliases `params`.
 *
 * @throws UnresolvedVariableError when a referenced variable has not been published
 */
export function resolveParameters(
  params: Record<string, ParamValue>,
  bb: Blackboard
): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [name, value] of Object.entries(params)) {
    out[name] = resolveValue(value, bb);
  }
  return out;
}

export function resolveValue(value: ParamValue, bb: Blackboard): JsonValue {
  switch (value.kind) {
    case "literal":
      // A copy, so a provider that mutates its arguments cannot reach the plan.
      return typeof value.value === "object" && value.value !== null ? structuredClone(value.value) : value.value;
    case "ref":
      return toJson(lookup(value.name, bb));
    case "template":
      return value.parts
        .map(p => (typeof p === "string" ? p : render(lookup(p.ref, bb))))
        .join("");
    case "list":
      return value.items.map(v => resolveValue(v, bb));
    case "record": {
      const out: Record<string, JsonValue> = {};
      for (const [k, v] of Object.entries(value.entries)) out[k] = resolveValue(v, bb);
      return out;
    }
  }
}

/** Every variable name a parameter map refers to, in declaration order, without duplicates. */
export function referencedVariables(params: Record<string, ParamValue>): string[] {
  const seen = new Set<string>();
  const visit = (v: ParamValue): void => {
    switch (v.kind) {
      case "ref":
        seen.add(v.name);
        break;
      case "template":
        for (const p of v.parts) if (typeof p !== "string") seen.add(p.ref);
        break;
      case "list":
        v.items.forEach(visit);
        break;
      case "record":
        Object.values(v.entries).forEach(visit);
        break;
      case "literal":
        break;
    }
  };
  Object.values(params).forEach(visit);
  return Array.from(seen);
}

function lookup(name: string, bb: Blackboard): unknown {
  if (!exists(bb, name)) throw new UnresolvedVariableError(name);
  return read(bb, name);
}

function render(v: unknown): string {
  if (typeof v === "string") return v;
  return JSON.stringify(toJson(v));
}

// Provider values are opaque; anything JSON cannot carry becomes its string form.
function toJson(v: unknown): JsonValue {
  if (v === null || typeof v === "string" || typeof v === "boolean") return v;
  if (typeof v === "number") return Number.isFinite(v) ? v : String(v);
  if (v === undefined) return null;
  if (Array.isArray(v)) return v.map(toJson);
  if (typeof v === "object") {
    const out: Record<string, JsonValue> = {};
    for (const [k, x] of Object.entries(v)) out[k] = toJson(x);
    return out;
  }
  return String(v);
}
