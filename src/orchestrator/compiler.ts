import { z } from "zod";
import type { Dependency, ExecutionPlan, JsonValue, ParamValue, Strategy, TemplatePart, ToolCall } from "../types/plan.js";
import { InvalidPlanError } from "../errors.js";
import { validatePlan } from "./verify.js";

// `${name}` or `${{name}}`
const MARKER = /\$\{\{\s*([A-Za-z_][\w.-]*)\s*\}\}|\$\{\s*([A-Za-z_][\w.-]*)\s*\}/g;

const rawCallSchema = z
  .object({
    step: z.coerce.number().int().positive(),
    tool_name: z.string().min(1).optional(),
    toolName: z.string().min(1).optional(),
    parameters: z.record(z.unknown()).optional().default({}),
    dependency: z
      .union([z.string(), z.number(), z.array(z.union([z.number(), z.string()])), z.null()])
      .optional(),
    purpose: z.string().optional().default(""),
    result_variable: z.string().min(1).nullable().optional(),
    resultVariable: z.string().min(1).nullable().optional(),
  })
  .refine((c) => c.toolName !== undefined || c.tool_name !== undefined, {
    message: "tool_name is required",
    path: ["tool_name"],
  });

const rawPlanSchema = z
  .object({
    strategy: z.string().min(1),
    total_steps: z.number().int().positive().optional(),
    calls: z.array(rawCallSchema).optional(),
    tool_calls: z.array(rawCallSchema).optional(),
  })
  .refine((p) => p.calls !== undefined || p.tool_calls !== undefined, {
    message: "calls (or tool_calls) is required",
    path: ["calls"],
  });

export type RawPlan = z.input<typeof rawPlanSchema>;

/**
 * Turn planner JSON into an immutable ExecutionPlan. Accepts both the camelCase
 * shape and the planner's snake_case one (`tool_calls`, `tool_name`,
 * `result_variable`, `dependency: "steps_1_and_2"`, `strategy: "hybrid_tools"`).
 *
 * @throws InvalidPlanError on malformed input or a plan that fails validation
 */
export function compilePlan(raw: unknown): ExecutionPlan {
  const parsed = rawPlanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidPlanError(parsed.error.issues.map((i) => `${i.path.join(".") || "plan"}: ${i.message}`));
  }
  const draft = parsed.data;
  const rawCalls = draft.calls ?? draft.tool_calls ?? [];
  const issues: string[] = [];

  const strategy = parseStrategy(draft.strategy);
  if (!strategy) issues.push(`unknown strategy '${draft.strategy}'`);
  if (draft.total_steps !== undefined && draft.total_steps !== rawCalls.length) {
    issues.push(`total_steps is ${draft.total_steps} but ${rawCalls.length} call(s) were given`);
  }

  const calls: ToolCall[] = [];
  for (const rc of rawCalls) {
    const dependency = parseDependency(rc.dependency);
    if (dependency === undefined) {
      issues.push(`step ${rc.step}: cannot read dependency ${JSON.stringify(rc.dependency)}`);
      continue;
    }
    const parameters: Record<string, ParamValue> = {};
    for (const [name, value] of Object.entries(rc.parameters)) {
      try {
        parameters[name] = toParam(value);
      } catch (e) {
        issues.push(`step ${rc.step}: parameter '${name}' ${e instanceof Error ? e.message : String(e)}`);
      }
    }
    const resultVariable = rc.resultVariable ?? rc.result_variable ?? undefined;
    calls.push({
      step: rc.step,
      toolName: rc.toolName ?? rc.tool_name ?? "",
      parameters,
      dependency,
      purpose: rc.purpose,
      ...(resultVariable ? { resultVariable } : {}),
    });
  }

  if (issues.length || !strategy) throw new InvalidPlanError(issues);

  const plan: ExecutionPlan = { strategy, calls };
  validatePlan(plan);
  return deepFreeze(plan);
}

export function parseStrategy(s: string): Strategy | undefined {
  const key = s.trim().toLowerCase().replace(/^executionstrategy\./, "").replace(/_tools?$/, "");
  switch (key) {
    case "single": return "SINGLE";
    case "parallel": return "PARALLEL";
    case "sequential": return "SEQUENTIAL";
    case "hybrid": return "HYBRID";
    default: return undefined;
  }
}

/** "none", 2, [1, 2], "step_1", "steps_1_and_2", "1,3". Undefined when unreadable. */
export function parseDependency(d: string | number | (number | string)[] | null | undefined): Dependency | undefined {
  if (d === undefined || d === null) return "none";
  if (typeof d === "number") return Number.isInteger(d) ? d : undefined;
  const text = Array.isArray(d) ? d.join(",") : d;
  if (/^\s*(none|null|)\s*$/i.test(text)) return "none";
  const nums = Array.from(text.matchAll(/\d+/g), (m) => Number(m[0]));
  if (nums.length === 0) return undefined;
  const unique = Array.from(new Set(nums)).sort((a, b) => a - b);
  return unique.length === 1 ? unique[0] : unique;
}

/** Tag a raw parameter value; strings carrying markers become references or templates. */
export function toParam(value: unknown): ParamValue {
  if (typeof value === "string") return parseString(value);
  if (value === null || typeof value === "boolean") return { kind: "literal", value };
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new Error("is not a finite number");
    return { kind: "literal", value };
  }
  if (Array.isArray(value)) {
    const items = value.map(toParam);
    return items.every(isLiteral) ? { kind: "literal", value: items.map(literalValue) } : { kind: "list", items };
  }
  if (typeof value === "object") {
    const entries: Record<string, ParamValue> = {};
    for (const [k, v] of Object.entries(value)) entries[k] = toParam(v);
    if (Object.values(entries).every(isLiteral)) {
      const lit: Record<string, JsonValue> = {};
      for (const [k, v] of Object.entries(entries)) lit[k] = literalValue(v);
      return { kind: "literal", value: lit };
    }
    return { kind: "record", entries };
  }
  throw new Error(`has unsupported type ${typeof value}`);
}

function parseString(s: string): ParamValue {
  const parts: TemplatePart[] = [];
  let last = 0;
  for (const m of s.matchAll(MARKER)) {
    const ix = m.index ?? 0;
    if (ix > last) parts.push(s.slice(last, ix));
    parts.push({ ref: m[1] ?? m[2] });
    last = ix + m[0].length;
  }
  if (parts.length === 0) return { kind: "literal", value: s };
  if (last < s.length) parts.push(s.slice(last));
  const only = parts[0];
  if (parts.length === 1 && typeof only !== "string") return { kind: "ref", name: only.ref };
  return { kind: "template", parts };
}

function isLiteral(p: ParamValue): p is { kind: "literal"; value: JsonValue } {
  return p.kind === "literal";
}

function literalValue(p: ParamValue): JsonValue {
  return isLiteral(p) ? p.value : null;
}

function deepFreeze<T>(obj: T): T {
  if (obj && typeof obj === "object" && !Object.isFrozen(obj)) {
    Object.freeze(obj);
    for (const v of Object.values(obj)) deepFreeze(v);
  }
  return obj;
}
