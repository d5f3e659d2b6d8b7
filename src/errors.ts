import type { ErrorKind } from "./types/plan.js";

export class EngineError extends Error {
  constructor(readonly kind: ErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Thrown before anything runs. Carries every violation found, not just the first. */
export class InvalidPlanError extends EngineError {
  constructor(readonly issues: string[]) {
    super("InvalidPlan", `Invalid plan: ${issues.join("; ")}`);
  }
}

export class UnresolvedVariableError extends EngineError {
  constructor(readonly variable: string) {
    super("UnresolvedVariable", `Variable '${variable}' has no published value`);
  }
}

export class ToolTimeoutError extends EngineError {
  constructor(toolName: string, timeoutMs: number) {
    super("Timeout", `Tool ${toolName} timed out after ${timeoutMs}ms`);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  try { return JSON.stringify(e); } catch { return String(e); }
}
