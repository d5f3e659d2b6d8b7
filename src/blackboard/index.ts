import type { StepNo } from "../types/plan.js";

export interface VariableEntry<T = unknown> {
  value: T;
  step: StepNo;
  at: string; // ISO timestamp
}

/** Execution-scoped variable store. Each name is written once; a closed board takes no writes. */
export interface Blackboard {
  entries: Map<string, VariableEntry>;
  closed: boolean;
}

export function createBlackboard(): Blackboard {
  return { entries: new Map(), closed: false };
}

export function read<T = unknown>(bb: Blackboard, key: string): T | undefined {
  return bb.entries.get(key)?.value as T | undefined;
}

export function write<T = unknown>(bb: Blackboard, key: string, value: T, step: StepNo): VariableEntry<T> {
  if (bb.closed) throw new Error(`Blackboard is closed; cannot write '${key}'`);
  if (bb.entries.has(key)) throw new Error(`Variable '${key}' was already published`);
  const rec = { value, step, at: new Date().toISOString() };
  bb.entries.set(key, rec);
  return rec;
}

export function exists(bb: Blackboard, key: string): boolean {
  return bb.entries.has(key);
}

export function keys(bb: Blackboard): string[] {
  return Array.from(bb.entries.keys());
}

export function close(bb: Blackboard): void {
  bb.closed = true;
}
