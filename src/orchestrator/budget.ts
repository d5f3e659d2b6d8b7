export interface Budget {
  plan_timeout_ms?: number;
}

export interface BudgetState {
  started_at: number;
  deadline?: number;
}

export function initBudget(budget: Budget): BudgetState {
  const started_at = Date.now();
  const deadline = budget.plan_timeout_ms !== undefined ? started_at + budget.plan_timeout_ms : undefined;
  return { started_at, deadline };
}

export function timeLeft(state: BudgetState): number {
  if (state.deadline === undefined) return Infinity;
  return Math.max(0, state.deadline - Date.now());
}

export function canStartCall(state: BudgetState): boolean {
  return timeLeft(state) > 0;
}

export function elapsed(state: BudgetState): number {
  return Date.now() - state.started_at;
}
