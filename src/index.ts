export type * from './types/plan.js';
export type * from './types/tools.js';

export { compilePlan, parseDependency, parseStrategy, toParam } from './orchestrator/compiler.js';
export { verifyPlan, validatePlan, type Verdict } from './orchestrator/verify.js';
export { PlanExecutor, runPlan, shapeGroups, DEFAULT_TOOL_TIMEOUT_MS, type RunOptions } from './orchestrator/run.js';
export { executeStep, withTimeout, type StepContext } from './orchestrator/step.js';
export { resolveParameters, resolveValue, referencedVariables } from './orchestrator/resolve.js';
export { buildDependencyMap, topoSort, computeLayers, findCycle, type DependencyMap } from './orchestrator/topo.js';
export { aggregate, labelOutcomes } from './orchestrator/aggregate.js';
export { Semaphore } from './orchestrator/semaphore.js';
export { createBlackboard, read, write, exists, keys, close, type Blackboard, type VariableEntry } from './blackboard/index.js';
export { LocalToolRegistry, CompositeToolRegistry, buildToolRegistry, buildCalculatorRegistry } from './tools/registry.js';
export { McpToolRegistry, loadServerConfig, normalizeToolResult, serverConfigSchema, type ServerConfig } from './tools/mcp.js';
export { createCalculatorServer } from './servers/calculator.js';
export { loadConfig, type EngineConfig } from './config.js';
export { EngineError, InvalidPlanError, UnresolvedVariableError, ToolTimeoutError, errorMessage } from './errors.js';
