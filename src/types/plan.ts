export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Strategy = "SINGLE" | "PARALLEL" | "SEQUENTIAL" | "HYBRID";

export type StepNo = number;

/** A parameter value as declared by the plan. Anything holding a reference is resolved before invocation. */
export type ParamValue =
  | { kind: "literal"; value: JsonValue }
  | { kind: "ref"; name: string }
  | { kind: "template"; parts: TemplatePart[] }
  | { kind: "list"; items: ParamValue[] }
  | { kind: "record"; entries: Record<string, ParamValue> };

export type TemplatePart = string | { ref: string };

export type Dependency = "none" | StepNo | StepNo[];

export interface ToolCall {
  step: StepNo;
  toolName: string;
  parameters: Record<string, ParamValue>;
  dependency: Dependency;
  purpose: string;
  resultVariable?: string;
}

export interface ExecutionPlan {
  strategy: Strategy;
  calls: ToolCall[];
}

export type ErrorKind =
  | "InvalidPlan"
  | "UnknownTool"
  | "UnresolvedVariable"
  | "Timeout"
  | "ToolExecutionError"
  | "UpstreamFailure"
  | "Cancelled";

export type OutcomeStatus = "succeeded" | "failed" | "skipped" | "cancelled";

export interface StepOutcome {
  step: StepNo;
  toolName: string;
  status: OutcomeStatus;
  success: boolean;
  value?: unknown;
  errorKind?: ErrorKind;
  message?: string;
  durationMs: number;
  resultVariable?: string;
  /** Index of the concurrent group the call belonged to. */
  layer: number;
  /** Parameters actually sent to the provider. */
  parameters?: Record<string, JsonValue>;
}

export interface ExecutionResult {
  strategy: Strategy;
  outcomes: StepOutcome[];
  completionOrder: StepNo[];
  overallSuccess: boolean;
  finalValue?: unknown;
  durationMs: number;
  log: string[];
}
