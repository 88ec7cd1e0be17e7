import type { Guard } from './procedure.js';

export interface ToolCommand {
  tool: string;
  params: Record<string, unknown>;
}

export interface NestedCommand {
  tool: 'dag.execute';
  concept_uuid: string;
  nested: true;
}

export type StepResolution =
  | { kind: 'tool'; command: ToolCommand }
  | { kind: 'nested'; command: NestedCommand }
  | { kind: 'unresolved'; reason: string };

export interface GraphStep {
  id: string;
  uuid?: string;
  tool?: string;
  params: Record<string, unknown>;
  guard?: Guard;
  dependsOn: string[];
  order: number;
  /** Concept to expand as a nested sub-procedure when no tool is given. */
  conceptUuid?: string;
}

export interface ProcedureGraph {
  conceptUuid: string;
  steps: GraphStep[];
}

export type ExecutionStatus = 'completed' | 'partial' | 'error';

export type ExecutedStep =
  | { stepId: string; command: ToolCommand }
  | { stepId: string; command: NestedCommand; result: ExecutionResult };

export interface StepError {
  stepId: string;
  message: string;
}

export interface ExecutionResult {
  status: ExecutionStatus;
  conceptUuid: string;
  executed: ExecutedStep[];
  pending: string[];
  skipped: string[];
  errors: StepError[];
  executionOrder: string[];
  error?: string;
  /** Trace covering the whole run, nested runs included. */
  traceId?: string;
}

export type EnqueueFn = (command: ToolCommand) => void | Promise<void>;

export type ExecutionContext = Record<string, unknown>;
