export type OnFailPolicy = 'stop' | 'skip' | 'retry' | 'ask_user';

export type Guard = boolean | string;

/** Step as submitted in a procedure description (JSON wire shape). */
export interface StepDescription {
  id: string;
  tool: string;
  name?: string;
  params?: Record<string, unknown>;
  depends_on?: string[];
  guard?: Guard;
  order?: number;
  on_fail?: OnFailPolicy;
  retries?: number;
}

export interface ProcedureDescription {
  name: string;
  description: string;
  goal?: string;
  tags?: string[];
  steps: StepDescription[];
  metadata?: Record<string, unknown>;
}

export interface ValidationIssue {
  path: string;
  message: string;
  value?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export interface ConstructionResult {
  procedureUuid: string;
  stepUuids: string[];
  stepIds: string[];
  dependencyEdgeCount: number;
}

export interface StoredStep {
  uuid: string;
  id: string;
  name?: string;
  tool?: string;
  params: Record<string, unknown>;
  depends_on: string[];
  guard?: Guard;
  on_fail?: OnFailPolicy;
  order: number;
}

export interface StoredProcedure {
  uuid: string;
  name: string;
  description: string;
  goal?: string;
  tags: string[];
  steps: StoredStep[];
  metadata: Record<string, unknown>;
}

export interface ProcedureSummary {
  uuid: string;
  name: string;
  description: string;
  tags: string[];
  score: number;
}

export interface ExecutionPlan {
  procedureUuid: string;
  goal: string;
  steps: Array<{
    id: string;
    tool: string;
    params: Record<string, unknown>;
    depends_on: string[];
    guard?: Guard;
    on_fail?: OnFailPolicy;
  }>;
  reuse: true;
}
