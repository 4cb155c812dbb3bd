/**
 * Shared domain types for the activity sign-up API and the GenAI system
 * engineering endpoints. Result payload keys are snake_case because they are
 * returned to HTTP callers verbatim.
 */

export interface Activity {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivityCatalog = Record<string, Activity>;

export const SystemEngineeringTask = {
  REQUIREMENTS_ANALYSIS: 'requirements_analysis',
  DESIGN_GENERATION: 'design_generation',
  RISK_ASSESSMENT: 'risk_assessment',
  TEST_CASE_GENERATION: 'test_case_generation',
  OPTIMIZATION: 'optimization',
} as const;

export type SystemEngineeringTask = (typeof SystemEngineeringTask)[keyof typeof SystemEngineeringTask];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface DisabledResult {
  status: 'disabled';
  message: string;
}

export interface ErrorResult {
  status: 'error';
  message: string;
}

export type SuccessResult<P> = { status: 'success' } & P;

/** Outcome of every façade call. Only `success` carries a payload. */
export type TaskResult<P> = DisabledResult | ErrorResult | SuccessResult<P>;

export interface RequirementsAnalysis {
  /** Parsed model output, or the raw text when it is not valid JSON. */
  analysis: JsonValue;
  raw_response: string;
}

export interface DesignDocument {
  design: string;
  design_type: string;
}

export interface RiskAssessment {
  assessment: string;
}

export interface TestCaseSuite {
  test_cases: string;
  test_type: string;
}

export interface OptimizationPlan {
  optimizations: string;
  optimization_goal: string;
}

export interface GenAIStatus {
  enabled: boolean;
  message: string;
  model?: string;
}
