/**
 * GenAI system engineering façade: one method per engineering task, each
 * turning caller text into a fixed prompt, making a single provider call and
 * mapping the outcome onto a TaskResult. Methods never reject.
 */
import { config } from '../../config';
import { logger } from '../../config/logger';
import { createLLMService } from '../../ai/llm';
import type { ILLMService, LLMMessage } from '../../ai/llm';
import {
  SYSTEM_PROMPT_DESIGN,
  SYSTEM_PROMPT_OPTIMIZATION,
  SYSTEM_PROMPT_REQUIREMENTS,
  SYSTEM_PROMPT_RISK,
  SYSTEM_PROMPT_TEST_CASES,
  buildDesignPrompt,
  buildOptimizationPrompt,
  buildRequirementsAnalysisPrompt,
  buildRiskAssessmentPrompt,
  buildTestCasePrompt,
} from '../../ai/prompts/templates';
import {
  SystemEngineeringTask,
  type DesignDocument,
  type DisabledResult,
  type ErrorResult,
  type JsonValue,
  type OptimizationPlan,
  type RequirementsAnalysis,
  type RiskAssessment,
  type SuccessResult,
  type TaskResult,
  type TestCaseSuite,
} from '../../types';
import { describeError } from '../../utils/errors';

export const DISABLED_MESSAGE = 'GenAI is not configured. Please set OPENAI_API_KEY.';

export const DEFAULT_DESIGN_TYPE = 'architecture';
export const DEFAULT_TEST_TYPE = 'functional';
export const DEFAULT_OPTIMIZATION_GOAL = 'performance';

export interface SamplingSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}

/** Wording used in `Error during <label>: ...` messages. */
const TASK_LABELS: Record<SystemEngineeringTask, string> = {
  [SystemEngineeringTask.REQUIREMENTS_ANALYSIS]: 'analysis',
  [SystemEngineeringTask.DESIGN_GENERATION]: 'design generation',
  [SystemEngineeringTask.RISK_ASSESSMENT]: 'risk assessment',
  [SystemEngineeringTask.TEST_CASE_GENERATION]: 'test case generation',
  [SystemEngineeringTask.OPTIMIZATION]: 'optimization',
};

function parseJson(text: string): JsonValue {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class SystemEngineeringService {
  readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(settings: SamplingSettings, private readonly llm: ILLMService | null) {
    this.model = settings.model;
    this.temperature = settings.temperature;
    this.maxTokens = settings.maxTokens;
  }

  isEnabled(): boolean {
    return this.llm !== null;
  }

  analyzeRequirements(requirementsText: string): Promise<TaskResult<RequirementsAnalysis>> {
    return this.run(
      SystemEngineeringTask.REQUIREMENTS_ANALYSIS,
      SYSTEM_PROMPT_REQUIREMENTS,
      buildRequirementsAnalysisPrompt(requirementsText),
      (content) => ({ analysis: parseJson(content), raw_response: content })
    );
  }

  generateDesign(
    specifications: string,
    designType: string = DEFAULT_DESIGN_TYPE
  ): Promise<TaskResult<DesignDocument>> {
    return this.run(
      SystemEngineeringTask.DESIGN_GENERATION,
      SYSTEM_PROMPT_DESIGN,
      buildDesignPrompt(specifications, designType),
      (content) => ({ design: content, design_type: designType })
    );
  }

  assessRisks(systemDescription: string): Promise<TaskResult<RiskAssessment>> {
    return this.run(
      SystemEngineeringTask.RISK_ASSESSMENT,
      SYSTEM_PROMPT_RISK,
      buildRiskAssessmentPrompt(systemDescription),
      (content) => ({ assessment: content })
    );
  }

  generateTestCases(
    requirements: string,
    testType: string = DEFAULT_TEST_TYPE
  ): Promise<TaskResult<TestCaseSuite>> {
    return this.run(
      SystemEngineeringTask.TEST_CASE_GENERATION,
      SYSTEM_PROMPT_TEST_CASES,
      buildTestCasePrompt(requirements, testType),
      (content) => ({ test_cases: content, test_type: testType })
    );
  }

  optimizeSystem(
    systemConfig: Record<string, unknown>,
    optimizationGoal: string = DEFAULT_OPTIMIZATION_GOAL
  ): Promise<TaskResult<OptimizationPlan>> {
    return this.run(
      SystemEngineeringTask.OPTIMIZATION,
      SYSTEM_PROMPT_OPTIMIZATION,
      () => buildOptimizationPrompt(systemConfig, optimizationGoal),
      (content) => ({ optimizations: content, optimization_goal: optimizationGoal })
    );
  }

  /**
   * Shared disabled → call → success/error path. The prompt may be deferred so
   * that serialization failures (e.g. a circular config) land in the error result.
   */
  private async run<P extends object>(
    task: SystemEngineeringTask,
    systemPrompt: string,
    prompt: string | (() => string),
    toPayload: (content: string) => P
  ): Promise<TaskResult<P>> {
    if (!this.llm) {
      const disabled: DisabledResult = { status: 'disabled', message: DISABLED_MESSAGE };
      return disabled;
    }

    try {
      const messages: LLMMessage[] = [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: typeof prompt === 'function' ? prompt() : prompt },
      ];
      logger.debug('GenAI task started', { task, model: this.model });
      const response = await this.llm.chat(messages, {
        model: this.model,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
      const success: SuccessResult<P> = { status: 'success', ...toPayload(response.content) };
      return success;
    } catch (error) {
      const description = describeError(error);
      logger.warn('GenAI task failed', { task, model: this.model, error: description });
      const failure: ErrorResult = { status: 'error', message: `Error during ${TASK_LABELS[task]}: ${description}` };
      return failure;
    }
  }
}

/**
 * Build a façade from configuration. An explicit `apiKey` (including '')
 * overrides OPENAI_API_KEY.
 */
export function createSystemEngineeringService(options: { apiKey?: string } = {}): SystemEngineeringService {
  const settings = config.genai;
  const llm = createLLMService({
    apiKey: options.apiKey ?? settings.apiKey,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
    baseUrl: settings.baseUrl,
  });
  return new SystemEngineeringService(
    { model: settings.model, temperature: settings.temperature, maxTokens: settings.maxTokens },
    llm
  );
}
