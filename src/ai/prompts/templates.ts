/**
 * System engineering prompt templates. Each task pairs a fixed system role with
 * a user prompt: instructional preamble first, the caller's text verbatim after.
 * Builders are pure so the same input always produces the same prompt.
 */

export const SYSTEM_PROMPT_REQUIREMENTS = 'You are a system engineering expert.';
export const SYSTEM_PROMPT_DESIGN = 'You are an expert system designer.';
export const SYSTEM_PROMPT_RISK = 'You are a risk assessment expert.';
export const SYSTEM_PROMPT_TEST_CASES = 'You are a test engineering expert.';
export const SYSTEM_PROMPT_OPTIMIZATION = 'You are a system optimization expert.';

export function buildRequirementsAnalysisPrompt(requirementsText: string): string {
  return `As a system engineering expert, analyze the following requirements:

${requirementsText}

Provide:
1. Clarity assessment (are requirements clear and unambiguous?)
2. Completeness check (are there any gaps?)
3. Testability evaluation (can these be tested?)
4. Potential conflicts or contradictions
5. Suggestions for improvement

Format your response as JSON with keys: clarity, completeness, testability, conflicts, suggestions`;
}

export function buildDesignPrompt(specifications: string, designType: string): string {
  return `Based on the following specifications, generate a ${designType} design:

${specifications}

Provide:
1. Overall design approach
2. Key components and their responsibilities
3. Interface definitions
4. Data flow
5. Technology recommendations

Format as a detailed design document.`;
}

export function buildRiskAssessmentPrompt(systemDescription: string): string {
  return `Perform a risk assessment for the following system:

${systemDescription}

Identify:
1. Technical risks
2. Security risks
3. Performance risks
4. Operational risks
5. Mitigation strategies for each risk

Rate each risk as: Critical, High, Medium, or Low`;
}

export function buildTestCasePrompt(requirements: string, testType: string): string {
  return `Generate ${testType} test cases for the following requirements:

${requirements}

For each test case provide:
1. Test ID
2. Test description
3. Preconditions
4. Test steps
5. Expected results
6. Priority (High/Medium/Low)

Format as a structured list.`;
}

/** Config is serialized with two-space indentation before templating. */
export function buildOptimizationPrompt(systemConfig: Record<string, unknown>, optimizationGoal: string): string {
  return `Analyze this system configuration and suggest optimizations for ${optimizationGoal}:

${JSON.stringify(systemConfig, null, 2)}

Provide:
1. Current bottlenecks or inefficiencies
2. Specific optimization recommendations
3. Expected impact of each recommendation
4. Implementation complexity (Easy/Medium/Hard)
5. Potential trade-offs`;
}
