import {
  buildDesignPrompt,
  buildOptimizationPrompt,
  buildRequirementsAnalysisPrompt,
  buildRiskAssessmentPrompt,
  buildTestCasePrompt,
} from '../templates';

describe('prompt templates', () => {
  it('should place the preamble before the caller text', () => {
    const prompt = buildRequirementsAnalysisPrompt('The system shall log in users.');

    expect(prompt.startsWith('As a system engineering expert, analyze the following requirements:\n\nThe system shall log in users.\n')).toBe(true);
    expect(prompt.endsWith('Format your response as JSON with keys: clarity, completeness, testability, conflicts, suggestions')).toBe(true);
  });

  it('should interpolate the design type into the preamble', () => {
    expect(buildDesignPrompt('spec text', 'database').split('\n')[0]).toBe(
      'Based on the following specifications, generate a database design:'
    );
  });

  it('should interpolate the test type into the preamble', () => {
    expect(buildTestCasePrompt('login', 'integration').split('\n')[0]).toBe(
      'Generate integration test cases for the following requirements:'
    );
  });

  it('should keep caller text verbatim, including empty input', () => {
    expect(buildRiskAssessmentPrompt('')).toContain('Perform a risk assessment for the following system:\n\n\n\nIdentify:');
    expect(buildRiskAssessmentPrompt('${not a placeholder}')).toContain('\n\n${not a placeholder}\n\n');
  });

  it('should serialize the configuration with two-space indentation', () => {
    const prompt = buildOptimizationPrompt({ database: 'MySQL', workers: 4 }, 'cost');

    expect(prompt).toContain('suggest optimizations for cost:\n\n{\n  "database": "MySQL",\n  "workers": 4\n}\n\nProvide:');
  });

  it('should be deterministic', () => {
    expect(buildDesignPrompt('a', 'api')).toBe(buildDesignPrompt('a', 'api'));
  });
});
