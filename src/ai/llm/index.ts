/**
 * Provider factory. Returns null when no credential is configured or the SDK
 * client cannot be built; callers treat null as "GenAI disabled".
 */
import type { ILLMService, LLMProviderSettings } from './types';
import { OpenAILLMService } from './OpenAILLMService';
import { logger } from '../../config/logger';
import { describeError } from '../../utils/errors';

export function createLLMService(settings: LLMProviderSettings): ILLMService | null {
  if (!settings.apiKey) {
    return null;
  }
  try {
    return new OpenAILLMService(settings);
  } catch (error) {
    logger.warn('Could not construct LLM provider client', { error: describeError(error) });
    return null;
  }
}

export { OpenAILLMService } from './OpenAILLMService';
export type { ILLMService, LLMMessage, LLMOptions, LLMProviderSettings, LLMResponse } from './types';
