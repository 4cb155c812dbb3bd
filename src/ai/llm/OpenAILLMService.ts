import OpenAI from 'openai';
import type { ILLMService, LLMMessage, LLMOptions, LLMProviderSettings, LLMResponse } from './types';
import { logger } from '../../config/logger';

/**
 * Chat completions against the OpenAI API or any OpenAI-compatible endpoint.
 * One request per call: retries are off and the SDK enforces the timeout.
 */
export class OpenAILLMService implements ILLMService {
  private readonly client: OpenAI;
  private readonly defaultModel: string;
  private readonly timeoutMs: number;

  constructor(settings: LLMProviderSettings) {
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
    this.defaultModel = settings.model;
    this.timeoutMs = settings.timeoutMs;
  }

  async chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    const model = options?.model ?? this.defaultModel;

    const completion = await this.client.chat.completions.create(
      {
        model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: options?.temperature,
        max_tokens: options?.maxTokens,
      },
      { timeout: options?.timeoutMs ?? this.timeoutMs }
    );

    const choice = completion.choices?.[0];
    if (!choice) {
      logger.error('Provider response missing choices', { model });
      throw new Error('Malformed provider response: missing choices');
    }

    return {
      content: choice.message?.content ?? '',
      model: completion.model || model,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
      },
    };
  }
}
