/**
 * LLM abstraction: provider-agnostic interface so the system engineering
 * façade can be exercised with a fake provider and the SDK stays in one place.
 */

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  /** Overrides the provider's default model. */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-call deadline in ms; defaults to the provider's configured timeout. */
  timeoutMs?: number;
}

export interface LLMResponse {
  content: string;
  model?: string;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface ILLMService {
  /** Rejects on transport, provider or malformed-response failures. */
  chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;
}

export interface LLMProviderSettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseUrl?: string;
}
