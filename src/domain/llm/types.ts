// Domain layer: LLM types and interfaces
// NO external dependencies - pure TypeScript

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  usage?: LLMUsage;
  model?: string;
  id?: string;
}

export interface ChatOptions {
  /** Overrides the client's configured token budget for one call */
  maxTokens?: number;
  temperature?: number;
}

// Port interface - implemented by infrastructure layer
export interface ILLMClient {
  chat(messages: LLMMessage[], options?: ChatOptions): Promise<LLMResponse>;
  getConfig(): Readonly<LLMClientConfig>;
}

export interface LLMClientConfig {
  model: string;
  baseUrl?: string;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  timeoutSeconds: number;
}
