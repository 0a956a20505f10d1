// Infrastructure layer: OpenAI SDK implementation
// Implements ILLMClient port from domain

import OpenAI from 'openai';
import { v4 as uuidv4 } from 'uuid';
import type {
  ChatOptions,
  ILLMClient,
  LLMClientConfig,
  LLMMessage,
  LLMResponse,
} from '@/domain/llm/types.js';
import { logLLMCall, logLLMDebug } from '@/utils/logger.js';

function toMessageParam(message: LLMMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIClient implements ILLMClient {
  private client: OpenAI;
  private config: Omit<LLMClientConfig, 'apiKey'>;

  constructor(config: LLMClientConfig) {
    const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error('Missing API key. Set OPENAI_API_KEY or pass apiKey in config');
    }

    this.config = {
      model: config.model,
      baseUrl: config.baseUrl,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      timeoutSeconds: config.timeoutSeconds,
    };

    // Retries are handled by the narrator, so the SDK makes a single attempt
    this.client = new OpenAI({
      apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutSeconds * 1000,
      maxRetries: 0,
    });
  }

  async chat(messages: LLMMessage[], options?: ChatOptions): Promise<LLMResponse> {
    const startTime = Date.now();
    const callId = uuidv4();
    const temperature = options?.temperature ?? this.config.temperature;
    const maxTokens = options?.maxTokens ?? this.config.maxTokens;

    logLLMDebug({
      timestamp: new Date().toISOString(),
      callId,
      phase: 'request',
      model: this.config.model,
      baseUrl: this.config.baseUrl,
      temperature,
      maxTokens,
      timeoutSeconds: this.config.timeoutSeconds,
      messages,
    });

    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: messages.map(toMessageParam),
        temperature,
        max_tokens: maxTokens,
      });

      const responseTimeMs = Date.now() - startTime;
      const content = response.choices[0]?.message?.content?.trim() ?? '';
      const usage = response.usage;

      logLLMDebug({
        timestamp: new Date().toISOString(),
        callId,
        phase: 'response',
        model: this.config.model,
        baseUrl: this.config.baseUrl,
        response: content,
        responseTimeMs,
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      });

      logLLMCall({
        timestamp: new Date().toISOString(),
        model: this.config.model,
        prompt: JSON.stringify(messages),
        response: content,
        responseTimeMs,
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      });

      return {
        content,
        usage: usage
          ? {
              promptTokens: usage.prompt_tokens,
              completionTokens: usage.completion_tokens,
              totalTokens: usage.total_tokens,
            }
          : undefined,
        model: response.model,
        id: response.id,
      };
    } catch (error) {
      const responseTimeMs = Date.now() - startTime;

      logLLMDebug({
        timestamp: new Date().toISOString(),
        callId,
        phase: 'error',
        model: this.config.model,
        baseUrl: this.config.baseUrl,
        responseTimeMs,
        error: error instanceof Error ? error.message : 'Unknown error',
        stack: error instanceof Error ? error.stack : undefined,
      });

      logLLMCall({
        timestamp: new Date().toISOString(),
        model: this.config.model,
        prompt: JSON.stringify(messages),
        response: '',
        responseTimeMs,
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
        error: error instanceof Error ? error.message : 'Unknown error',
      });

      throw error;
    }
  }

  getConfig(): Readonly<LLMClientConfig> {
    return { ...this.config };
  }
}
