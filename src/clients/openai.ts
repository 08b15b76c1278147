import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { Message, CompletionOptions, CompletionResult } from '../types.js';
import type { ChatClient, ChatClientConfig } from './types.js';

/**
 * Client for any endpoint that speaks the OpenAI chat-completions protocol
 * (Groq, OpenAI, OpenRouter, Together, Ollama).
 */
export class OpenAIChatClient implements ChatClient {
  readonly provider: string;
  readonly model: string;

  private client: OpenAI;

  constructor(model: string, config: ChatClientConfig = {}, provider: string = 'openai') {
    this.model = model;
    this.provider = provider;

    if (!config.apiKey) {
      throw new Error(`${provider} API key is required. Set API_KEY environment variable or pass apiKey in config.`);
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl || undefined,
      timeout: config.timeout ?? 60000,
      maxRetries: 0, // The gateway owns the retry policy
    });
  }

  private convertMessages(messages: Message[]): ChatCompletionMessageParam[] {
    return messages.map((m): ChatCompletionMessageParam => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
        case 'assistant':
          return { role: 'assistant', content: m.content };
      }
    });
  }

  /**
   * Generate a completion using the chat-completions API.
   */
  async complete(messages: Message[], options: CompletionOptions = {}): Promise<CompletionResult> {
    const requestParams: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: this.convertMessages(messages),
      max_tokens: options.maxTokens,
      temperature: options.temperature ?? 0,
    };

    if (options.jsonMode) {
      requestParams.response_format = { type: 'json_object' };
    }

    const response = await this.client.chat.completions.create(requestParams);

    const choice = response.choices[0];
    if (!choice) {
      throw new Error(`No completion choice returned from ${this.provider}`);
    }

    return {
      content: choice.message.content ?? '',
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  /**
   * Map the provider finish reason to our standard format.
   */
  private mapFinishReason(reason: string | null): CompletionResult['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'unknown';
    }
  }
}
