import type { Message, CompletionOptions, CompletionResult, ModelProvider } from '../types.js';

/**
 * Base interface for chat clients.
 * The gateway talks to the provider only through this.
 */
export interface ChatClient {
  /** Provider name (e.g., 'groq', 'openai') */
  readonly provider: string;

  /** Model identifier */
  readonly model: string;

  /**
   * Send one chat-completion request and return the first choice.
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;
}

/**
 * Configuration for creating a chat client.
 */
export interface ChatClientConfig {
  apiKey?: string;
  baseUrl?: string;
  /** Request timeout in ms (default: 60000) */
  timeout?: number;
}

/**
 * Default endpoint per provider. Every provider here speaks the OpenAI
 * chat-completions protocol; `custom` has no default and needs BASE_URL.
 */
export const PROVIDER_BASE_URLS: Record<ModelProvider, string | undefined> = {
  groq: 'https://api.groq.com/openai/v1',
  openai: 'https://api.openai.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  together: 'https://api.together.xyz/v1',
  ollama: 'http://localhost:11434/v1',
  custom: undefined,
};

export const SUPPORTED_PROVIDERS: readonly ModelProvider[] = [
  'groq',
  'openai',
  'openrouter',
  'together',
  'ollama',
  'custom',
];

export function isModelProvider(value: string): value is ModelProvider {
  return SUPPORTED_PROVIDERS.some((provider) => provider === value);
}

/**
 * Detect provider from a base URL, falling back to `custom`.
 */
export function detectProvider(baseUrl: string): ModelProvider {
  for (const provider of SUPPORTED_PROVIDERS) {
    const known = PROVIDER_BASE_URLS[provider];
    if (known && baseUrl.startsWith(known)) {
      return provider;
    }
  }
  return 'custom';
}
