import type { RunConfig } from '../config.js';
import type { ChatClient } from './types.js';
import { OpenAIChatClient } from './openai.js';

export type { ChatClient, ChatClientConfig } from './types.js';
export { OpenAIChatClient } from './openai.js';
export { PROVIDER_BASE_URLS, SUPPORTED_PROVIDERS, detectProvider, isModelProvider } from './types.js';

/**
 * Create the chat client for a resolved configuration. Every supported
 * provider speaks the OpenAI protocol, so one client class covers them.
 */
export function createClient(config: RunConfig): ChatClient {
  return new OpenAIChatClient(
    config.model,
    { apiKey: config.apiKey, baseUrl: config.baseUrl },
    config.provider
  );
}
