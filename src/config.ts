import type { ModelProvider } from './types.js';
import { PROVIDER_BASE_URLS, SUPPORTED_PROVIDERS, detectProvider, isModelProvider } from './clients/types.js';
import { invalidConfigError, missingApiKeyError } from './utils/errors.js';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
  provider: 'groq',
  model: 'llama-3.1-70b-versatile',
  contextWindow: 8000,
  verbose: false,
} as const;

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  API_KEY: 'API_KEY',
  PROVIDER: 'PROVIDER',
  BASE_URL: 'BASE_URL',
  MODEL_ID: 'MODEL_ID',
  CONTEXT_WINDOW: 'CONTEXT_WINDOW',
  STEPWISE_VERBOSE: 'STEPWISE_VERBOSE',
} as const;

/**
 * Options that can come from the environment or be passed explicitly.
 */
export interface ConfigOptions {
  apiKey?: string;
  provider?: string;
  baseUrl?: string;
  model?: string;
  contextWindow?: number;
  verbose?: boolean;
}

/**
 * Resolved configuration, built once at start-up and never mutated.
 */
export interface RunConfig {
  readonly apiKey: string;
  readonly provider: ModelProvider;
  readonly baseUrl: string;
  readonly model: string;
  /** Informational only; nothing trims the conversation to fit it */
  readonly contextWindow: number;
  readonly verbose: boolean;
}

/**
 * Load configuration from environment variables. Call after dotenv has
 * populated `process.env` if a `.env` file should count.
 */
export function loadEnvConfig(): ConfigOptions {
  const config: ConfigOptions = {};

  const apiKey = process.env[ENV_VARS.API_KEY];
  if (apiKey) {
    config.apiKey = apiKey;
  }

  const provider = process.env[ENV_VARS.PROVIDER];
  if (provider) {
    config.provider = provider.toLowerCase();
  }

  const baseUrl = process.env[ENV_VARS.BASE_URL];
  if (baseUrl) {
    config.baseUrl = baseUrl;
  }

  const model = process.env[ENV_VARS.MODEL_ID];
  if (model) {
    config.model = model;
  }

  // Kept as NaN when unparseable so resolveConfig reports it
  const contextWindow = process.env[ENV_VARS.CONTEXT_WINDOW];
  if (contextWindow) {
    config.contextWindow = Number(contextWindow);
  }

  const verbose = process.env[ENV_VARS.STEPWISE_VERBOSE];
  if (verbose) {
    config.verbose = verbose.toLowerCase() === 'true';
  }

  return config;
}

/**
 * Resolve and validate configuration: defaults, then environment, then
 * explicit options.
 */
export function resolveConfig(options: ConfigOptions = {}): RunConfig {
  const envConfig = loadEnvConfig();

  // Explicit options win, but an undefined option does not hide the environment
  const merged: ConfigOptions = {
    apiKey: options.apiKey ?? envConfig.apiKey,
    provider: options.provider ?? envConfig.provider,
    baseUrl: options.baseUrl ?? envConfig.baseUrl,
    model: options.model ?? envConfig.model,
    contextWindow: options.contextWindow ?? envConfig.contextWindow,
    verbose: options.verbose ?? envConfig.verbose,
  };

  const provider = resolveProvider(merged);

  const baseUrl = merged.baseUrl ?? PROVIDER_BASE_URLS[provider];
  if (!baseUrl) {
    throw invalidConfigError(`BASE_URL is required for provider "${provider}"`);
  }
  if (!URL.canParse(baseUrl)) {
    throw invalidConfigError(`BASE_URL is not a valid URL: ${baseUrl}`);
  }

  const apiKey = merged.apiKey;
  if (!apiKey) {
    throw missingApiKeyError(provider);
  }

  const model = merged.model ?? DEFAULT_CONFIG.model;
  if (!model.trim()) {
    throw invalidConfigError('MODEL_ID must not be empty');
  }

  const contextWindow = merged.contextWindow ?? DEFAULT_CONFIG.contextWindow;
  if (!Number.isInteger(contextWindow) || contextWindow <= 0) {
    throw invalidConfigError('CONTEXT_WINDOW must be a positive integer');
  }

  return Object.freeze({
    apiKey,
    provider,
    baseUrl,
    model,
    contextWindow,
    verbose: merged.verbose ?? DEFAULT_CONFIG.verbose,
  });
}

/**
 * An explicit provider wins; otherwise a custom BASE_URL decides, and with
 * neither the default provider is used.
 */
function resolveProvider(options: ConfigOptions): ModelProvider {
  if (options.provider) {
    if (!isModelProvider(options.provider)) {
      throw invalidConfigError(
        `Unknown provider "${options.provider}". Must be one of: ${SUPPORTED_PROVIDERS.join(', ')}`
      );
    }
    return options.provider;
  }

  if (options.baseUrl) {
    return detectProvider(options.baseUrl);
  }

  return DEFAULT_CONFIG.provider;
}

/**
 * Get a summary of current configuration. The API key is never printed.
 */
export function getConfigSummary(config: RunConfig): string {
  return [
    `Model: ${config.model} (${config.provider})`,
    `Endpoint: ${config.baseUrl}`,
    `Context Window: ${config.contextWindow.toLocaleString('en-US')} tokens`,
    `Verbose: ${config.verbose}`,
  ].join('\n');
}
