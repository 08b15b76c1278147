// Main exports
export { ReasoningLoop, createReasoningLoop, DEFAULT_LOOP_OPTIONS, FINAL_ANSWER_TITLE } from './reasoner.js';
export { ModelGateway, createErrorStep, ERROR_STEP_TITLE } from './gateway.js';
export { ReasoningLogger } from './logger/index.js';

// Type exports
export type {
  // Step types
  StepRecord,
  NextAction,
  GatewayPurpose,
  TimedStep,
  StepKind,
  ReasoningOutcome,
  GatewayOptions,
  ReasoningLoopOptions,

  // Message types
  ChatRole,
  Message,
  CompletionOptions,
  CompletionResult,
  TokenUsage,
  ModelProvider,

  // Trace types
  TraceEntry,
  TraceEntryType,
  TraceData,
  StepwiseErrorCode,
} from './types.js';

export { StepRecordSchema, NEXT_ACTIONS, StepwiseError } from './types.js';

// Clients
export {
  createClient,
  OpenAIChatClient,
  PROVIDER_BASE_URLS,
  SUPPORTED_PROVIDERS,
  detectProvider,
  isModelProvider,
} from './clients/index.js';
export type { ChatClient, ChatClientConfig } from './clients/index.js';

// Configuration
export { resolveConfig, loadEnvConfig, getConfigSummary, DEFAULT_CONFIG, ENV_VARS } from './config.js';
export type { ConfigOptions, RunConfig } from './config.js';

// Prompts
export {
  SYSTEM_PROMPT,
  ASSISTANT_ACKNOWLEDGEMENT,
  VERIFICATION_PROMPT,
  FINAL_ANSWER_PROMPT,
  createInitialMessages,
} from './prompts/system.js';

// Rendering
export { renderStep, renderTotal, renderBanner, stepHeading } from './render.js';

// Utilities
export {
  llmError,
  parseError,
  invalidConfigError,
  missingApiKeyError,
  isStepwiseError,
  wrapError,
  formatError,
  parseStepRecord,
  stripCodeFence,
  formatIssues,
  withRetry,
  RetryExhaustedError,
  sleep,
} from './utils/index.js';
export type { RetryOptions } from './utils/index.js';
