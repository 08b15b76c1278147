import { z } from 'zod';

// =============================================================================
// Chat Client Types
// =============================================================================

export type ModelProvider = 'groq' | 'openai' | 'openrouter' | 'together' | 'ollama' | 'custom';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a single JSON object as the response body */
  jsonMode?: boolean;
}

export interface CompletionResult {
  content: string;
  usage: TokenUsage;
  finishReason: 'stop' | 'length' | 'content_filter' | 'unknown';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

// =============================================================================
// Step Types
// =============================================================================

export const NEXT_ACTIONS = ['continue', 'final_answer'] as const;

export type NextAction = (typeof NEXT_ACTIONS)[number];

/**
 * Shape every model reply must have. A `null` next_action is read as absent,
 * since final-answer replies commonly send it that way. Other keys the model
 * adds are kept and go back into the conversation with the step.
 */
export const StepRecordSchema = z
  .object({
    title: z.string(),
    content: z.string(),
    next_action: z
      .enum(NEXT_ACTIONS)
      .nullish()
      .transform((value) => value ?? undefined),
  })
  .passthrough();

export type StepRecord = z.infer<typeof StepRecordSchema>;

/** What a gateway call is for; only changes how a persistent failure is reported. */
export type GatewayPurpose = 'step' | 'final_answer';

export type StepKind = 'step' | 'verification' | 'final';

/**
 * One element of the reasoning sequence, as handed to the caller.
 */
export interface TimedStep {
  title: string;
  content: string;
  elapsedSeconds: number;
  kind: StepKind;
  /** True when the gateway gave up and synthesized an error record */
  failed: boolean;
}

export interface ReasoningOutcome {
  conversation: Message[];
  /** Number of the last stepping iteration (never above maxSteps) */
  stepCount: number;
}

export interface GatewayOptions {
  temperature?: number;    // Sampling temperature (default: 0.2)
  maxAttempts?: number;    // Attempts per call, including the first (default: 3)
  retryDelay?: number;     // Fixed wait between attempts in ms (default: 1000)
}

export interface ReasoningLoopOptions {
  maxSteps?: number;       // Hard cap on stepping iterations (default: 25)
  stepTokens?: number;     // max_tokens for step and verification calls (default: 300)
  finalTokens?: number;    // max_tokens for the final-answer call (default: 200)
}

// =============================================================================
// Trace/Logging Types
// =============================================================================

export type TraceEntryType =
  | 'gateway_call'
  | 'gateway_retry'
  | 'gateway_failure'
  | 'step'
  | 'fault';

export interface TraceEntry {
  type: TraceEntryType;
  timestamp: number;
  data: TraceData;
}

export type TraceData =
  | GatewayCallTrace
  | GatewayRetryTrace
  | GatewayFailureTrace
  | StepTrace
  | FaultTrace;

export interface GatewayCallTrace {
  type: 'gateway_call';
  messageCount: number;
  response: string;
  usage: TokenUsage;
  duration: number;
}

export interface GatewayRetryTrace {
  type: 'gateway_retry';
  purpose: GatewayPurpose;
  attempt: number;
  delay: number;
  message: string;
}

export interface GatewayFailureTrace {
  type: 'gateway_failure';
  purpose: GatewayPurpose;
  attempts: number;
  message: string;
  code: StepwiseErrorCode;
}

export interface StepTrace {
  type: 'step';
  title: string;
  kind: StepKind;
  elapsedSeconds: number;
}

export interface FaultTrace {
  type: 'fault';
  message: string;
}

// =============================================================================
// Errors
// =============================================================================

export class StepwiseError extends Error {
  /** User-friendly suggestion for resolving the error */
  suggestion?: string;

  constructor(
    message: string,
    public code: StepwiseErrorCode,
    public cause?: Error
  ) {
    super(message);
    this.name = 'StepwiseError';
  }
}

export type StepwiseErrorCode = 'LLM_ERROR' | 'PARSE_ERROR' | 'INVALID_CONFIG';
