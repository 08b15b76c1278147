import type { ChatClient } from './clients/types.js';
import type { CompletionResult, GatewayOptions, GatewayPurpose, Message, StepRecord } from './types.js';
import { ReasoningLogger } from './logger/index.js';
import { parseStepRecord } from './utils/parser.js';
import { RetryExhaustedError, withRetry } from './utils/retry.js';
import { llmError, wrapError } from './utils/errors.js';

const DEFAULT_OPTIONS: Required<GatewayOptions> = {
  temperature: 0.2,
  maxAttempts: 3,
  retryDelay: 1000,
};

/** Title of every record the gateway synthesizes after giving up. */
export const ERROR_STEP_TITLE = 'Error';

/**
 * Build the record returned when every attempt failed. A failed step is marked
 * `final_answer` so the loop stops stepping; a failed final answer has no
 * next_action.
 */
export function createErrorStep(purpose: GatewayPurpose, attempts: number, message: string): StepRecord {
  const subject = purpose === 'final_answer' ? 'final answer' : 'step';
  const content = `Failed to generate ${subject} after ${attempts} attempts. Error: ${message}`;

  return purpose === 'step'
    ? { title: ERROR_STEP_TITLE, content, next_action: 'final_answer' }
    : { title: ERROR_STEP_TITLE, content };
}

/**
 * Model Gateway - one logical model call with a fixed retry policy.
 *
 * Every failure (provider error, non-JSON reply, reply without a valid step
 * shape) is turned into data here; `call` never rejects.
 */
export class ModelGateway {
  private client: ChatClient;
  private options: Required<GatewayOptions>;
  private logger: ReasoningLogger;
  private failedRecords = new WeakSet<StepRecord>();

  constructor(client: ChatClient, options: GatewayOptions = {}, logger: ReasoningLogger = new ReasoningLogger()) {
    this.client = client;
    this.options = {
      temperature: options.temperature ?? DEFAULT_OPTIONS.temperature,
      maxAttempts: options.maxAttempts ?? DEFAULT_OPTIONS.maxAttempts,
      retryDelay: options.retryDelay ?? DEFAULT_OPTIONS.retryDelay,
    };
    this.logger = logger;

    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
  }

  /**
   * Ask the model for the next record of the conversation.
   */
  async call(conversation: readonly Message[], maxTokens: number, purpose: GatewayPurpose): Promise<StepRecord> {
    // Later appends by the loop must not leak into this request
    const messages = conversation.map((m) => ({ ...m }));

    try {
      return await withRetry(() => this.attempt(messages, maxTokens), {
        maxRetries: this.options.maxAttempts - 1,
        delay: this.options.retryDelay,
        onRetry: (error, attempt, delay) => {
          this.logger.logGatewayRetry(purpose, attempt, delay, wrapError(error).message);
        },
      });
    } catch (error) {
      const failure = wrapError(error instanceof RetryExhaustedError ? error.lastError : error);
      this.logger.logGatewayFailure(purpose, this.options.maxAttempts, failure.message, failure.code);

      const record = createErrorStep(purpose, this.options.maxAttempts, failure.message);
      this.failedRecords.add(record);
      return record;
    }
  }

  /**
   * Whether a record came from `createErrorStep` in this gateway rather than
   * from the model, even if the model titled its own step "Error".
   */
  isErrorStep(record: StepRecord): boolean {
    return this.failedRecords.has(record);
  }

  private async attempt(messages: Message[], maxTokens: number): Promise<StepRecord> {
    const start = Date.now();
    let completion: CompletionResult;
    try {
      completion = await this.client.complete(messages, {
        maxTokens,
        temperature: this.options.temperature,
        jsonMode: true,
      });
    } catch (error) {
      throw error instanceof Error ? llmError(error.message, error) : llmError(String(error));
    }

    this.logger.logGatewayCall(messages.length, completion.content, completion.usage, Date.now() - start);

    return parseStepRecord(completion.content);
  }
}
