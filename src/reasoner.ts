import type {
  GatewayOptions,
  GatewayPurpose,
  Message,
  ReasoningLoopOptions,
  ReasoningOutcome,
  StepKind,
  StepRecord,
  TimedStep,
} from './types.js';
import type { RunConfig } from './config.js';
import { createClient } from './clients/index.js';
import { ModelGateway } from './gateway.js';
import { ReasoningLogger } from './logger/index.js';
import { createInitialMessages, FINAL_ANSWER_PROMPT, VERIFICATION_PROMPT } from './prompts/system.js';

/**
 * Default loop limits and token budgets.
 */
export const DEFAULT_LOOP_OPTIONS: Required<ReasoningLoopOptions> = {
  maxSteps: 25,
  stepTokens: 300,
  finalTokens: 200,
};

export const FINAL_ANSWER_TITLE = 'Final Answer';

/**
 * Reasoning Loop - drives one query through the step-by-step protocol.
 *
 * A run goes through stepping (one gateway call per step until the model
 * asks for the final answer or `maxSteps` is reached), then exactly one
 * verification turn, then exactly one final-answer turn. Steps are yielded
 * as they complete.
 *
 * @example
 * ```typescript
 * const loop = new ReasoningLoop(new ModelGateway(client));
 *
 * for await (const step of loop.run('How many primes are below 30?')) {
 *   console.log(step.title, step.content);
 * }
 * ```
 */
export class ReasoningLoop {
  private gateway: ModelGateway;
  private options: Required<ReasoningLoopOptions>;
  private logger: ReasoningLogger;

  constructor(
    gateway: ModelGateway,
    options: ReasoningLoopOptions = {},
    logger: ReasoningLogger = new ReasoningLogger()
  ) {
    this.gateway = gateway;
    this.options = {
      maxSteps: options.maxSteps ?? DEFAULT_LOOP_OPTIONS.maxSteps,
      stepTokens: options.stepTokens ?? DEFAULT_LOOP_OPTIONS.stepTokens,
      finalTokens: options.finalTokens ?? DEFAULT_LOOP_OPTIONS.finalTokens,
    };
    this.logger = logger;

    if (!Number.isInteger(this.options.maxSteps) || this.options.maxSteps < 1) {
      throw new RangeError('maxSteps must be a positive integer');
    }
  }

  /**
   * Run one query. Each call starts a fresh conversation; the generator's
   * return value holds the final conversation and step count.
   */
  async *run(query: string): AsyncGenerator<TimedStep, ReasoningOutcome, undefined> {
    const conversation = createInitialMessages(query);
    let stepCount = 1;

    for (;;) {
      const { record, step } = await this.timedCall(
        conversation,
        this.options.stepTokens,
        'step',
        'step',
        (r) => `Step ${stepCount}: ${r.title}`
      );
      yield step;
      conversation.push(this.assistantMessage(record));

      if (this.isLastStep(record, stepCount)) {
        break;
      }
      stepCount++;
    }

    conversation.push({ role: 'user', content: VERIFICATION_PROMPT });
    const verification = await this.timedCall(
      conversation,
      this.options.stepTokens,
      'step',
      'verification',
      (r) => `Verification: ${r.title}`
    );
    yield verification.step;
    conversation.push(this.assistantMessage(verification.record));

    conversation.push({ role: 'user', content: FINAL_ANSWER_PROMPT });
    const final = await this.timedCall(
      conversation,
      this.options.finalTokens,
      'final_answer',
      'final',
      () => FINAL_ANSWER_TITLE
    );
    yield final.step;
    conversation.push(this.assistantMessage(final.record));

    return { conversation, stepCount };
  }

  /**
   * Decide whether stepping ends after this record. A record without a
   * next_action ends stepping as a fault; it is never read as "continue".
   */
  private isLastStep(record: StepRecord, stepCount: number): boolean {
    if (record.next_action === 'final_answer') {
      return true;
    }

    if (record.next_action === undefined) {
      this.logger.logFault(`Step ${stepCount} has no next_action; moving on to verification`);
      return true;
    }

    if (stepCount >= this.options.maxSteps) {
      this.logger.logFault(`Step limit of ${this.options.maxSteps} reached; moving on to verification`);
      return true;
    }

    return false;
  }

  private async timedCall(
    conversation: Message[],
    maxTokens: number,
    purpose: GatewayPurpose,
    kind: StepKind,
    titleFor: (record: StepRecord) => string
  ): Promise<{ record: StepRecord; step: TimedStep }> {
    const start = Date.now();
    const record = await this.gateway.call(conversation, maxTokens, purpose);
    const elapsedSeconds = (Date.now() - start) / 1000;

    const step: TimedStep = {
      title: titleFor(record),
      content: record.content,
      elapsedSeconds,
      kind,
      failed: this.gateway.isErrorStep(record),
    };
    this.logger.logStep(step);

    return { record, step };
  }

  /**
   * The record goes back into the conversation as the model's own reply, so
   * the next call sees every earlier step.
   */
  private assistantMessage(record: StepRecord): Message {
    return { role: 'assistant', content: JSON.stringify(record) };
  }
}

/**
 * Wire a loop to a resolved configuration: client, logger and gateway.
 */
export function createReasoningLoop(
  config: RunConfig,
  options: ReasoningLoopOptions & GatewayOptions = {}
): ReasoningLoop {
  const logger = new ReasoningLogger(config.verbose);
  const { maxSteps, stepTokens, finalTokens, ...gatewayOptions } = options;
  const gateway = new ModelGateway(createClient(config), gatewayOptions, logger);
  return new ReasoningLoop(gateway, { maxSteps, stepTokens, finalTokens }, logger);
}
