import type {
  GatewayPurpose,
  StepwiseErrorCode,
  TimedStep,
  TokenUsage,
  TraceData,
  TraceEntry,
  TraceEntryType,
} from '../types.js';

/**
 * Logger for reasoning runs. Keeps a trace of every gateway call, retry and
 * emitted step; prints a summary line for each when verbose.
 */
export class ReasoningLogger {
  private entries: TraceEntry[] = [];
  private verbose: boolean;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  /**
   * Log a gateway attempt that got a reply back from the provider.
   */
  logGatewayCall(messageCount: number, response: string, usage: TokenUsage, duration: number): void {
    this.addEntry('gateway_call', {
      type: 'gateway_call',
      messageCount,
      response,
      usage,
      duration,
    });

    if (this.verbose) {
      console.log('[stepwise] Gateway call:', {
        messages: messageCount,
        responseLength: response.length,
        tokens: usage.totalTokens,
        duration,
      });
    }
  }

  /**
   * Log a failed attempt that will be retried.
   */
  logGatewayRetry(purpose: GatewayPurpose, attempt: number, delay: number, message: string): void {
    this.addEntry('gateway_retry', {
      type: 'gateway_retry',
      purpose,
      attempt,
      delay,
      message,
    });

    if (this.verbose) {
      console.error(`[stepwise] Attempt ${attempt} failed (${purpose}), retrying in ${delay}ms:`, message);
    }
  }

  /**
   * Log a call that failed on every attempt.
   */
  logGatewayFailure(purpose: GatewayPurpose, attempts: number, message: string, code: StepwiseErrorCode): void {
    this.addEntry('gateway_failure', {
      type: 'gateway_failure',
      purpose,
      attempts,
      message,
      code,
    });

    if (this.verbose) {
      console.error(`[stepwise] Gave up after ${attempts} attempts (${purpose}, ${code}):`, message);
    }
  }

  logStep(step: TimedStep): void {
    this.addEntry('step', {
      type: 'step',
      title: step.title,
      kind: step.kind,
      elapsedSeconds: step.elapsedSeconds,
    });

    if (this.verbose) {
      console.log(`[stepwise] ${step.kind} "${step.title}" in ${step.elapsedSeconds.toFixed(2)}s`);
    }
  }

  /**
   * Log a protocol fault the loop recovered from.
   */
  logFault(message: string): void {
    this.addEntry('fault', { type: 'fault', message });

    if (this.verbose) {
      console.error('[stepwise] Fault:', message);
    }
  }

  private addEntry(type: TraceEntryType, data: TraceData): void {
    this.entries.push({
      type,
      timestamp: Date.now(),
      data,
    });
  }

  getEntries(): TraceEntry[] {
    return [...this.entries];
  }

  /**
   * Get total token usage across all gateway calls.
   */
  getTotalUsage(): TokenUsage {
    let promptTokens = 0;
    let completionTokens = 0;

    for (const entry of this.entries) {
      if (entry.data.type === 'gateway_call') {
        promptTokens += entry.data.usage.promptTokens;
        completionTokens += entry.data.usage.completionTokens;
      }
    }

    return {
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens,
    };
  }

  /**
   * Number of provider round trips that returned a reply.
   */
  getCallCount(): number {
    return this.entries.filter((e) => e.data.type === 'gateway_call').length;
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Export entries as JSONL string.
   */
  toJSONL(): string {
    return this.entries.map((e) => JSON.stringify(e)).join('\n');
  }
}
