import { describe, it, expect, vi, afterEach } from 'vitest';
import { ReasoningLoop, DEFAULT_LOOP_OPTIONS } from '../src/reasoner.js';
import { ModelGateway } from '../src/gateway.js';
import { ReasoningLogger } from '../src/logger/index.js';
import {
  SYSTEM_PROMPT,
  ASSISTANT_ACKNOWLEDGEMENT,
  VERIFICATION_PROMPT,
  FINAL_ANSWER_PROMPT,
} from '../src/prompts/system.js';
import type { ReasoningOutcome, TimedStep } from '../src/types.js';
import {
  MockChatClient,
  stepJson,
  createConstantMock,
  createErrorMock,
} from './helpers/mock-client.js';

/**
 * Drain a run, keeping every step and the generator's return value.
 */
async function collect(
  run: AsyncGenerator<TimedStep, ReasoningOutcome, undefined>
): Promise<{ steps: TimedStep[]; outcome: ReasoningOutcome }> {
  const steps: TimedStep[] = [];
  let next = await run.next();
  while (!next.done) {
    steps.push(next.value);
    next = await run.next();
  }
  return { steps, outcome: next.value };
}

function createLoop(client: MockChatClient, logger?: ReasoningLogger): ReasoningLoop {
  return new ReasoningLoop(new ModelGateway(client, { retryDelay: 0 }, logger), {}, logger);
}

const COMPUTE = stepJson('Compute', '2+2=4', 'final_answer');

describe('ReasoningLoop', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should emit one step, one verification and the final answer', async () => {
    const client = createConstantMock({ content: COMPUTE });
    const { steps, outcome } = await collect(createLoop(client).run('What is 2+2?'));

    expect(steps.map((s) => s.title)).toEqual(['Step 1: Compute', 'Verification: Compute', 'Final Answer']);
    expect(steps.map((s) => s.kind)).toEqual(['step', 'verification', 'final']);
    expect(steps.every((s) => s.content === '2+2=4' && !s.failed)).toBe(true);
    expect(outcome.stepCount).toBe(1);
    expect(client.getCallCount()).toBe(3);
  });

  it('should use the step budget twice and the final budget last', async () => {
    const client = createConstantMock({ content: COMPUTE });
    await collect(createLoop(client).run('What is 2+2?'));

    expect(client.getCallHistory().map((c) => c.options?.maxTokens)).toEqual([300, 300, 200]);
  });

  it('should start every conversation with directive, query and acknowledgement', async () => {
    const client = createConstantMock({ content: COMPUTE });
    await collect(createLoop(client).run('What is 2+2?'));

    expect(client.getCallHistory()[0].messages).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'What is 2+2?' },
      { role: 'assistant', content: ASSISTANT_ACKNOWLEDGEMENT },
    ]);
  });

  it('should feed each step back as an assistant message', async () => {
    const client = new MockChatClient([
      { content: stepJson('Decompose', 'Two plus two', 'continue') },
      { content: COMPUTE },
      { content: stepJson('Check', 'Counting on fingers gives 4', 'final_answer') },
      { content: stepJson('Answer', '4') },
    ]);
    const { outcome } = await collect(createLoop(client).run('What is 2+2?'));
    const history = client.getCallHistory();

    expect(history[1].messages).toHaveLength(4);
    expect(history[1].messages[3]).toEqual({
      role: 'assistant',
      content: '{"title":"Decompose","content":"Two plus two","next_action":"continue"}',
    });

    expect(history[2].messages).toHaveLength(6);
    expect(history[2].messages[5]).toEqual({ role: 'user', content: VERIFICATION_PROMPT });

    expect(history[3].messages).toHaveLength(8);
    expect(history[3].messages[6]).toEqual({
      role: 'assistant',
      content: '{"title":"Check","content":"Counting on fingers gives 4","next_action":"final_answer"}',
    });
    expect(history[3].messages[7]).toEqual({ role: 'user', content: FINAL_ANSWER_PROMPT });

    expect(outcome.conversation).toHaveLength(9);
    expect(outcome.conversation[8]).toEqual({
      role: 'assistant',
      content: '{"title":"Answer","content":"4"}',
    });
  });

  it('should feed back keys beyond the step shape unchanged', async () => {
    const client = new MockChatClient([
      { content: '{"title":"T","content":"C","next_action":"final_answer","confidence":0.9}' },
      { content: stepJson('Check', 'Same result') },
      { content: stepJson('Answer', 'C') },
    ]);
    const { outcome } = await collect(createLoop(client).run('Question'));

    expect(outcome.conversation[3]).toEqual({
      role: 'assistant',
      content: '{"title":"T","content":"C","next_action":"final_answer","confidence":0.9}',
    });
  });

  it('should grow the conversation by one message per step plus two per closing turn', async () => {
    const client = new MockChatClient((callIndex) => ({
      content: stepJson(`Part ${callIndex + 1}`, 'working', callIndex < 3 ? 'continue' : 'final_answer'),
    }));
    const { steps, outcome } = await collect(createLoop(client).run('Long problem'));

    // 4 stepping iterations: 3 initial + 4 steps + verification pair + final pair
    expect(outcome.stepCount).toBe(4);
    expect(steps).toHaveLength(6);
    expect(outcome.conversation).toHaveLength(3 + 4 + 2 + 2);
    expect(client.getCallHistory()[4].messages).toHaveLength(3 + 4 + 1);
    expect(client.getCallHistory()[5].messages).toHaveLength(3 + 4 + 2 + 1);
  });

  it('should stop at 25 steps when the model never finishes', async () => {
    const client = createConstantMock({ content: stepJson('Think', 'still going', 'continue') });
    const { steps, outcome } = await collect(createLoop(client).run('Endless'));

    expect(steps).toHaveLength(27);
    expect(steps[24].title).toBe('Step 25: Think');
    expect(steps[25].title).toBe('Verification: Think');
    expect(steps[26].title).toBe('Final Answer');
    expect(steps.filter((s) => s.kind === 'step')).toHaveLength(DEFAULT_LOOP_OPTIONS.maxSteps);
    expect(outcome.stepCount).toBe(25);
    expect(outcome.conversation).toHaveLength(3 + 25 + 4);
    expect(client.getCallCount()).toBe(27);
  });

  it('should honor a custom step cap', async () => {
    const client = createConstantMock({ content: stepJson('Think', 'still going', 'continue') });
    const loop = new ReasoningLoop(new ModelGateway(client, { retryDelay: 0 }), { maxSteps: 3 });

    const { steps } = await collect(loop.run('Endless'));

    expect(steps.map((s) => s.title)).toEqual([
      'Step 1: Think',
      'Step 2: Think',
      'Step 3: Think',
      'Verification: Think',
      'Final Answer',
    ]);
  });

  it('should leave stepping when a step has no next_action', async () => {
    const logger = new ReasoningLogger();
    const client = new MockChatClient([
      { content: stepJson('Guess', 'Probably 4') },
      { content: COMPUTE },
      { content: stepJson('Answer', '4') },
    ]);
    const { steps } = await collect(createLoop(client, logger).run('What is 2+2?'));

    expect(steps.map((s) => s.kind)).toEqual(['step', 'verification', 'final']);
    const faults = logger.getEntries().filter((e) => e.data.type === 'fault');
    expect(faults).toHaveLength(1);
    expect(faults[0].data).toEqual({
      type: 'fault',
      message: 'Step 1 has no next_action; moving on to verification',
    });
  });

  it('should still reach the final answer when every call fails', async () => {
    const client = createErrorMock(new Error('boom'));
    const { steps, outcome } = await collect(createLoop(client).run('What is 2+2?'));

    expect(steps).toEqual([
      expect.objectContaining({
        title: 'Step 1: Error',
        content: 'Failed to generate step after 3 attempts. Error: boom',
        kind: 'step',
        failed: true,
      }),
      expect.objectContaining({
        title: 'Verification: Error',
        content: 'Failed to generate step after 3 attempts. Error: boom',
        kind: 'verification',
        failed: true,
      }),
      expect.objectContaining({
        title: 'Final Answer',
        content: 'Failed to generate final answer after 3 attempts. Error: boom',
        kind: 'final',
        failed: true,
      }),
    ]);
    expect(client.getCallCount()).toBe(9);
    expect(outcome.conversation[3]).toEqual({
      role: 'assistant',
      content: '{"title":"Error","content":"Failed to generate step after 3 attempts. Error: boom","next_action":"final_answer"}',
    });
  });

  it('should time each failing call at two seconds of retry waits', async () => {
    vi.useFakeTimers();
    const client = createErrorMock(new Error('connection refused'));
    const loop = new ReasoningLoop(new ModelGateway(client));

    const pending = collect(loop.run('What is 2+2?'));
    await vi.advanceTimersByTimeAsync(6000);
    const { steps } = await pending;

    expect(steps.map((s) => s.elapsedSeconds)).toEqual([2, 2, 2]);
    expect(steps[2].title).toBe('Final Answer');
  });

  it('should recover when only the first step fails', async () => {
    const client = new MockChatClient((callIndex) =>
      callIndex < 3 ? { error: new Error('503 Service Unavailable') } : { content: COMPUTE }
    );
    const { steps } = await collect(createLoop(client).run('What is 2+2?'));

    expect(steps.map((s) => [s.title, s.failed])).toEqual([
      ['Step 1: Error', true],
      ['Verification: Compute', false],
      ['Final Answer', false],
    ]);
  });

  it('should only call the model when the next step is pulled', async () => {
    const client = createConstantMock({ content: stepJson('Think', 'still going', 'continue') });
    const run = createLoop(client).run('Lazy');

    expect(client.getCallCount()).toBe(0);

    const first = await run.next();
    expect(first.done).toBe(false);
    expect(client.getCallCount()).toBe(1);

    await run.return({ conversation: [], stepCount: 0 });
    expect(client.getCallCount()).toBe(1);
  });

  it('should start a fresh conversation for every run', async () => {
    const client = createConstantMock({ content: COMPUTE });
    const loop = createLoop(client);

    await collect(loop.run('First question'));
    await collect(loop.run('Second question'));

    const history = client.getCallHistory();
    expect(history[3].messages).toHaveLength(3);
    expect(history[3].messages[1]).toEqual({ role: 'user', content: 'Second question' });
  });

  it('should log every emitted step', async () => {
    const logger = new ReasoningLogger();
    const client = createConstantMock({ content: COMPUTE });
    await collect(createLoop(client, logger).run('What is 2+2?'));

    const stepTitles = logger
      .getEntries()
      .flatMap((e) => (e.data.type === 'step' ? [e.data.title] : []));
    expect(stepTitles).toEqual(['Step 1: Compute', 'Verification: Compute', 'Final Answer']);
  });

  it('should reject a step cap below one', () => {
    const gateway = new ModelGateway(new MockChatClient());
    expect(() => new ReasoningLoop(gateway, { maxSteps: 0 })).toThrow(RangeError);
  });
});
