/**
 * Basic library usage: run one query and print the steps as they arrive.
 *
 * Run with: npx tsx examples/basic-usage.ts
 */

import 'dotenv/config';
import { createReasoningLoop, resolveConfig } from '../src/index.js';

async function main() {
  const config = resolveConfig({ verbose: true });
  const loop = createReasoningLoop(config, { maxSteps: 10 });

  const query = 'How many times does the letter r appear in "strawberry"?';
  console.log('Query:', query);
  console.log('---');

  const run = loop.run(query);
  let next = await run.next();
  while (!next.done) {
    const step = next.value;
    console.log(`${step.title} (${step.elapsedSeconds.toFixed(2)}s)${step.failed ? ' [failed]' : ''}`);
    console.log(step.content);
    console.log('---');
    next = await run.next();
  }

  console.log('Stepping iterations:', next.value.stepCount);
  console.log('Conversation length:', next.value.conversation.length);
}

main().catch((error) => {
  console.error('Error:', error);
  process.exitCode = 1;
});
