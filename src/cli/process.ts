import type { ReasoningLoop } from '../reasoner.js';
import { renderStep, renderTotal } from '../render.js';

/**
 * Run one query through the loop and print each step as it arrives.
 *
 * @returns the summed thinking time in seconds
 */
export async function processQuery(
  query: string,
  loop: ReasoningLoop,
  print: (line: string) => void = console.log
): Promise<number> {
  print(`\nQuery: ${query}\n`);
  print('Generating response...\n');

  let totalThinkingTime = 0;

  for await (const step of loop.run(query)) {
    totalThinkingTime += step.elapsedSeconds;
    print(renderStep(step));
  }

  print(`\n${renderTotal(totalThinkingTime)}`);
  return totalThinkingTime;
}
