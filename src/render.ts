import boxen from 'boxen';
import chalk from 'chalk';
import type { TimedStep } from './types.js';
import type { RunConfig } from './config.js';

/**
 * Styled heading for a step panel. Steps and verification are underlined,
 * the final answer is bold only, failures are red.
 */
export function stepHeading(step: TimedStep): string {
  if (step.failed) {
    return chalk.bold.red(step.title);
  }
  return step.kind === 'final' ? chalk.bold(step.title) : chalk.bold.underline(step.title);
}

/**
 * Render one step as a bordered panel.
 */
export function renderStep(step: TimedStep): string {
  const borderColor = step.failed ? 'red' : step.kind === 'final' ? 'green' : 'cyan';
  return boxen(`${stepHeading(step)}\n\n${step.content}`, {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: 'round',
    borderColor,
  });
}

export function renderTotal(totalSeconds: number): string {
  return `Total thinking time: ${totalSeconds.toFixed(2)} seconds`;
}

/**
 * Intro panel shown before the query prompt.
 */
export function renderBanner(config: RunConfig): string {
  const lines = [
    chalk.bold(`stepwise: ${config.model} on ${config.provider}`),
    chalk.dim(`Endpoint: ${config.baseUrl}`),
    '',
    'Chains model calls into explicit reasoning steps, checks the result a second way,',
    'then answers. Accuracy has not been formally evaluated.',
  ];

  return boxen(lines.join('\n'), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: 'round',
    borderColor: 'blue',
  });
}
