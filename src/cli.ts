#!/usr/bin/env node

import 'dotenv/config';
import { resolveConfig, getConfigSummary } from './config.js';
import type { RunConfig } from './config.js';
import { createReasoningLoop } from './reasoner.js';
import { renderBanner } from './render.js';
import { formatError } from './utils/errors.js';
import { parseArgs, HELP_TEXT } from './cli/args.js';
import { processQuery } from './cli/process.js';
import { resolveQuery } from './cli/query.js';

/**
 * CLI for step-by-step reasoning.
 *
 * Usage:
 *   stepwise "Your question"
 *   stepwise            (prompts for the question)
 */

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    console.log(HELP_TEXT);
    return;
  }

  let config: RunConfig;
  try {
    config = resolveConfig({ verbose: options.verbose });
  } catch (error) {
    console.error(formatError(error));
    process.exit(1);
  }

  console.log(renderBanner(config));

  if (config.verbose) {
    console.log('\n--- Configuration ---');
    console.log(getConfigSummary(config));
    console.log('---');
  }

  const query = await resolveQuery(options.query);

  // Gateway failures surface as Error panels; only configuration errors exit non-zero
  await processQuery(query, createReasoningLoop(config));
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
