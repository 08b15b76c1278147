/**
 * Command-line arguments for the stepwise CLI.
 */
export interface CLIOptions {
  query: string;
  verbose?: boolean;
  help?: boolean;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    query: '',
  };

  const words: string[] = [];

  for (const arg of args) {
    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--') {
      continue;
    } else {
      words.push(arg);
    }
  }

  // An unquoted query arrives as several words
  options.query = words.join(' ').trim();

  return options;
}

export const HELP_TEXT = `
stepwise - step-by-step reasoning over a chat-completion model

Usage:
  stepwise [query] [options]

Arguments:
  query                     The question to reason about (prompted for when omitted)

Options:
  -v, --verbose             Print configuration and a trace line for each model call
  -h, --help                Show this help message

Environment (also read from .env):
  API_KEY                   Provider API key (required)
  PROVIDER                  groq, openai, openrouter, together, ollama or custom (default: groq)
  BASE_URL                  Chat-completions endpoint (default: the provider's)
  MODEL_ID                  Model identifier (default: llama-3.1-70b-versatile)
  CONTEXT_WINDOW            Context window in tokens, informational (default: 8000)
  STEPWISE_VERBOSE          Same as --verbose when "true"

Examples:
  stepwise "How many r's are in strawberry?"
  PROVIDER=openai MODEL_ID=gpt-4o-mini stepwise "Is 1001 prime?"
`;
