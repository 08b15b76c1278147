import { input } from '@inquirer/prompts';

export const QUERY_PROMPT = 'Enter your query for the AI assistant';

/** Asks the user for a line of text. */
export type QueryAsker = (message: string) => Promise<string>;

/**
 * Prompt on the terminal until a non-blank answer is given.
 */
export const promptForQuery: QueryAsker = (message) =>
  input({
    message,
    required: true,
    validate: (value) => value.trim() !== '' || 'Please enter a query',
  });

/**
 * Use the query from the command line, or ask for one. A blank answer asks
 * again rather than ending the run.
 */
export async function resolveQuery(argQuery: string, ask: QueryAsker = promptForQuery): Promise<string> {
  let query = argQuery.trim();

  while (!query) {
    query = (await ask(QUERY_PROMPT)).trim();
  }

  return query;
}
