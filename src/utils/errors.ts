import { StepwiseError, StepwiseErrorCode } from '../types.js';

export { StepwiseError } from '../types.js';

/**
 * User-friendly error suggestions for common issues.
 */
const ERROR_SUGGESTIONS: Record<StepwiseErrorCode, string> = {
  LLM_ERROR: 'Check your API key, BASE_URL and network connection. If the issue persists, try again later.',
  PARSE_ERROR: 'The model reply was not a step object. Try again, or pick a model that supports JSON mode.',
  INVALID_CONFIG: 'Check your environment or .env file for typos or invalid values.',
};

/**
 * Create an error for a failed provider call.
 */
export function llmError(message: string, cause?: Error): StepwiseError {
  const error = new StepwiseError(message, 'LLM_ERROR', cause);
  error.suggestion = ERROR_SUGGESTIONS.LLM_ERROR;
  return error;
}

/**
 * Create a parse error for a model reply that is not a valid step.
 */
export function parseError(message: string): StepwiseError {
  const fullMessage = `Failed to parse model output: ${message}`;
  const error = new StepwiseError(fullMessage, 'PARSE_ERROR');
  error.suggestion = ERROR_SUGGESTIONS.PARSE_ERROR;
  return error;
}

/**
 * Create an invalid configuration error.
 */
export function invalidConfigError(message: string): StepwiseError {
  const fullMessage = `Invalid configuration: ${message}`;
  const error = new StepwiseError(fullMessage, 'INVALID_CONFIG');
  error.suggestion = ERROR_SUGGESTIONS.INVALID_CONFIG;
  return error;
}

/**
 * Create the error raised when no API key is configured.
 */
export function missingApiKeyError(provider: string): StepwiseError {
  const error = new StepwiseError(`Missing ${provider} API key`, 'INVALID_CONFIG');
  error.suggestion = 'Set the API_KEY environment variable, or add it to a .env file in the working directory.';
  return error;
}

export function isStepwiseError(error: unknown): error is StepwiseError {
  return error instanceof StepwiseError;
}

/**
 * Wrap an unknown error as a StepwiseError, keeping its message.
 */
export function wrapError(error: unknown, defaultCode: StepwiseErrorCode = 'LLM_ERROR'): StepwiseError {
  if (isStepwiseError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const wrapped = new StepwiseError(error.message, defaultCode, error);
    wrapped.suggestion = ERROR_SUGGESTIONS[defaultCode];
    return wrapped;
  }

  const wrapped = new StepwiseError(String(error), defaultCode);
  wrapped.suggestion = ERROR_SUGGESTIONS[defaultCode];
  return wrapped;
}

/**
 * Format an error for display to the user.
 */
export function formatError(error: unknown): string {
  if (isStepwiseError(error)) {
    const lines = [`Error [${error.code}]: ${error.message}`];

    if (error.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${error.suggestion}`);
    }

    if (error.cause) {
      lines.push('');
      lines.push(`Caused by: ${error.cause.message}`);
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
