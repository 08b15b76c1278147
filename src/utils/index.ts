export { parseStepRecord, stripCodeFence, formatIssues } from './parser.js';

export {
  StepwiseError,
  llmError,
  parseError,
  invalidConfigError,
  missingApiKeyError,
  isStepwiseError,
  wrapError,
  formatError,
} from './errors.js';

export {
  withRetry,
  RetryExhaustedError,
  sleep,
} from './retry.js';
export type { RetryOptions } from './retry.js';
