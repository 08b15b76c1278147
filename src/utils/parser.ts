import type { ZodError } from 'zod';
import { StepRecordSchema, type StepRecord } from '../types.js';
import { parseError } from './errors.js';

// A reply that is nothing but one fenced block, e.g. ```json\n{...}\n```
const FENCED_REPLY_REGEX = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/;

/**
 * Strip a code fence wrapped around the whole reply, if there is one.
 */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const match = trimmed.match(FENCED_REPLY_REGEX);
  return match ? match[1].trim() : trimmed;
}

/**
 * Summarize schema issues as `path: message` pairs.
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse a model reply into a step record.
 *
 * @throws StepwiseError with code PARSE_ERROR when the reply is not JSON, or is
 * JSON without a string `title` and `content`, or carries an unknown `next_action`.
 */
export function parseStepRecord(raw: string): StepRecord {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    throw parseError(`reply is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const result = StepRecordSchema.safeParse(data);
  if (!result.success) {
    throw parseError(formatIssues(result.error));
  }

  return result.data;
}
