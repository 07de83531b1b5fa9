/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@retirecheck/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  // Format Zod errors into user-friendly messages
  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  ${path}: ${issue.message}`;
  });

  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    issues: result.error.issues,
    formattedMessages: messages,
  });
}

/**
 * Normalize Commander.js options to a flat object
 *
 * IMPORTANT: Do NOT rename keys. Commander.js already converts --years-per-run to yearsPerRun.
 * This function only normalizes VALUES:
 * - undefined/null → dropped
 * - String "true"/"false" → boolean
 * - String numbers → number (only when the string is the canonical form of the number)
 * - All other values → preserved as-is
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (typeof value === 'string') {
      if (value === 'true') {
        normalized[key] = true;
      } else if (value === 'false') {
        normalized[key] = false;
      } else if (value.trim() !== '' && String(Number(value)) === value.trim()) {
        normalized[key] = Number(value);
      } else {
        normalized[key] = value;
      }
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}
