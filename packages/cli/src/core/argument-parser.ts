/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@fiometrics/utils';

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
