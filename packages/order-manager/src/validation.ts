import { tradingIntentSchema, ValidationError, type TradingIntent } from '@sluice/types';

/**
 * Check an untrusted intent and return it in canonical form.
 * Throws ValidationError listing every problem found.
 */
export function validateIntent(input: unknown): TradingIntent {
  const parsed = tradingIntentSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 && !issue.message.startsWith(String(issue.path[0]))
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    );
    throw new ValidationError(`Invalid trading intent: ${problems.join('; ')}`);
  }
  return parsed.data;
}

export function validateMaxRetries(maxRetries: number): number {
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ValidationError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }
  return maxRetries;
}
