import {
  errorMessage,
  FatalSubmissionError,
  isTaxonomyError,
  TransientNetworkError,
  type TaxonomyError,
} from '@sluice/types';
import { DeadlineExceededError } from './deadline.js';

/** Messages that will fail the same way on every backend */
const FATAL_PATTERNS: RegExp[] = [
  /insufficient (funds|lamports)/i,
  /signature verification failed/i,
  /invalid signature/i,
  /custom program error/i,
  /instructionerror/i,
  /accountnotfound/i,
  /invalid account data/i,
];

/**
 * Map anything a backend throws onto the error taxonomy.
 * Taxonomy errors keep their kind; only known deterministic rejections
 * are fatal.
 */
export function classifyError(err: unknown): TaxonomyError {
  if (isTaxonomyError(err)) return err;

  const message = errorMessage(err);
  if (err instanceof DeadlineExceededError) {
    return new TransientNetworkError(message);
  }

  if (FATAL_PATTERNS.some((p) => p.test(message))) {
    return new FatalSubmissionError(message);
  }
  // Rate limits, 5xx, resets, stale blockhash and anything unrecognised
  return new TransientNetworkError(message);
}
