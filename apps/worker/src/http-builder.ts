import { z } from 'zod';
import {
  FatalSubmissionError,
  TransientNetworkError,
  ValidationError,
  errorMessage,
  type SignedPayload,
  type TradingIntent,
  type TransactionBuilder,
} from '@sluice/types';

const builderResponseSchema = z.object({
  /** Base64-encoded, fully signed transactions */
  transactions: z.array(z.string().min(1)).min(1),
});

const builderErrorSchema = z.object({ error: z.string() });

/**
 * Transaction builder reached over HTTP.
 *
 * POSTs the intent as JSON to `url` and expects
 * `{ transactions: string[] }` back. A 4xx answer means the builder refused
 * the intent (ValidationError); 429, 5xx and network failures are transient.
 */
export class HttpTransactionBuilder implements TransactionBuilder {
  constructor(
    private url: string,
    private timeoutMs = 10_000,
  ) {}

  async build(intent: TradingIntent, signal?: AbortSignal): Promise<SignedPayload> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(intent),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new TransientNetworkError(`Builder request timed out after ${this.timeoutMs}ms`);
      }
      throw new TransientNetworkError(`Builder unreachable: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      const text = await response.text();
      const message = `Builder HTTP ${response.status}: ${describeError(text)}`;
      if (response.status === 429 || response.status >= 500) {
        throw new TransientNetworkError(message);
      }
      throw new ValidationError(message);
    }

    const body: unknown = await response.json().catch(() => undefined);
    const parsed = builderResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FatalSubmissionError('Builder returned a malformed response');
    }

    return {
      transactions: parsed.data.transactions.map((b64) => new Uint8Array(Buffer.from(b64, 'base64'))),
    };
  }
}

/** Prefer the `{ error }` field of a JSON error body */
function describeError(text: string): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text.slice(0, 200);
  }
  const parsed = builderErrorSchema.safeParse(body);
  return parsed.success ? parsed.data.error : text.slice(0, 200);
}
