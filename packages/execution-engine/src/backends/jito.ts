import { z } from 'zod';
import {
  TransientNetworkError,
  ValidationError,
  type ConfirmationStatus,
  type ExecutionBackend,
  type Reconciliation,
  type SignedPayload,
  type Submission,
} from '@sluice/types';
import type { RpcConnection } from './rpc.js';
import { commitmentToLevel, decodePayload, summarizeSignatureStatuses } from './solana.js';

/** Most transactions a block engine accepts in one bundle */
export const MAX_BUNDLE_SIZE = 5;

export const JITO_MAINNET_ENDPOINTS = [
  'https://mainnet.block-engine.jito.wtf',
  'https://amsterdam.mainnet.block-engine.jito.wtf',
  'https://frankfurt.mainnet.block-engine.jito.wtf',
  'https://ny.mainnet.block-engine.jito.wtf',
  'https://tokyo.mainnet.block-engine.jito.wtf',
];

export interface JitoBundleBackendConfig {
  name: string;
  /** Block engine base URL */
  endpoint: string;
}

export const DEFAULT_JITO_BACKEND_CONFIG: JitoBundleBackendConfig = {
  name: 'jito',
  endpoint: JITO_MAINNET_ENDPOINTS[0],
};

// ─── Response shapes ─────────────────────────────────────────────────────────

const rpcEnvelopeSchema = z.object({
  result: z.unknown().optional(),
  error: z.object({ code: z.number().optional(), message: z.string() }).optional(),
});

const bundleIdSchema = z.string().min(1);

const bundleStatusesSchema = z.object({
  value: z.array(
    z
      .object({
        bundle_id: z.string(),
        transactions: z.array(z.string()),
        slot: z.number(),
        confirmation_status: z.enum(['processed', 'confirmed', 'finalized']).nullish(),
        err: z.unknown().optional(),
      })
      .nullable(),
  ),
});

const inflightStatusesSchema = z.object({
  value: z.array(
    z
      .object({
        bundle_id: z.string(),
        status: z.enum(['Invalid', 'Pending', 'Failed', 'Landed']),
        landed_slot: z.number().nullable(),
      })
      .nullable(),
  ),
});

/** Bundle errors come back as `{ Ok: null }` on success */
function bundleError(err: unknown): string | null {
  if (err === undefined || err === null) return null;
  const parsed = z.object({ Ok: z.null() }).safeParse(err);
  return parsed.success ? null : JSON.stringify(err);
}

/**
 * Jito bundle relay backend
 *
 * Delivers 1..5 transactions as one all-or-nothing bundle through a block
 * engine's JSON-RPC API. Bundle status is read from `getBundleStatuses`
 * (landed bundles) and `getInflightBundleStatuses` (the last five
 * minutes). Reconciliation looks the member signatures up on a regular RPC
 * node, since a timed-out submit leaves no bundle id.
 */
export class JitoBundleBackend implements ExecutionBackend {
  readonly name: string;
  readonly supportsAtomicGroups = true;
  private config: JitoBundleBackendConfig;

  constructor(
    private connection: Pick<RpcConnection, 'getSignatureStatuses'>,
    config: Partial<JitoBundleBackendConfig> = {},
    private now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_JITO_BACKEND_CONFIG, ...config };
    this.name = this.config.name;
  }

  async submit(payload: SignedPayload, signal: AbortSignal): Promise<Submission> {
    const count = payload.transactions.length;
    if (count === 0 || count > MAX_BUNDLE_SIZE) {
      throw new ValidationError(`Bundle must hold 1..${MAX_BUNDLE_SIZE} transactions, got ${count}`);
    }
    const signatures = decodePayload(payload).map((tx) => tx.signature);
    const encoded = payload.transactions.map((bytes) => Buffer.from(bytes).toString('base64'));

    const result = await this.call('sendBundle', [encoded, { encoding: 'base64' }], signal);
    const bundleId = bundleIdSchema.parse(result);

    return { reference: bundleId, signatures, submittedAt: this.now() };
  }

  async confirm(submission: Submission, signal: AbortSignal): Promise<ConfirmationStatus> {
    const bundleId = submission.reference;

    const landed = bundleStatusesSchema.parse(
      await this.call('getBundleStatuses', [[bundleId]], signal),
    ).value[0];
    if (landed) {
      const error = bundleError(landed.err);
      if (error) return { state: 'failed', error, slot: landed.slot };
      return {
        state: 'progress',
        level: commitmentToLevel(landed.confirmation_status ?? undefined),
        landedCount: landed.transactions.length,
        slot: landed.slot,
      };
    }

    const inflight = inflightStatusesSchema.parse(
      await this.call('getInflightBundleStatuses', [[bundleId]], signal),
    ).value[0];

    switch (inflight?.status) {
      case 'Failed':
        return { state: 'dropped', reason: `bundle ${bundleId} failed in the block engine` };
      case 'Pending':
        return { state: 'progress', level: 'pending' };
      case 'Landed':
        // Landed but not yet indexed by getBundleStatuses
        return { state: 'progress', level: 'submitted', slot: inflight.landed_slot ?? undefined };
      default:
        return { state: 'not_found' };
    }
  }

  async reconcile(payload: SignedPayload, signal: AbortSignal): Promise<Reconciliation> {
    const signatures = decodePayload(payload).map((tx) => tx.signature);
    signal.throwIfAborted();

    const { value } = await this.connection.getSignatureStatuses(signatures, {
      searchTransactionHistory: true,
    });
    return {
      // No bundle id survives a timed-out submit; the first signature stands in
      submission: { reference: signatures[0], signatures, submittedAt: this.now() },
      status: summarizeSignatureStatuses(value),
    };
  }

  // ---- Private ----

  private async call(method: string, params: unknown[], signal: AbortSignal): Promise<unknown> {
    const response = await fetch(`${this.config.endpoint}/api/v1/bundles`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ jsonrpc: '2.0', id: 1, method, params }),
      signal,
    });

    if (!response.ok) {
      const text = await response.text();
      const message = `Jito HTTP ${response.status}: ${text.slice(0, 200)}`;
      if (response.status === 429 || response.status >= 500) {
        throw new TransientNetworkError(message);
      }
      throw new Error(message);
    }

    const body: unknown = await response.json();
    const envelope = rpcEnvelopeSchema.parse(body);
    if (envelope.error) {
      throw new Error(`Jito ${method} error: ${envelope.error.message}`);
    }
    return envelope.result;
  }
}
