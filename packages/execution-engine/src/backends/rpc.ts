import type { Connection } from '@solana/web3.js';
import {
  ValidationError,
  type ConfirmationStatus,
  type ExecutionBackend,
  type Reconciliation,
  type SignedPayload,
  type SimulationResult,
  type Submission,
} from '@sluice/types';
import { decodePayload, summarizeSignatureStatuses, type DecodedTransaction } from './solana.js';

/** The Connection calls this backend makes */
export type RpcConnection = Pick<
  Connection,
  'sendRawTransaction' | 'getSignatureStatuses' | 'simulateTransaction' | 'isBlockhashValid'
>;

export interface SolanaRpcBackendConfig {
  name: string;
  /** Skip the node's own preflight; on when the executor simulates */
  skipPreflight: boolean;
}

export const DEFAULT_RPC_BACKEND_CONFIG: SolanaRpcBackendConfig = {
  name: 'rpc',
  skipPreflight: true,
};

/** Simulation errors that say nothing about the payload itself */
const TRANSIENT_SIMULATION_ERRORS = new Set(['BlockhashNotFound']);

/**
 * Direct RPC backend
 *
 * Sends one signed transaction with `sendRawTransaction` and tracks it by
 * signature. The node is told not to rebroadcast (`maxRetries: 0`) so every
 * resend is a decision the engine makes.
 */
export class SolanaRpcBackend implements ExecutionBackend {
  readonly name: string;
  readonly supportsAtomicGroups = false;
  private config: SolanaRpcBackendConfig;
  /** Blockhash of each tracked signature, used to tell dropped from pending */
  private blockhashes: Map<string, string> = new Map();

  constructor(
    private connection: RpcConnection,
    config: Partial<SolanaRpcBackendConfig> = {},
    private now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_RPC_BACKEND_CONFIG, ...config };
    this.name = this.config.name;
  }

  async submit(payload: SignedPayload, signal: AbortSignal): Promise<Submission> {
    const [decoded] = this.single(payload);
    signal.throwIfAborted();

    const signature = await this.connection.sendRawTransaction(decoded.transaction.serialize(), {
      skipPreflight: this.config.skipPreflight,
      maxRetries: 0,
    });
    // A send that outlived its deadline is reconciled and released by the executor
    if (!signal.aborted) this.blockhashes.set(signature, decoded.recentBlockhash);

    return { reference: signature, signatures: [signature], submittedAt: this.now() };
  }

  async confirm(submission: Submission, signal: AbortSignal): Promise<ConfirmationStatus> {
    signal.throwIfAborted();
    const { value } = await this.connection.getSignatureStatuses(submission.signatures, {
      searchTransactionHistory: true,
    });
    const status = summarizeSignatureStatuses(value);

    if (status.state === 'not_found') {
      return this.checkExpiry(submission.reference);
    }
    if (status.state === 'failed' || (status.state === 'progress' && status.level === 'finalized')) {
      this.blockhashes.delete(submission.reference);
    }
    return status;
  }

  async simulate(payload: SignedPayload, signal: AbortSignal): Promise<SimulationResult> {
    const [decoded] = this.single(payload);
    signal.throwIfAborted();

    const { value } = await this.connection.simulateTransaction(decoded.transaction, {
      sigVerify: true,
      commitment: 'processed',
    });
    if (value.err === null) {
      return { ok: true, unitsConsumed: value.unitsConsumed };
    }

    const error = typeof value.err === 'string' ? value.err : JSON.stringify(value.err);
    return { ok: false, error, transient: TRANSIENT_SIMULATION_ERRORS.has(error) };
  }

  async reconcile(payload: SignedPayload, signal: AbortSignal): Promise<Reconciliation> {
    const [decoded] = this.single(payload);
    this.blockhashes.set(decoded.signature, decoded.recentBlockhash);

    const submission: Submission = {
      reference: decoded.signature,
      signatures: [decoded.signature],
      submittedAt: this.now(),
    };
    try {
      return { submission, status: await this.confirm(submission, signal) };
    } catch (err) {
      this.release(submission);
      throw err;
    }
  }

  release(submission: Submission): void {
    this.blockhashes.delete(submission.reference);
  }

  // ---- Private ----

  private single(payload: SignedPayload): DecodedTransaction[] {
    if (payload.transactions.length !== 1) {
      throw new ValidationError(
        `${this.name} sends exactly one transaction, got ${payload.transactions.length}`,
      );
    }
    return decodePayload(payload);
  }

  /** Unseen and past its blockhash: it can no longer land */
  private async checkExpiry(signature: string): Promise<ConfirmationStatus> {
    const blockhash = this.blockhashes.get(signature);
    if (!blockhash) return { state: 'not_found' };

    const { value: valid } = await this.connection.isBlockhashValid(blockhash, { commitment: 'processed' });
    if (valid) return { state: 'not_found' };

    this.blockhashes.delete(signature);
    return { state: 'dropped', reason: `blockhash ${blockhash} expired` };
  }
}
