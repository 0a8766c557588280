import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ValidationError } from '@sluice/types';
import { SolanaRpcBackend } from '../backends/rpc.js';
import { signedTransaction, type SignedFixture } from './fakes.js';

function fakeConnection() {
  return {
    sendRawTransaction: vi.fn(),
    getSignatureStatuses: vi.fn(),
    simulateTransaction: vi.fn(),
    isBlockhashValid: vi.fn(),
  };
}

function statuses(...value: unknown[]) {
  return { context: { slot: 10 }, value };
}

describe('SolanaRpcBackend', () => {
  const signal = new AbortController().signal;
  let connection: ReturnType<typeof fakeConnection>;
  let backend: SolanaRpcBackend;
  let tx: SignedFixture;

  beforeEach(() => {
    connection = fakeConnection();
    backend = new SolanaRpcBackend(connection, {}, () => 42);
    tx = signedTransaction();
    connection.sendRawTransaction.mockResolvedValue(tx.signature);
  });

  it('sends the raw transaction without node-side retries', async () => {
    const submission = await backend.submit({ transactions: [tx.bytes] }, signal);

    expect(submission).toEqual({ reference: tx.signature, signatures: [tx.signature], submittedAt: 42 });
    expect(connection.sendRawTransaction).toHaveBeenCalledWith(tx.bytes, { skipPreflight: true, maxRetries: 0 });
  });

  it('refuses groups', async () => {
    const payload = { transactions: [tx.bytes, signedTransaction().bytes] };

    await expect(backend.submit(payload, signal)).rejects.toThrow(
      new ValidationError('rpc sends exactly one transaction, got 2'),
    );
    expect(backend.supportsAtomicGroups).toBe(false);
  });

  describe('confirm', () => {
    it('maps commitment onto the lattice', async () => {
      const submission = await backend.submit({ transactions: [tx.bytes] }, signal);
      connection.getSignatureStatuses.mockResolvedValue(
        statuses({ slot: 7, confirmations: 3, err: null, confirmationStatus: 'confirmed' }),
      );

      expect(await backend.confirm(submission, signal)).toEqual({
        state: 'progress',
        level: 'confirmed',
        landedCount: 1,
        slot: 7,
      });
      expect(connection.getSignatureStatuses).toHaveBeenCalledWith([tx.signature], {
        searchTransactionHistory: true,
      });
    });

    it('reports a landed transaction with an error as failed', async () => {
      const submission = await backend.submit({ transactions: [tx.bytes] }, signal);
      connection.getSignatureStatuses.mockResolvedValue(
        statuses({ slot: 7, confirmations: 0, err: { InstructionError: [0, { Custom: 1 }] }, confirmationStatus: 'processed' }),
      );

      expect(await backend.confirm(submission, signal)).toEqual({
        state: 'failed',
        error: '{"InstructionError":[0,{"Custom":1}]}',
        slot: 7,
      });
    });

    it('keeps waiting while the blockhash is still valid', async () => {
      const submission = await backend.submit({ transactions: [tx.bytes] }, signal);
      connection.getSignatureStatuses.mockResolvedValue(statuses(null));
      connection.isBlockhashValid.mockResolvedValue({ context: { slot: 10 }, value: true });

      expect(await backend.confirm(submission, signal)).toEqual({ state: 'not_found' });
      expect(connection.isBlockhashValid).toHaveBeenCalledWith(tx.blockhash, { commitment: 'processed' });
    });

    it('reports a drop once the blockhash expires unseen', async () => {
      const submission = await backend.submit({ transactions: [tx.bytes] }, signal);
      connection.getSignatureStatuses.mockResolvedValue(statuses(null));
      connection.isBlockhashValid.mockResolvedValue({ context: { slot: 10 }, value: false });

      expect(await backend.confirm(submission, signal)).toEqual({
        state: 'dropped',
        reason: `blockhash ${tx.blockhash} expired`,
      });
    });

    it('forgets a released signature', async () => {
      const submission = await backend.submit({ transactions: [tx.bytes] }, signal);
      connection.getSignatureStatuses.mockResolvedValue(statuses(null));

      backend.release(submission);

      expect(await backend.confirm(submission, signal)).toEqual({ state: 'not_found' });
      expect(connection.isBlockhashValid).not.toHaveBeenCalled();
    });

    it('does not track a send whose deadline already passed', async () => {
      const controller = new AbortController();
      connection.sendRawTransaction.mockImplementation(async () => {
        controller.abort();
        return tx.signature;
      });
      const submission = await backend.submit({ transactions: [tx.bytes] }, controller.signal);
      connection.getSignatureStatuses.mockResolvedValue(statuses(null));

      expect(await backend.confirm(submission, signal)).toEqual({ state: 'not_found' });
      expect(connection.isBlockhashValid).not.toHaveBeenCalled();
    });

    it('cannot judge expiry for signatures it never sent', async () => {
      connection.getSignatureStatuses.mockResolvedValue(statuses(null));

      const status = await backend.confirm({ reference: 'other', signatures: ['other'], submittedAt: 0 }, signal);

      expect(status).toEqual({ state: 'not_found' });
      expect(connection.isBlockhashValid).not.toHaveBeenCalled();
    });
  });

  describe('simulate', () => {
    it('passes a clean simulation', async () => {
      connection.simulateTransaction.mockResolvedValue({
        context: { slot: 10 },
        value: { err: null, logs: [], unitsConsumed: 1_200 },
      });

      expect(await backend.simulate({ transactions: [tx.bytes] }, signal)).toEqual({ ok: true, unitsConsumed: 1_200 });
    });

    it('treats program errors as deterministic', async () => {
      connection.simulateTransaction.mockResolvedValue({
        context: { slot: 10 },
        value: { err: { InstructionError: [1, { Custom: 6001 }] }, logs: [] },
      });

      expect(await backend.simulate({ transactions: [tx.bytes] }, signal)).toEqual({
        ok: false,
        error: '{"InstructionError":[1,{"Custom":6001}]}',
        transient: false,
      });
    });

    it('treats a stale blockhash as transient', async () => {
      connection.simulateTransaction.mockResolvedValue({
        context: { slot: 10 },
        value: { err: 'BlockhashNotFound', logs: [] },
      });

      expect(await backend.simulate({ transactions: [tx.bytes] }, signal)).toEqual({
        ok: false,
        error: 'BlockhashNotFound',
        transient: true,
      });
    });
  });

  it('reconciles by the payload signature', async () => {
    connection.getSignatureStatuses.mockResolvedValue(
      statuses({ slot: 9, confirmations: null, err: null, confirmationStatus: 'finalized' }),
    );

    const found = await backend.reconcile({ transactions: [tx.bytes] }, signal);

    expect(found).toEqual({
      submission: { reference: tx.signature, signatures: [tx.signature], submittedAt: 42 },
      status: { state: 'progress', level: 'finalized', landedCount: 1, slot: 9 },
    });
    expect(connection.sendRawTransaction).not.toHaveBeenCalled();
  });

  it('forgets the payload signature when reconciliation fails', async () => {
    connection.getSignatureStatuses.mockRejectedValueOnce(new Error('read ECONNRESET'));
    await expect(backend.reconcile({ transactions: [tx.bytes] }, signal)).rejects.toThrow('read ECONNRESET');

    connection.getSignatureStatuses.mockResolvedValue(statuses(null));
    const status = await backend.confirm({ reference: tx.signature, signatures: [tx.signature], submittedAt: 0 }, signal);

    expect(status).toEqual({ state: 'not_found' });
    expect(connection.isBlockhashValid).not.toHaveBeenCalled();
  });
});
