import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Submission } from '@sluice/types';
import { CircuitBreakerRegistry } from '../circuit-breaker.js';
import { VirtualClock } from '../clock.js';
import { TransactionExecutor } from '../executor.js';
import type { ExecutorConfig } from '../types.js';
import { FakeBackend, hang, ONE_TX, TWO_TX } from './fakes.js';

const CONFIG: ExecutorConfig = {
  executionTimeoutMs: 20,
  simulateBeforeSend: false,
  confirmation: {
    initialIntervalMs: 100,
    maxIntervalMs: 400,
    backoffFactor: 2,
    maxWaitMs: 1_000,
    pollTimeoutMs: 50,
    targetLevel: 'confirmed',
  },
};

describe('TransactionExecutor', () => {
  let clock: VirtualClock;
  let breakers: CircuitBreakerRegistry;
  let relay: FakeBackend;
  let rpc: FakeBackend;

  beforeEach(() => {
    clock = new VirtualClock(1_000);
    breakers = new CircuitBreakerRegistry({ threshold: 3, resetTimeoutMs: 60_000 }, () => clock.now());
    relay = new FakeBackend('relay', true);
    rpc = new FakeBackend('rpc');
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  function executor(config: ExecutorConfig = CONFIG, backends = [relay, rpc]): TransactionExecutor {
    return new TransactionExecutor(backends, breakers, config, clock);
  }

  it('confirms through the first healthy backend', async () => {
    const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

    expect(result).toEqual({
      status: 'confirmed',
      backend: 'relay',
      reference: 'relay-ref-1',
      signatures: ['relay-sig-1-0'],
      level: 'confirmed',
      attempts: [
        {
          orderId: 'order-1',
          backend: 'relay',
          startedAt: 1_000,
          endedAt: 1_000,
          outcome: 'SUCCESS',
          errorKind: undefined,
          latencyMs: 0,
        },
      ],
    });
    expect(rpc.submitted).toHaveLength(0);
  });

  it('reports the broadcast before polling', async () => {
    const seen: Array<[string, Submission, number]> = [];
    await executor().execute(ONE_TX, {
      orderId: 'order-1',
      onSubmitted: async (backend, submission) => {
        seen.push([backend, submission, relay.confirmCalls]);
      },
    });

    expect(seen).toEqual([
      ['relay', { reference: 'relay-ref-1', signatures: ['relay-sig-1-0'], submittedAt: 0 }, 0],
    ]);
  });

  it('falls through to the next backend on a transient error', async () => {
    relay.queueSubmit(new Error('503 Service Unavailable'));

    const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

    expect(result.status).toBe('confirmed');
    expect(result.backend).toBe('rpc');
    expect(result.attempts.map((a) => [a.backend, a.outcome, a.errorKind])).toEqual([
      ['relay', 'FAILURE', 'TransientNetworkError'],
      ['rpc', 'SUCCESS', undefined],
    ]);
    expect(breakers.getState('relay').consecutiveFailures).toBe(1);
  });

  it('stops the chain on a fatal error without blaming the backend', async () => {
    relay.queueSubmit(new Error('Transaction simulation failed: insufficient funds for fee'));

    const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

    expect(result).toMatchObject({
      status: 'failed',
      backend: 'relay',
      error: {
        kind: 'FatalSubmissionError',
        message: 'Transaction simulation failed: insufficient funds for fee',
      },
    });
    expect(rpc.submitted).toHaveLength(0);
    expect(breakers.getState('relay').consecutiveFailures).toBe(0);
  });

  it('returns the last transient error when every backend fails', async () => {
    relay.queueSubmit(new Error('429 Too Many Requests'));
    rpc.queueSubmit(new Error('read ECONNRESET'));

    const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

    expect(result).toMatchObject({
      status: 'failed',
      backend: 'rpc',
      error: { kind: 'TransientNetworkError', message: 'read ECONNRESET' },
    });
    expect(result.attempts).toHaveLength(2);
  });

  it('skips open circuits', async () => {
    for (let i = 0; i < 3; i++) breakers.recordFailure('relay');

    const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

    expect(result.backend).toBe('rpc');
    expect(relay.submitted).toHaveLength(0);
  });

  it('returns CircuitOpenError when every circuit is open', async () => {
    for (let i = 0; i < 3; i++) {
      breakers.recordFailure('relay');
      breakers.recordFailure('rpc');
    }

    const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

    expect(result).toEqual({
      status: 'failed',
      error: { kind: 'CircuitOpenError', message: 'No backend available: 2 circuit(s) open' },
      attempts: [],
    });
  });

  it('rejects an empty payload', async () => {
    const result = await executor().execute({ transactions: [] }, { orderId: 'order-1' });

    expect(result).toEqual({
      status: 'failed',
      error: { kind: 'ValidationError', message: 'Payload contains no transactions' },
      attempts: [],
    });
  });

  it('returns interrupted when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await executor().execute(ONE_TX, { orderId: 'order-1', signal: controller.signal });

    expect(result).toEqual({ status: 'interrupted', attempts: [] });
    expect(relay.submitted).toHaveLength(0);
  });

  describe('confirmation outcomes', () => {
    it('settles UNKNOWN without fallback when the budget runs out', async () => {
      relay.confirmDefault = { state: 'progress', level: 'submitted' };

      const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

      expect(result).toMatchObject({
        status: 'unknown',
        backend: 'relay',
        reference: 'relay-ref-1',
        error: {
          kind: 'UnknownOutcomeError',
          message: 'No terminal confirmation for relay-ref-1 within 1000ms (highest level: submitted)',
        },
      });
      expect(rpc.submitted).toHaveLength(0);
      expect(breakers.getState('relay').consecutiveFailures).toBe(0);
      expect(relay.released).toEqual(['relay-ref-1']);
    });

    it('releases the submission once confirmed', async () => {
      await executor().execute(ONE_TX, { orderId: 'order-1' });

      expect(relay.released).toEqual(['relay-ref-1']);
    });

    it('treats an on-chain failure as fatal', async () => {
      relay.queueConfirm({ state: 'failed', error: '{"InstructionError":[0,{"Custom":1}]}' });

      const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

      expect(result).toMatchObject({
        status: 'failed',
        error: {
          kind: 'FatalSubmissionError',
          message: 'Transaction relay-ref-1 failed on chain: {"InstructionError":[0,{"Custom":1}]}',
        },
      });
      expect(rpc.submitted).toHaveLength(0);
    });

    it('falls through after a drop and counts it against the circuit', async () => {
      relay.queueConfirm({ state: 'dropped', reason: 'blockhash expired' });

      const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

      expect(result.backend).toBe('rpc');
      expect(result.attempts[0]).toMatchObject({ backend: 'relay', outcome: 'FAILURE', errorKind: 'TransientNetworkError' });
      expect(breakers.getState('relay').consecutiveFailures).toBe(1);
    });
  });

  describe('atomic groups', () => {
    it('skips backends that cannot deliver a group atomically', async () => {
      const result = await executor(CONFIG, [rpc, relay]).execute(TWO_TX, { orderId: 'order-1' });

      expect(result.backend).toBe('relay');
      expect(rpc.submitted).toHaveLength(0);
    });

    it('fails when no backend can deliver the group', async () => {
      const result = await executor(CONFIG, [rpc]).execute(TWO_TX, { orderId: 'order-1' });

      expect(result).toEqual({
        status: 'failed',
        error: { kind: 'FatalSubmissionError', message: 'rpc cannot deliver a 2-transaction group atomically' },
        backend: 'rpc',
        reference: undefined,
        attempts: [],
      });
    });

    it('never reports a partially landed group as confirmed', async () => {
      relay.queueConfirm({ state: 'progress', level: 'confirmed', landedCount: 1 });

      const result = await executor().execute(TWO_TX, { orderId: 'order-1' });

      expect(result).toMatchObject({
        status: 'unknown',
        error: { message: 'Only 1 of 2 transactions in relay-ref-1 landed' },
      });
    });

    it('treats a drop after partial landing as UNKNOWN', async () => {
      relay.queueConfirm({ state: 'dropped', reason: 'bundle rejected', landedCount: 1 });

      const result = await executor().execute(TWO_TX, { orderId: 'order-1' });

      expect(result.status).toBe('unknown');
      expect(rpc.submitted).toHaveLength(0);
    });
  });

  describe('submit timeout', () => {
    it('settles UNKNOWN when the backend cannot reconcile', async () => {
      relay.queueSubmit(hang);

      const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

      expect(result).toMatchObject({
        status: 'unknown',
        backend: 'relay',
        error: { message: 'relay submit timed out after 20ms; backend cannot reconcile' },
      });
      expect(rpc.submitted).toHaveLength(0);
    });

    it('retries elsewhere when reconciliation finds nothing', async () => {
      relay.queueSubmit(hang);
      relay.reconcile = async () => ({
        submission: { reference: 'sig-a', signatures: ['sig-a'], submittedAt: 0 },
        status: { state: 'not_found' },
      });

      const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

      expect(result.backend).toBe('rpc');
      expect(result.attempts[0]).toMatchObject({ backend: 'relay', outcome: 'TIMEOUT', errorKind: 'TransientNetworkError' });
    });

    it('confirms when reconciliation finds the payload landed', async () => {
      relay.queueSubmit(hang);
      relay.reconcile = async () => ({
        submission: { reference: 'sig-a', signatures: ['sig-a'], submittedAt: 0 },
        status: { state: 'progress', level: 'finalized' },
      });
      const onSubmitted = vi.fn(async () => {});

      const result = await executor().execute(ONE_TX, { orderId: 'order-1', onSubmitted });

      expect(result).toMatchObject({ status: 'confirmed', backend: 'relay', reference: 'sig-a', level: 'finalized' });
      expect(onSubmitted).toHaveBeenCalledTimes(1);
      expect(relay.confirmCalls).toBe(0);
    });

    it('settles UNKNOWN when the payload is seen but not yet confirmed', async () => {
      relay.queueSubmit(hang);
      relay.reconcile = async () => ({
        submission: { reference: 'sig-a', signatures: ['sig-a'], submittedAt: 0 },
        status: { state: 'progress', level: 'submitted' },
      });

      const result = await executor().execute(ONE_TX, { orderId: 'order-1' });

      expect(result).toMatchObject({
        status: 'unknown',
        error: { message: 'relay submit timed out after 20ms; sig-a seen at submitted' },
      });
      expect(relay.released).toEqual(['sig-a']);
    });
  });

  describe('pre-flight simulation', () => {
    const simulating: ExecutorConfig = { ...CONFIG, simulateBeforeSend: true };

    it('aborts on a deterministic rejection without an attempt or breaker failure', async () => {
      relay.simulate = async () => ({ ok: false, error: 'custom program error: 0x1', transient: false });

      const result = await executor(simulating).execute(ONE_TX, { orderId: 'order-1' });

      expect(result).toEqual({
        status: 'failed',
        error: { kind: 'FatalSubmissionError', message: 'Simulation failed on relay: custom program error: 0x1' },
        backend: 'relay',
        reference: undefined,
        attempts: [],
      });
      expect(relay.submitted).toHaveLength(0);
      expect(rpc.submitted).toHaveLength(0);
      expect(breakers.getState('relay').consecutiveFailures).toBe(0);
    });

    it('sends anyway after a transient simulation error', async () => {
      relay.simulate = async () => ({ ok: false, error: 'BlockhashNotFound', transient: true });

      const result = await executor(simulating).execute(ONE_TX, { orderId: 'order-1' });

      expect(result.status).toBe('confirmed');
      expect(relay.submitted).toHaveLength(1);
    });

    it('sends anyway when the simulation call throws', async () => {
      relay.simulate = async () => {
        throw new Error('simulate unavailable');
      };

      const result = await executor(simulating).execute(ONE_TX, { orderId: 'order-1' });

      expect(result.status).toBe('confirmed');
    });

    it('skips simulation when disabled', async () => {
      const simulate = vi.fn(async () => ({ ok: true as const }));
      relay.simulate = simulate;

      await executor().execute(ONE_TX, { orderId: 'order-1' });

      expect(simulate).not.toHaveBeenCalled();
    });
  });

  it('needs at least one backend', () => {
    expect(() => new TransactionExecutor([], breakers, CONFIG, clock)).toThrow(
      'TransactionExecutor needs at least one backend',
    );
  });
});
