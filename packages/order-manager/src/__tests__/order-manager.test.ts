import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryOrderStore } from '@sluice/store';
import {
  IllegalTransitionError,
  NotFoundError,
  ValidationError,
  type TradingIntent,
} from '@sluice/types';
import { OrderManager, IN_FLIGHT_CANCEL_NOTE } from '../order-manager.js';

const INTENT: TradingIntent = { action: 'BUY', market: 'SOL-USDC', size: 0.5, confidence: 0.9 };

describe('OrderManager', () => {
  let store: MemoryOrderStore;
  let clock: number;
  let seq: number;
  let manager: OrderManager;

  beforeEach(() => {
    store = new MemoryOrderStore();
    clock = 1_000;
    seq = 0;
    manager = new OrderManager(
      store,
      { defaultMaxRetries: 2 },
      () => clock,
      () => `order-${++seq}`,
    );
  });

  describe('submit', () => {
    it('persists a PENDING order before returning its id', async () => {
      const id = await manager.submit(INTENT);
      expect(id).toBe('order-1');

      const stored = await store.get(id);
      expect(stored).toMatchObject({
        status: 'PENDING',
        attemptCount: 0,
        maxRetries: 2,
        createdAt: 1_000,
        cancelRequested: false,
      });
    });

    it('honours a per-order maxRetries', async () => {
      const id = await manager.submit(INTENT, { maxRetries: 0 });
      expect((await manager.getStatus(id)).maxRetries).toBe(0);
    });

    it.each([
      [{ ...INTENT, market: '' }, 'market must be a non-empty string'],
      [{ ...INTENT, market: '   ' }, 'market must be a non-empty string'],
      [{ ...INTENT, size: 0 }, 'size must be positive'],
      [{ ...INTENT, size: -1 }, 'size must be positive'],
      [{ ...INTENT, size: Number.POSITIVE_INFINITY }, 'size must be finite'],
      [{ ...INTENT, confidence: 1.5 }, 'confidence must be between 0 and 1'],
      [{ ...INTENT, price: -3 }, 'price must be positive'],
    ])('rejects %o', async (intent, message) => {
      await expect(manager.submit(intent)).rejects.toThrow(message);
      expect(await store.listRecent(10)).toEqual([]);
    });

    it('rejects an unknown action with ValidationError', async () => {
      const bad: unknown = { ...INTENT, action: 'HOLD' };
      const err = await manager.submit(JSON.parse(JSON.stringify(bad))).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toHaveProperty('message', 'Invalid trading intent: action must be BUY or SELL');
    });

    it('rejects a negative maxRetries', async () => {
      await expect(manager.submit(INTENT, { maxRetries: -1 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('returns the existing order for a repeated clientOrderId', async () => {
      const first = await manager.submit({ ...INTENT, clientOrderId: 'strat-42' });
      const second = await manager.submit({ ...INTENT, clientOrderId: 'strat-42' });

      expect(second).toBe(first);
      expect(await store.listRecent(10)).toHaveLength(1);
    });
  });

  describe('getStatus', () => {
    it('throws NotFoundError for an unknown id', async () => {
      await expect(manager.getStatus('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('returns deep-equal frozen snapshots on repeated reads', async () => {
      const id = await manager.submit(INTENT);
      const a = await manager.getStatus(id);
      const b = await manager.getStatus(id);

      expect(a).toEqual(b);
      expect(a).not.toBe(b);
      expect(Object.isFrozen(a)).toBe(true);
      expect(Object.isFrozen(a.intent)).toBe(true);
    });
  });

  describe('transition', () => {
    it('follows the legal table and stamps updatedAt', async () => {
      const id = await manager.submit(INTENT);
      clock = 2_000;

      const queued = await manager.transition(id, 'QUEUED');
      expect(queued.status).toBe('QUEUED');
      expect(queued.updatedAt).toBe(2_000);
    });

    it('throws IllegalTransitionError and leaves the order untouched', async () => {
      const id = await manager.submit(INTENT);

      const err = await manager.transition(id, 'CONFIRMED').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(IllegalTransitionError);
      expect(err).toHaveProperty('message', `Illegal transition for order ${id}: PENDING -> CONFIRMED`);
      expect((await manager.getStatus(id)).status).toBe('PENDING');
    });

    it('applies metadata and counts attempts', async () => {
      const id = await manager.submit(INTENT);
      await manager.transition(id, 'QUEUED');
      await manager.transition(id, 'EXECUTING');
      await manager.transition(id, 'SUBMITTED', { executionMethod: 'jito', resultReference: 'bundle-1' });
      const confirmed = await manager.transition(id, 'CONFIRMED', { countAttempt: true });

      expect(confirmed).toMatchObject({
        status: 'CONFIRMED',
        attemptCount: 1,
        executionMethod: 'jito',
        resultReference: 'bundle-1',
      });
    });

    it('keeps the result reference stable once CONFIRMED', async () => {
      const id = await manager.submit(INTENT);
      await manager.transition(id, 'QUEUED');
      await manager.transition(id, 'EXECUTING');
      await manager.transition(id, 'SUBMITTED', { resultReference: 'sig-1' });
      await manager.transition(id, 'CONFIRMED');

      await expect(
        manager.transition(id, 'FAILED', { resultReference: 'sig-2' }),
      ).rejects.toBeInstanceOf(IllegalTransitionError);
      expect((await manager.getStatus(id)).resultReference).toBe('sig-1');
    });
  });

  describe('cancel', () => {
    it('cancels PENDING, QUEUED and TIMED_OUT orders immediately', async () => {
      const pending = await manager.submit(INTENT);
      expect(await manager.cancel(pending)).toEqual({ accepted: true, note: 'order cancelled' });
      expect((await manager.getStatus(pending)).status).toBe('CANCELLED');

      const timedOut = await manager.submit(INTENT);
      await manager.transition(timedOut, 'QUEUED');
      await manager.transition(timedOut, 'EXECUTING');
      await manager.transition(timedOut, 'TIMED_OUT');
      expect((await manager.cancel(timedOut)).accepted).toBe(true);
      expect((await manager.getStatus(timedOut)).status).toBe('CANCELLED');
    });

    it('only flags an in-flight order', async () => {
      const id = await manager.submit(INTENT);
      await manager.transition(id, 'QUEUED');
      await manager.transition(id, 'EXECUTING');

      expect(await manager.cancel(id)).toEqual({ accepted: false, note: IN_FLIGHT_CANCEL_NOTE });
      const snapshot = await manager.getStatus(id);
      expect(snapshot.status).toBe('EXECUTING');
      expect(snapshot.cancelRequested).toBe(true);
    });

    it('refuses a terminal order', async () => {
      const id = await manager.submit(INTENT);
      await manager.cancel(id);
      expect(await manager.cancel(id)).toEqual({ accepted: false, note: 'order already CANCELLED' });
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(manager.cancel('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('cleanup', () => {
    it('removes only terminal orders older than the retention period', async () => {
      const old = await manager.submit(INTENT);
      await manager.cancel(old);
      const live = await manager.submit(INTENT);

      clock = 1_000 + 60_000;
      const recent = await manager.submit(INTENT);
      await manager.cancel(recent);

      expect(await manager.cleanup(30_000)).toBe(1);
      await expect(manager.getStatus(old)).rejects.toBeInstanceOf(NotFoundError);
      expect((await manager.getStatus(live)).status).toBe('PENDING');
      expect((await manager.getStatus(recent)).status).toBe('CANCELLED');
    });
  });

  describe('recover', () => {
    async function driveTo(id: string, path: Array<'QUEUED' | 'EXECUTING' | 'SUBMITTED'>) {
      for (const status of path) await manager.transition(id, status);
    }

    it('requeues interrupted EXECUTING orders and counts the attempt', async () => {
      const id = await manager.submit(INTENT);
      await driveTo(id, ['QUEUED', 'EXECUTING']);

      const report = await manager.recover();

      expect(report.requeued).toEqual([id]);
      expect(report.resumable).toEqual([id]);
      const snapshot = await manager.getStatus(id);
      expect(snapshot.status).toBe('PENDING');
      expect(snapshot.attemptCount).toBe(1);
    });

    it('fails EXECUTING orders that have no retries left', async () => {
      const id = await manager.submit(INTENT, { maxRetries: 0 });
      await driveTo(id, ['QUEUED', 'EXECUTING']);

      const report = await manager.recover();

      expect(report.failed).toEqual([id]);
      const snapshot = await manager.getStatus(id);
      expect(snapshot.status).toBe('FAILED');
      expect(snapshot.lastError?.kind).toBe('interrupted');
    });

    it('cancels an interrupted EXECUTING order whose cancel was requested', async () => {
      const id = await manager.submit(INTENT);
      await driveTo(id, ['QUEUED', 'EXECUTING']);
      await manager.cancel(id);

      const report = await manager.recover();

      expect(report.cancelled).toEqual([id]);
      expect(report.requeued).toEqual([]);
      expect(report.resumable).toEqual([]);
      const snapshot = await manager.getStatus(id);
      expect(snapshot.status).toBe('CANCELLED');
      expect(snapshot.attemptCount).toBe(1);
    });

    it('cancels a TIMED_OUT order whose cancel was requested in flight', async () => {
      const id = await manager.submit(INTENT);
      await driveTo(id, ['QUEUED', 'EXECUTING']);
      await manager.cancel(id);
      await manager.transition(id, 'TIMED_OUT', { countAttempt: true });

      const report = await manager.recover();

      expect(report.cancelled).toEqual([id]);
      expect(report.resumable).toEqual([]);
      expect((await manager.getStatus(id)).status).toBe('CANCELLED');
    });

    it('marks SUBMITTED orders UNKNOWN instead of resubmitting', async () => {
      const id = await manager.submit(INTENT);
      await driveTo(id, ['QUEUED', 'EXECUTING', 'SUBMITTED']);

      const report = await manager.recover();

      expect(report.unknown).toEqual([id]);
      expect(report.resumable).toEqual([]);
      expect((await manager.getStatus(id)).status).toBe('UNKNOWN');
    });

    it('lists untouched queued work as resumable', async () => {
      const a = await manager.submit(INTENT);
      const b = await manager.submit(INTENT);
      await manager.transition(b, 'QUEUED');

      const report = await manager.recover();
      expect(report).toEqual({ requeued: [], failed: [], unknown: [], cancelled: [], resumable: [a, b] });
    });
  });

  describe('statistics', () => {
    it('counts by status and computes success rate over settled orders', async () => {
      const ok = await manager.submit(INTENT);
      await manager.transition(ok, 'QUEUED');
      await manager.transition(ok, 'EXECUTING');
      await manager.transition(ok, 'SUBMITTED');
      await manager.transition(ok, 'CONFIRMED');

      const bad = await manager.submit(INTENT);
      await manager.transition(bad, 'QUEUED');
      await manager.transition(bad, 'EXECUTING');
      await manager.transition(bad, 'FAILED');

      await manager.submit(INTENT);

      const stats = await manager.getStatistics();
      expect(stats.total).toBe(3);
      expect(stats.active).toBe(1);
      expect(stats.byStatus.CONFIRMED).toBe(1);
      expect(stats.byStatus.FAILED).toBe(1);
      expect(stats.byStatus.PENDING).toBe(1);
      expect(stats.successRate).toBe(0.5);
    });

    it('lists recent orders newest first', async () => {
      await manager.submit(INTENT);
      clock = 2_000;
      await manager.submit(INTENT);

      expect((await manager.listRecent(5)).map((o) => o.id)).toEqual(['order-2', 'order-1']);
    });
  });
});
