import { describe, it, expect } from 'vitest';
import { NotFoundError, type Order } from '@sluice/types';
import { MemoryAttemptStore, MemoryMetricsSnapshotStore, MemoryOrderStore } from '../memory.js';

function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: 'order-1',
    intent: { action: 'BUY', market: 'SOL-USDC', size: 1, confidence: 0.8 },
    status: 'PENDING',
    createdAt: 1_000,
    updatedAt: 1_000,
    attemptCount: 0,
    maxRetries: 3,
    cancelRequested: false,
    ...overrides,
  };
}

describe('MemoryOrderStore', () => {
  it('round-trips an inserted order', async () => {
    const store = new MemoryOrderStore();
    await store.insert(makeOrder());

    const order = await store.get('order-1');
    expect(order?.status).toBe('PENDING');
    expect(order?.intent.market).toBe('SOL-USDC');
    expect(await store.get('missing')).toBeNull();
  });

  it('hands out copies that do not alias stored state', async () => {
    const store = new MemoryOrderStore();
    await store.insert(makeOrder());

    const first = await store.get('order-1');
    if (!first) throw new Error('expected order');
    first.status = 'FAILED';
    first.intent.size = 99;

    const second = await store.get('order-1');
    expect(second?.status).toBe('PENDING');
    expect(second?.intent.size).toBe(1);
  });

  it('rejects duplicate ids and duplicate client order ids', async () => {
    const store = new MemoryOrderStore();
    const intent = { action: 'BUY' as const, market: 'SOL-USDC', size: 1, confidence: 0.5, clientOrderId: 'c-1' };
    await store.insert(makeOrder({ intent }));

    await expect(store.insert(makeOrder({ intent }))).rejects.toThrow('Duplicate order id: order-1');
    await expect(store.insert(makeOrder({ id: 'order-2', intent }))).rejects.toThrow(
      'Duplicate clientOrderId: c-1',
    );
    expect((await store.findByClientOrderId('c-1'))?.id).toBe('order-1');
  });

  it('writes nothing when the mutation throws', async () => {
    const store = new MemoryOrderStore();
    await store.insert(makeOrder());

    await expect(
      store.update('order-1', () => {
        throw new Error('rejected');
      }),
    ).rejects.toThrow('rejected');

    expect((await store.get('order-1'))?.status).toBe('PENDING');
  });

  it('throws NotFoundError when updating a missing order', async () => {
    const store = new MemoryOrderStore();
    await expect(store.update('nope', (o) => o)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('serializes concurrent updates on the same id', async () => {
    const store = new MemoryOrderStore();
    await store.insert(makeOrder());

    await Promise.all(
      Array.from({ length: 20 }, () =>
        store.update('order-1', (o) => ({ ...o, attemptCount: o.attemptCount + 1 })),
      ),
    );

    expect((await store.get('order-1'))?.attemptCount).toBe(20);
  });

  it('keeps serving updates after a failed one', async () => {
    const store = new MemoryOrderStore();
    await store.insert(makeOrder());

    const failing = store.update('order-1', () => {
      throw new Error('boom');
    });
    const succeeding = store.update('order-1', (o) => ({ ...o, status: 'QUEUED' }));

    await expect(failing).rejects.toThrow('boom');
    await expect(succeeding).resolves.toMatchObject({ status: 'QUEUED' });
  });

  it('lists, counts and deletes by status', async () => {
    const store = new MemoryOrderStore();
    await store.insert(makeOrder({ id: 'a', status: 'CONFIRMED', createdAt: 1, updatedAt: 100 }));
    await store.insert(makeOrder({ id: 'b', status: 'PENDING', createdAt: 2, updatedAt: 100 }));
    await store.insert(makeOrder({ id: 'c', status: 'FAILED', createdAt: 3, updatedAt: 500 }));

    expect((await store.listByStatus(['PENDING', 'FAILED'])).map((o) => o.id)).toEqual(['b', 'c']);
    expect((await store.listRecent(2)).map((o) => o.id)).toEqual(['c', 'b']);
    expect(await store.countByStatus()).toEqual({ CONFIRMED: 1, PENDING: 1, FAILED: 1 });

    const removed = await store.deleteUpdatedBefore(['CONFIRMED', 'FAILED'], 200);
    expect(removed).toBe(1);
    expect(await store.get('a')).toBeNull();
    expect(await store.get('b')).not.toBeNull();
    expect(await store.get('c')).not.toBeNull();
  });
});

describe('MemoryAttemptStore', () => {
  it('appends frozen attempts and filters by order', async () => {
    const store = new MemoryAttemptStore();
    await store.append({
      orderId: 'o1',
      backend: 'jito',
      startedAt: 10,
      endedAt: 20,
      outcome: 'SUCCESS',
      latencyMs: 10,
    });
    await store.append({
      orderId: 'o2',
      backend: 'rpc',
      startedAt: 30,
      endedAt: 35,
      outcome: 'FAILURE',
      errorKind: 'TransientNetworkError',
      latencyMs: 5,
    });

    const attempts = await store.listByOrder('o1');
    expect(attempts).toHaveLength(1);
    expect(Object.isFrozen(attempts[0])).toBe(true);

    expect(await store.deleteBefore(25)).toBe(1);
    expect(await store.listByOrder('o1')).toEqual([]);
  });
});

describe('MemoryMetricsSnapshotStore', () => {
  it('returns null when empty', async () => {
    const store = new MemoryMetricsSnapshotStore();
    expect(await store.latest()).toBeNull();
  });
});
