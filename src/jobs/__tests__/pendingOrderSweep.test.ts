import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeCatalog, InMemoryOrderRepository } from '../../test-helpers/inMemory';
import { OrderStore } from '../../services/orderStore';
import { notifyOps } from '../../utils/alerting';
import { runPendingOrderSweep, startPendingOrderSweepCron } from '../pendingOrderSweep';

vi.mock('../../utils/alerting', () => ({ notifyOps: vi.fn() }));

const HOUR = 60 * 60 * 1000;
const NOW = new Date('2026-03-02T12:00:00.000Z');

describe('runPendingOrderSweep', () => {
  let repository: InMemoryOrderRepository;
  let store: OrderStore;

  const createAt = async (hoursAgo: number) => {
    repository.setClock(() => new Date(NOW.getTime() - hoursAgo * HOUR));
    return store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);
  };

  beforeEach(() => {
    repository = new InMemoryOrderRepository();
    store = new OrderStore(repository, new FakeCatalog({ p1: { price: 10, available: true } }), {
      currency: 'usd',
    });
  });

  it('cancels pending orders older than the TTL', async () => {
    const stale = await createAt(30);
    const fresh = await createAt(2);

    const summary = await runPendingOrderSweep(store, { ttlHours: 24, now: NOW });

    expect(summary).toEqual({ checked: 1, cancelled: 1, skipped: 0, errors: 0 });
    expect((await store.getOrder(stale.id)).status).toBe('cancelled');
    expect((await store.getOrder(fresh.id)).status).toBe('pending');
  });

  it('leaves orders that already have a payment intent alone', async () => {
    const inPayment = await createAt(30);
    await store.attachPaymentIntent(inPayment.id, 'pi_test_1');

    const summary = await runPendingOrderSweep(store, { ttlHours: 24, now: NOW });

    expect(summary.checked).toBe(0);
    expect((await store.getOrder(inPayment.id)).status).toBe('payment_processing');
  });

  it('skips an order that moved on after it was selected', async () => {
    const raced = await createAt(30);
    vi.spyOn(store, 'findStalePendingOrders').mockImplementation(async () => {
      const selected = [await store.getOrder(raced.id)];
      await store.attachPaymentIntent(raced.id, 'pi_test_1');
      return selected;
    });

    const summary = await runPendingOrderSweep(store, { ttlHours: 24, now: NOW });

    expect(summary).toEqual({ checked: 1, cancelled: 0, skipped: 1, errors: 0 });
    expect(notifyOps).not.toHaveBeenCalled();
  });

  it('alerts ops when the sweep cannot run', async () => {
    vi.spyOn(store, 'findStalePendingOrders').mockRejectedValue(new Error('db down'));

    const summary = await runPendingOrderSweep(store, { ttlHours: 24, now: NOW });

    expect(summary.errors).toBe(1);
    expect(notifyOps).toHaveBeenCalledWith('PendingOrderSweep fatal error', { error: 'db down' }, undefined);
  });
});

describe('startPendingOrderSweepCron', () => {
  it('does not schedule anything when disabled', () => {
    const store = new OrderStore(new InMemoryOrderRepository(), new FakeCatalog(), { currency: 'usd' });

    const task = startPendingOrderSweepCron(store, {
      pendingOrderSweep: { enabled: false, cronExpression: '*/30 * * * *', timezone: 'UTC', ttlHours: 24 },
    });

    expect(task).toBeUndefined();
  });
});
