import { beforeEach, describe, expect, it } from 'vitest';
import { FakeCatalog, InMemoryOrderRepository } from '../../test-helpers/inMemory';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import { generateOrderNumber, OrderStore, toMinorUnits } from '../orderStore';

const CREATED_AT = new Date('2026-03-01T10:00:00.000Z');
const LATER = new Date('2026-03-01T10:05:00.000Z');

describe('OrderStore', () => {
  let repository: InMemoryOrderRepository;
  let catalog: FakeCatalog;
  let store: OrderStore;

  beforeEach(() => {
    repository = new InMemoryOrderRepository(() => CREATED_AT);
    catalog = new FakeCatalog({
      p1: { price: 10, available: true, name: 'Mug' },
      p2: { price: 0.1, available: true, name: 'Sticker' },
      p3: { price: 5, available: false, name: 'Poster' },
      free: { price: 0, available: true, name: 'Sample' },
    });
    store = new OrderStore(repository, catalog, { currency: 'usd', now: () => CREATED_AT });
  });

  describe('createOrder', () => {
    it('computes the total from catalog prices', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 2 }]);

      expect(order.status).toBe('pending');
      expect(order.totalAmount).toBe(20);
      expect(order.amountInMinor).toBe(2000);
      expect(order.currency).toBe('usd');
      expect(order.lineItems).toEqual([
        { productId: 'p1', productName: 'Mug', quantity: 2, unitPrice: 10 },
      ]);
      expect(order.orderNumber).toMatch(/^ORD-20260301-[0-9A-F]{8}$/);
    });

    it('sums in minor units to avoid float drift', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p2', quantity: 3 }]);

      expect(order.amountInMinor).toBe(30);
      expect(order.totalAmount).toBe(0.3);
    });

    it('keeps the snapshot price when the catalog changes later', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);
      catalog.products.set('p1', { price: 99, available: true, name: 'Mug' });

      const stored = await store.getOrder(order.id);
      expect(stored.lineItems[0].unitPrice).toBe(10);
      expect(stored.totalAmount).toBe(10);
    });

    it('rejects an empty item list', async () => {
      await expect(store.createOrder('user-1', [])).rejects.toBeInstanceOf(ValidationError);
      expect(repository.orders.size).toBe(0);
    });

    it('rejects non-positive or fractional quantities', async () => {
      await expect(store.createOrder('user-1', [{ productId: 'p1', quantity: 0 }])).rejects.toThrow(
        'Invalid quantity for product p1'
      );
      await expect(store.createOrder('user-1', [{ productId: 'p1', quantity: -1 }])).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(store.createOrder('user-1', [{ productId: 'p1', quantity: 1.5 }])).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(repository.orders.size).toBe(0);
    });

    it('rejects unavailable and unknown products without writing an order', async () => {
      const attempt = store.createOrder('user-1', [
        { productId: 'p1', quantity: 1 },
        { productId: 'p3', quantity: 1 },
        { productId: 'missing', quantity: 1 },
      ]);

      await expect(attempt).rejects.toMatchObject({
        message: 'Some items are unavailable',
        details: { unavailable: ['p3', 'missing'] },
      });
      expect(repository.orders.size).toBe(0);
    });

    it('rejects an order whose total is zero', async () => {
      const attempt = store.createOrder('user-1', [{ productId: 'free', quantity: 2 }]);

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({
        message: 'Order total must be greater than zero',
        details: { amountInMinor: 0 },
      });
      expect(repository.orders.size).toBe(0);
    });

    it('accepts a free item next to a paid one', async () => {
      const order = await store.createOrder('user-1', [
        { productId: 'free', quantity: 1 },
        { productId: 'p1', quantity: 1 },
      ]);

      expect(order.amountInMinor).toBe(1000);
    });
  });

  describe('getOrder', () => {
    it('throws NotFoundError for unknown ids', async () => {
      await expect(store.getOrder('nope')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getOrderByNumber', () => {
    it('finds an order by its number', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);

      await expect(store.getOrderByNumber(order.orderNumber)).resolves.toMatchObject({ id: order.id });
    });

    it('throws NotFoundError for unknown numbers', async () => {
      await expect(store.getOrderByNumber('ORD-20260301-00000000')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('transitionStatus', () => {
    it('applies a legal edge and bumps updatedAt', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);
      repository.setClock(() => LATER);

      const cancelled = await store.transitionStatus(order.id, 'pending', 'cancelled');

      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.createdAt).toEqual(CREATED_AT);
      expect(cancelled.updatedAt).toEqual(LATER);
    });

    it('raises ConflictError when the stored status is not the expected one', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);
      await store.attachPaymentIntent(order.id, 'pi_1');

      const attempt = store.transitionStatus(order.id, 'pending', 'cancelled');

      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toMatchObject({
        details: { expected: 'pending', actual: 'payment_processing' },
      });
      expect((await store.getOrder(order.id)).status).toBe('payment_processing');
    });

    it('rejects edges outside the lifecycle', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);

      await expect(store.transitionStatus(order.id, 'pending', 'paid')).rejects.toThrow(
        'Cannot transition order from pending to paid'
      );
      await expect(store.transitionStatus(order.id, 'failed', 'paid')).rejects.toBeInstanceOf(ValidationError);
      await expect(store.transitionStatus(order.id, 'paid', 'failed')).rejects.toBeInstanceOf(ValidationError);
      await expect(store.transitionStatus(order.id, 'refunded', 'paid')).rejects.toBeInstanceOf(ValidationError);
      expect((await store.getOrder(order.id)).status).toBe('pending');
    });

    it('only enters payment_processing through attachPaymentIntent', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);

      await expect(store.transitionStatus(order.id, 'pending', 'payment_processing')).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('lets exactly one of two concurrent identical transitions win', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);

      const results = await Promise.allSettled([
        store.transitionStatus(order.id, 'pending', 'cancelled'),
        store.transitionStatus(order.id, 'pending', 'cancelled'),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(ConflictError);
    });
  });

  describe('attachPaymentIntent', () => {
    it('stores the intent and moves the order to payment_processing', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);

      const updated = await store.attachPaymentIntent(order.id, 'pi_1');

      expect(updated.status).toBe('payment_processing');
      expect(updated.paymentIntentId).toBe('pi_1');
      expect(await store.findByPaymentIntentId('pi_1')).toMatchObject({ id: order.id });
    });

    it('never replaces an intent that is already attached', async () => {
      const order = await store.createOrder('user-1', [{ productId: 'p1', quantity: 1 }]);
      await store.attachPaymentIntent(order.id, 'pi_1');

      await expect(store.attachPaymentIntent(order.id, 'pi_2')).rejects.toBeInstanceOf(ConflictError);
      expect((await store.getOrder(order.id)).paymentIntentId).toBe('pi_1');
    });
  });

  describe('listOrdersForUser', () => {
    it('paginates the user\'s orders newest first', async () => {
      for (let i = 0; i < 3; i++) {
        repository.setClock(() => new Date(CREATED_AT.getTime() + i * 1000));
        await store.createOrder('user-1', [{ productId: 'p1', quantity: i + 1 }]);
      }
      await store.createOrder('user-2', [{ productId: 'p1', quantity: 1 }]);

      const firstPage = await store.listOrdersForUser('user-1', { page: 1, limit: 2 });
      const secondPage = await store.listOrdersForUser('user-1', { page: 2, limit: 2 });

      expect(firstPage.pagination).toEqual({ total: 3, page: 1, limit: 2, pages: 2 });
      expect(firstPage.orders.map((o) => o.totalAmount)).toEqual([30, 20]);
      expect(secondPage.orders.map((o) => o.totalAmount)).toEqual([10]);
    });

    it('falls back to defaults for missing or out-of-range paging', async () => {
      const result = await store.listOrdersForUser('user-1', { page: 0, limit: 500 });
      expect(result.pagination).toEqual({ total: 0, page: 1, limit: 50, pages: 0 });

      const defaults = await store.listOrdersForUser('user-1');
      expect(defaults.pagination).toEqual({ total: 0, page: 1, limit: 20, pages: 0 });
    });
  });
});

describe('order helpers', () => {
  it('converts major to minor units', () => {
    expect(toMinorUnits(10)).toBe(1000);
    expect(toMinorUnits(19.99)).toBe(1999);
    expect(toMinorUnits(0.1)).toBe(10);
  });

  it('formats order numbers with the creation date', () => {
    expect(generateOrderNumber(new Date('2026-12-31T23:00:00.000Z'))).toMatch(/^ORD-20261231-[0-9A-F]{8}$/);
  });
});
