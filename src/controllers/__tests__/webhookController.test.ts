import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Request, Response } from 'express';
import { FakeCartStore, FakeCatalog, InMemoryOrderRepository } from '../../test-helpers/inMemory';
import { createTestStripe, paymentIntentEvent, signedDelivery, TEST_WEBHOOK_SECRET } from '../../test-helpers/stripe';
import { OrderStore } from '../../services/orderStore';
import { WebhookReconciler } from '../../services/webhookReconciler';
import { createWebhookHandler } from '../webhookController';

vi.mock('../../utils/alerting', () => ({ notifyOps: vi.fn() }));

interface MockResponse {
  statusCode: number;
  body: unknown;
  status(code: number): MockResponse;
  json(payload: unknown): MockResponse;
}

const mockResponse = (): MockResponse => {
  const res: MockResponse = {
    statusCode: 200,
    body: undefined,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(payload: unknown) {
      res.body = payload;
      return res;
    },
  };
  return res;
};

describe('createWebhookHandler', () => {
  const stripe = createTestStripe();
  let reconciler: WebhookReconciler;

  beforeEach(() => {
    const store = new OrderStore(new InMemoryOrderRepository(), new FakeCatalog(), { currency: 'usd' });
    reconciler = new WebhookReconciler(stripe, store, new FakeCartStore(), { webhookSecret: TEST_WEBHOOK_SECRET });
  });

  const call = async (body: unknown, signature?: string) => {
    const req = { body, headers: signature ? { 'stripe-signature': signature } : {} } as unknown as Request;
    const res = mockResponse();
    await createWebhookHandler(reconciler)(req, res as unknown as Response);
    return res;
  };

  it('acknowledges a verified delivery with 200', async () => {
    const { payload, signature } = signedDelivery(
      stripe,
      paymentIntentEvent({ eventId: 'evt_1', type: 'payment_intent.created', paymentIntentId: 'pi_test_1' })
    );

    const res = await call(payload, signature);

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ received: true, outcome: 'ignored' });
  });

  it('answers 400 to a bad signature', async () => {
    const res = await call(Buffer.from('{}'), 't=1,v1=deadbeef');

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'Webhook signature verification failed' });
  });

  it('answers 400 when the signature header is missing', async () => {
    const res = await call(Buffer.from('{}'));

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'Missing stripe-signature header' });
  });

  it('answers 500 on storage failures so the provider retries', async () => {
    vi.spyOn(reconciler, 'handleWebhook').mockRejectedValue(new Error('db down'));

    const res = await call(Buffer.from('{}'), 't=1,v1=deadbeef');

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: 'Webhook handling error' });
  });
});
