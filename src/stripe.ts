import Stripe from 'stripe';
import type { AppConfig } from './config/env';

export const STRIPE_API_VERSION = '2022-11-15';

/** Network retries are off; callers decide whether to retry. */
export const createStripeClient = (config: AppConfig['stripe']): Stripe =>
  new Stripe(config.secretKey, {
    apiVersion: STRIPE_API_VERSION,
    timeout: config.timeoutMs,
    maxNetworkRetries: 0,
  });
