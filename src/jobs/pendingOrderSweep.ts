import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { AppConfig } from '../config/env';
import type { OrderStore } from '../services/orderStore';
import { notifyOps } from '../utils/alerting';
import { ConflictError } from '../utils/errors';

const SWEEP_BATCH_SIZE = 100;

export interface SweepSummary {
  checked: number;
  cancelled: number;
  skipped: number;
  errors: number;
}

/**
 * Cancels orders that never got a payment intent (checkout abandoned or the
 * provider was unreachable). Orders are kept for history, never deleted.
 */
export const runPendingOrderSweep = async (
  orderStore: OrderStore,
  options: { ttlHours: number; opsWebhookUrl?: string; now?: Date }
): Promise<SweepSummary> => {
  const now = options.now ?? new Date();
  const cutoff = new Date(now.getTime() - options.ttlHours * 60 * 60 * 1000);
  const summary: SweepSummary = { checked: 0, cancelled: 0, skipped: 0, errors: 0 };

  try {
    const staleOrders = await orderStore.findStalePendingOrders(cutoff, SWEEP_BATCH_SIZE);
    summary.checked = staleOrders.length;

    if (staleOrders.length === 0) {
      console.log('[PendingOrderSweep] No stale pending orders found');
      return summary;
    }

    for (const order of staleOrders) {
      try {
        await orderStore.transitionStatus(order.id, 'pending', 'cancelled');
        summary.cancelled++;
        console.log(`[PendingOrderSweep] Cancelled order ${order.id} (${order.orderNumber})`);
      } catch (error) {
        if (error instanceof ConflictError) {
          // A checkout resumed meanwhile.
          summary.skipped++;
          continue;
        }
        summary.errors++;
        console.error(`[PendingOrderSweep] Error cancelling order ${order.id}:`, error);
      }
    }

    console.log(
      `[PendingOrderSweep] Completed: ${summary.cancelled} cancelled, ${summary.skipped} skipped, ${summary.errors} errors`,
    );

    if (summary.errors > 0) {
      await notifyOps('PendingOrderSweep encountered errors', { ...summary }, options.opsWebhookUrl);
    }
  } catch (error) {
    summary.errors++;
    console.error('[PendingOrderSweep] Fatal error:', error);
    await notifyOps(
      'PendingOrderSweep fatal error',
      { error: error instanceof Error ? error.message : String(error) },
      options.opsWebhookUrl
    );
  }

  return summary;
};

export const startPendingOrderSweepCron = (
  orderStore: OrderStore,
  config: Pick<AppConfig, 'pendingOrderSweep' | 'opsAlertWebhook'>
): ScheduledTask | undefined => {
  const { enabled, cronExpression, timezone, ttlHours } = config.pendingOrderSweep;
  if (!enabled) {
    console.log('[PendingOrderSweep] Disabled via PENDING_ORDER_SWEEP_ENABLED=false');
    return undefined;
  }

  const task = cron.schedule(
    cronExpression,
    async () => {
      await runPendingOrderSweep(orderStore, { ttlHours, opsWebhookUrl: config.opsAlertWebhook });
    },
    {
      timezone,
    },
  );

  console.log(
    `[PendingOrderSweep] Scheduled sweep using "${cronExpression}" (timezone: ${timezone}), TTL ${ttlHours}h.`,
  );
  return task;
};
