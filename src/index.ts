import { createApp } from './app';
import { connectDB, disconnectDB, registerConnectionEvents } from './config/database';
import { loadConfigFromEnvFile } from './config/env';
import { startPendingOrderSweepCron } from './jobs/pendingOrderSweep';
import { MongoOrderRepository } from './repositories/mongoOrderRepository';
import { MongoCartStore } from './services/cartStore';
import { MongoCatalogService } from './services/catalogService';
import { CheckoutService } from './services/checkoutService';
import { OrderStore } from './services/orderStore';
import { PaymentGateway } from './services/paymentGateway';
import { WebhookReconciler } from './services/webhookReconciler';
import { createStripeClient } from './stripe';

const main = async (): Promise<void> => {
  const config = loadConfigFromEnvFile();

  registerConnectionEvents();
  await connectDB(config.mongoUri);

  const stripe = createStripeClient(config.stripe);
  const cartStore = new MongoCartStore();
  const orderStore = new OrderStore(new MongoOrderRepository(), new MongoCatalogService(), {
    currency: config.stripe.currency,
  });
  const gateway = new PaymentGateway(stripe, orderStore, config.opsAlertWebhook);
  const checkoutService = new CheckoutService(cartStore, orderStore, gateway);
  const webhookReconciler = new WebhookReconciler(stripe, orderStore, cartStore, {
    webhookSecret: config.stripe.webhookSecret,
    opsWebhookUrl: config.opsAlertWebhook,
  });

  const sweepTask = startPendingOrderSweepCron(orderStore, config);

  const app = createApp(config, { checkoutService, webhookReconciler });
  const server = app.listen(config.port, () => {
    console.log(`🚀 Server is running on port ${config.port}`);
    console.log(`📦 Environment: ${config.nodeEnv}`);
    console.log(`🌐 Health check: http://localhost:${config.port}/api/health`);
  });

  const shutdown = (signal: string): void => {
    console.log(`${signal} received, shutting down`);
    sweepTask?.stop();
    server.close(() => {
      disconnectDB()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('Failed to close MongoDB connection:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
