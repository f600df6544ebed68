import express, { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import mongoose from 'mongoose';
import type { AppConfig } from './config/env';
import { createCheckoutController } from './controllers/checkoutController';
import { createOrderController } from './controllers/orderController';
import { createWebhookHandler } from './controllers/webhookController';
import { createAuthenticate } from './middleware/auth';
import { createCheckoutRouter } from './routes/checkout';
import { createOrdersRouter } from './routes/orders';
import type { CheckoutService } from './services/checkoutService';
import type { WebhookReconciler } from './services/webhookReconciler';
import { isAppError } from './utils/errors';

export interface AppServices {
  checkoutService: CheckoutService;
  webhookReconciler: WebhookReconciler;
}

export const createApp = (config: AppConfig, services: AppServices): express.Express => {
  const app = express();
  const authenticate = createAuthenticate(config.auth);

  app.use(cors({
    origin: config.frontendUrl,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  // Raw body: the signature covers the exact bytes, so this must precede express.json().
  app.post(
    '/api/checkout/webhook',
    bodyParser.raw({ type: 'application/json' }),
    createWebhookHandler(services.webhookReconciler)
  );

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(cookieParser());

  app.use('/api/checkout', createCheckoutRouter(createCheckoutController(services.checkoutService), authenticate));
  app.use('/api/orders', createOrdersRouter(createOrderController(services.checkoutService), authenticate));

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'OK',
      message: 'Orders API is running',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/api/health/db', (_req, res) => {
    const states = ['disconnected', 'connected', 'connecting', 'disconnecting'];
    const dbStatus = mongoose.connection.readyState;

    res.json({
      status: 'OK',
      database: {
        state: states[dbStatus] || 'unknown',
        name: mongoose.connection.name,
        host: mongoose.connection.host,
        port: mongoose.connection.port,
      },
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isAppError(err)) {
      res.status(err.status).json({
        error: err.message,
        code: err.code,
        ...(err.details ? { details: err.details } : {}),
      });
      return;
    }

    console.error('Error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};
