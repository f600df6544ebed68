import dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .string()
  .trim()
  .optional()
  .transform((value) => value !== 'false');

const positiveInt = (fallback: number) =>
  z
    .union([z.number(), z.string()])
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : Number(value)))
    .refine((value) => Number.isInteger(value) && value > 0, 'must be a positive integer');

const envSchema = z.object({
  PORT: positiveInt(5005),
  NODE_ENV: z.string().trim().optional().default('development'),
  FRONTEND_URL: z.string().trim().url().optional().default('http://localhost:3000'),
  MONGODB_URI: z.string().trim().min(1).optional().default('mongodb://localhost:27017/storefront'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  ADMIN_USER_IDS: z
    .string()
    .optional()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
    ),
  STRIPE_SECRET_KEY: z.string().min(1, 'STRIPE_SECRET_KEY is required'),
  WEBHOOK_SECRET: z.string().min(1, 'WEBHOOK_SECRET is required'),
  PAYMENT_CURRENCY: z
    .string()
    .trim()
    .length(3, 'PAYMENT_CURRENCY must be an ISO 4217 code')
    .optional()
    .default('usd')
    .transform((value) => value.toLowerCase()),
  STRIPE_TIMEOUT_MS: positiveInt(10_000),
  OPS_ALERT_WEBHOOK: z.string().trim().url().optional(),
  PENDING_ORDER_SWEEP_ENABLED: booleanFlag,
  PENDING_ORDER_SWEEP_CRON: z.string().trim().optional().default('*/30 * * * *'),
  PENDING_ORDER_SWEEP_TIMEZONE: z.string().trim().optional().default('UTC'),
  PENDING_ORDER_TTL_HOURS: positiveInt(24),
});

export interface AppConfig {
  port: number;
  nodeEnv: string;
  frontendUrl: string;
  mongoUri: string;
  auth: {
    jwtSecret: string;
    adminUserIds: string[];
  };
  stripe: {
    secretKey: string;
    webhookSecret: string;
    currency: string;
    timeoutMs: number;
  };
  opsAlertWebhook?: string;
  pendingOrderSweep: {
    enabled: boolean;
    cronExpression: string;
    timezone: string;
    ttlHours: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the startup configuration. Every component receives the parts it needs
 * from this struct at construction time.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  // Empty strings behave like unset keys so that a blank line in .env falls back to the default.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.safeParse(cleaned);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(issues);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    frontendUrl: values.FRONTEND_URL.replace(/\/$/, ''),
    mongoUri: values.MONGODB_URI,
    auth: {
      jwtSecret: values.JWT_SECRET,
      adminUserIds: values.ADMIN_USER_IDS,
    },
    stripe: {
      secretKey: values.STRIPE_SECRET_KEY,
      webhookSecret: values.WEBHOOK_SECRET,
      currency: values.PAYMENT_CURRENCY,
      timeoutMs: values.STRIPE_TIMEOUT_MS,
    },
    opsAlertWebhook: values.OPS_ALERT_WEBHOOK,
    pendingOrderSweep: {
      enabled: values.PENDING_ORDER_SWEEP_ENABLED,
      cronExpression: values.PENDING_ORDER_SWEEP_CRON,
      timezone: values.PENDING_ORDER_SWEEP_TIMEZONE,
      ttlHours: values.PENDING_ORDER_TTL_HOURS,
    },
  };
};

export const loadConfigFromEnvFile = (): AppConfig => {
  dotenv.config();
  return loadConfig(process.env);
};
