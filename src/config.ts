import 'dotenv/config';
import { z } from 'zod';
import { logger } from './logger.js';

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((v) => v === 'true' || v === '1');

/**
 * Centralized environment validation.
 * - DEFAULT_COUNTRY_CODE is prefixed to local phone numbers (07xx..., 7xx...).
 * - API_ACCESS_KEY empty means /api is unprotected (dev only).
 * - GATEWAY_WEBHOOK_SECRET empty disables callback signature checks.
 */
const Schema = z.object({
  // Server
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.string().default('development'),
  DATABASE_URL: z.string().default(''),
  FRONTEND_ORIGIN: z.string().default('*'),
  API_ACCESS_KEY: z.string().default(''),

  // Phone normalization
  DEFAULT_COUNTRY_CODE: z
    .string()
    .regex(/^\d{1,3}$/, 'DEFAULT_COUNTRY_CODE must be 1-3 digits')
    .default('255'),

  // AzamPay (mobile money)
  AZAMPAY_APP_NAME: z.string().default(''),
  AZAMPAY_CLIENT_ID: z.string().default(''),
  AZAMPAY_CLIENT_SECRET: z.string().default(''),
  AZAMPAY_API_KEY: z.string().default(''),
  AZAMPAY_SANDBOX: flag('true'),
  AZAMPAY_PROVIDER: z.string().default('Mpesa'),
  AZAMPAY_CURRENCY: z.string().default('TZS'),

  // Inbound callbacks
  GATEWAY_WEBHOOK_SECRET: z.string().default(''),
});

export type Env = z.infer<typeof Schema>;

export const env: Env = Schema.parse(process.env);

export const AZAMPAY_ENABLED = Boolean(
  env.AZAMPAY_APP_NAME && env.AZAMPAY_CLIENT_ID && env.AZAMPAY_CLIENT_SECRET
);

/**
 * Warn about settings that are optional for the process to boot
 * but needed for it to do anything useful in production.
 *
 *   assertCriticalEnv(['DATABASE_URL', 'AZAMPAY_CLIENT_ID']);
 */
export function assertCriticalEnv(keys: Array<keyof Env>): string[] {
  const missing = keys.filter((k) => {
    const v = env[k];
    return v === undefined || v === null || v === '';
  });
  if (missing.length) {
    logger.warn({ missing }, '[config] missing recommended env');
  }
  return missing;
}
