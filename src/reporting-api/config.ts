import 'dotenv/config';
import { DAY_MS } from '@shared/constants';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}

export const config = {
  port: intFromEnv('PORT', 3002),
  nodeEnv: process.env.NODE_ENV || 'development',
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5174',
  authority: process.env.AUTHORITY_PRINCIPAL || 'authority',
  database: {
    url: process.env.DATABASE_URL || '',
  },
  oracle: {
    secret: process.env.ORACLE_SECRET || 'dev-oracle-secret',
    pollMs: intFromEnv('ORACLE_POLL_MS', 2000),
  },
  windows: {
    investigationWindowMs: intFromEnv('INVESTIGATION_WINDOW_DAYS', 90) * DAY_MS,
    decryptionWindowMs: intFromEnv('DECRYPTION_WINDOW_DAYS', 7) * DAY_MS,
  },
  sweeper: {
    intervalMs: intFromEnv('SWEEP_INTERVAL_MS', 60_000),
    principal: process.env.SWEEPER_PRINCIPAL || 'deadline-sweeper',
  },
  isDev: (process.env.NODE_ENV || 'development') === 'development',
  isProd: process.env.NODE_ENV === 'production',
} as const;
