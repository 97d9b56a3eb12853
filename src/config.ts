import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const cutoffPattern = /^([01]\d|2[0-3]):[0-5]\d$/;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  DATABASE_URL: z.string().optional(),
  ATTENDANCE_CUTOFF_TIME: z.string().regex(cutoffPattern, 'must be HH:MM').default('09:00'),
  TWILIO_ACCOUNT_SID: z.string().default(''),
  TWILIO_AUTH_TOKEN: z.string().default(''),
  TWILIO_WHATSAPP_NUMBER: z.string().default(''),
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  NOTIFICATION_DISPATCH_MODE: z.enum(['inline', 'deferred']).default('inline'),
  NOTIFICATION_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  REMOTE_LOGIN_POLICY: z.enum(['keep-remote', 'office']).default('keep-remote'),
  SWEEP_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
});

export interface AppConfig {
  port: number;
  databaseUrl: string | null;
  cutoffTime: string;
  twilio: {
    accountSid: string;
    authToken: string;
    whatsappNumber: string;
  };
  deliveryTimeoutMs: number;
  dispatchMode: 'inline' | 'deferred';
  pollIntervalMs: number;
  remoteLoginPolicy: 'keep-remote' | 'office';
  sweepCheckIntervalMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }

  const vars = parsed.data;
  const dbUrl = vars.DATABASE_URL;

  return {
    port: vars.PORT,
    databaseUrl: dbUrl && dbUrl.startsWith('postgres') ? dbUrl : null,
    cutoffTime: vars.ATTENDANCE_CUTOFF_TIME,
    twilio: {
      accountSid: vars.TWILIO_ACCOUNT_SID,
      authToken: vars.TWILIO_AUTH_TOKEN,
      whatsappNumber: vars.TWILIO_WHATSAPP_NUMBER,
    },
    deliveryTimeoutMs: vars.DELIVERY_TIMEOUT_MS,
    dispatchMode: vars.NOTIFICATION_DISPATCH_MODE,
    pollIntervalMs: vars.NOTIFICATION_POLL_INTERVAL_MS,
    remoteLoginPolicy: vars.REMOTE_LOGIN_POLICY,
    sweepCheckIntervalMs: vars.SWEEP_CHECK_INTERVAL_MS,
  };
}
