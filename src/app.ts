import express, { Express, NextFunction, Request, Response } from 'express';
import { Pool } from 'pg';
import { AppConfig } from './config.js';
import { Clock, systemClock } from './clock.js';
import { DeliveryChannel } from './models/Notification.js';
import { UserRepository } from './repositories/UserRepository.js';
import { AttendanceRepository } from './repositories/AttendanceRepository.js';
import { NotificationRepository } from './repositories/NotificationRepository.js';
import { AttendanceEngine } from './services/AttendanceEngine.js';
import { NotificationDispatcher } from './services/NotificationDispatcher.js';
import { AbsenceSweepScheduler } from './services/AbsenceSweepScheduler.js';
import { createDeliveryChannel } from './services/WhatsAppChannel.js';
import { createAttendanceRoutes } from './routes/attendanceRoutes.js';
import { createNotificationRoutes } from './routes/notificationRoutes.js';
import { createUserRoutes } from './routes/userRoutes.js';

export interface Services {
  pool: Pool | null;
  users: UserRepository;
  attendance: AttendanceRepository;
  notifications: NotificationRepository;
  engine: AttendanceEngine;
  dispatcher: NotificationDispatcher;
  scheduler: AbsenceSweepScheduler;
}

export interface ServiceOverrides {
  pool?: Pool | null;
  clock?: Clock;
  channel?: DeliveryChannel;
}

/** Wires repositories and services. Without a postgres DATABASE_URL everything is kept in memory. */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const pool =
    overrides.pool !== undefined
      ? overrides.pool
      : config.databaseUrl
        ? new Pool({ connectionString: config.databaseUrl })
        : null;

  if (!pool) {
    console.log('Using in-memory store for Attendance (no DATABASE_URL)');
  }

  const clock = overrides.clock ?? systemClock;
  const channel =
    overrides.channel ??
    createDeliveryChannel({
      accountSid: config.twilio.accountSid,
      authToken: config.twilio.authToken,
      whatsappNumber: config.twilio.whatsappNumber,
      timeoutMs: config.deliveryTimeoutMs,
    });

  const users = new UserRepository(pool);
  const attendance = new AttendanceRepository(users, pool);
  const notifications = new NotificationRepository(pool);
  const dispatcher = new NotificationDispatcher(notifications, users, channel, {
    mode: config.dispatchMode,
    clock,
  });
  const engine = new AttendanceEngine(users, attendance, dispatcher, {
    cutoffTime: config.cutoffTime,
    clock,
    remoteLoginPolicy: config.remoteLoginPolicy,
  });
  const scheduler = new AbsenceSweepScheduler(engine, { cutoffTime: config.cutoffTime, clock });

  return { pool, users, attendance, notifications, engine, dispatcher, scheduler };
}

/** Creates tables in dependency order; a no-op for in-memory stores. */
export async function initStores(services: Services): Promise<void> {
  await services.users.init();
  await services.attendance.init();
  await services.notifications.init();
  if (services.pool) console.log('✅ Attendance database schema initialized');
}

/**
 * Starts the poller and the sweep scheduler, and runs one dispatch cycle for
 * anything left pending before start-up. The poller runs in inline mode too,
 * so entries a failed cycle left behind are still picked up.
 */
export function startBackgroundJobs(services: Services, config: AppConfig): void {
  services.dispatcher.start(config.pollIntervalMs);
  services.dispatcher.schedule();
  services.scheduler.start(config.sweepCheckIntervalMs);
}

export async function stopBackgroundJobs(services: Services): Promise<void> {
  services.scheduler.stop();
  await services.dispatcher.stop();
}

export function createApp(services: Services): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', store: services.pool ? 'postgres' : 'memory' });
  });

  app.use('/users', createUserRoutes(services.users));
  app.use('/attendance', createAttendanceRoutes(services.engine));
  app.use('/notifications', createNotificationRoutes(services.notifications, services.dispatcher, services.users));

  // malformed JSON bodies and anything else thrown outside the routers
  app.use((error: Error & { status?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = error.status ?? 500;
    if (status >= 500) console.error('[Server] Unhandled error:', error);
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : error.message });
  });

  return app;
}
