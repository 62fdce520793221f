/**
 * @fileoverview Express application factory.
 *
 * Kept separate from the entry point so tests can mount the full route
 * table against in-process fakes.
 */

import express, { type Express } from 'express';
import type { InboxService } from './domains/inbox/service/inbox.js';
import { createHealthHandler } from './routes/health.js';
import { createInboxRouter } from './routes/inbox.js';

export type AppOptions = {
  service: InboxService;
  timeZone: string;
  now?: () => Date;
};

export function createApp(options: AppOptions): Express {
  const app = express();

  app.get('/health', createHealthHandler(options.service));
  app.use(createInboxRouter(options.service, { timeZone: options.timeZone, now: options.now }));

  return app;
}
