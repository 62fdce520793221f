/**
 * @fileoverview Health check endpoint.
 */

import type { Request, Response } from 'express';
import type { InboxService } from '../domains/inbox/service/inbox.js';

export function createHealthHandler(service: InboxService) {
  return (_req: Request, res: Response): void => {
    const status = service.getStatus();
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      services: {
        gmail: status.gmailConnected,
        gemini: status.aiConfigured,
        emailCount: status.emailCount,
      },
    });
  };
}
