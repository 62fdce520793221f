/**
 * @fileoverview Inbox HTTP API.
 *
 * GET    /emails                 - ranked snapshot (first call triggers a refresh)
 * GET    /emails/important       - important messages by score, at most 20
 * POST   /emails/refresh         - run a fetch cycle now
 * POST   /emails/classify        - score arbitrary text
 * GET    /emails/:id/summary     - per-message summary
 * DELETE /summaries              - drop cached summaries
 * GET    /summary/overall        - inbox brief
 * POST   /calendar/add/:id       - schedule a follow-up for a message
 * POST   /meetings/suggest       - weekday meeting slots
 * GET    /status                 - connection, refresh and summary cache state
 */

import express, { Router, type Request, type Response } from 'express';
import { createLogger } from '../utils/observability/index.js';
import { errorMessage } from '../utils/errors.js';
import type { InboxService } from '../domains/inbox/service/inbox.js';
import { suggestMeetingTimes } from '../domains/inbox/service/meetings.js';

const log = createLogger({ domain: 'routes' });

export type InboxRouterOptions = {
  timeZone: string;
  now?: () => Date;
};

type ClassifyBody = {
  sender: string;
  subject: string;
  content: string;
};

type MeetingRequest = {
  title: string;
  durationMinutes: number;
  attendeeEmail?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseClassifyBody(body: unknown): ClassifyBody | null {
  if (!isRecord(body)) return null;
  const { sender, subject, content } = body;
  if (typeof sender !== 'string' || typeof subject !== 'string' || typeof content !== 'string') {
    return null;
  }
  return { sender, subject, content };
}

export function parseMeetingRequest(body: unknown): MeetingRequest | null {
  if (!isRecord(body)) return null;
  const { title, durationMinutes, attendeeEmail } = body;
  if (typeof title !== 'string' || title.trim() === '') return null;
  if (typeof durationMinutes !== 'number' || !Number.isInteger(durationMinutes) || durationMinutes <= 0) {
    return null;
  }
  if (attendeeEmail !== undefined && typeof attendeeEmail !== 'string') return null;
  return { title, durationMinutes, attendeeEmail };
}

function sendServerError(res: Response, operation: string, error: unknown): void {
  log.error('request_failed', { operation, error: errorMessage(error) });
  res.status(500).json({ error: 'Internal server error' });
}

export function createInboxRouter(service: InboxService, options: InboxRouterOptions): Router {
  const router = Router();
  const now = options.now ?? (() => new Date());

  router.use(express.json());

  router.get('/emails', async (_req: Request, res: Response) => {
    try {
      if (!service.hasRefreshed()) {
        await service.refresh();
      }
      res.json({ emails: service.getMessages() });
    } catch (error) {
      sendServerError(res, 'list_emails', error);
    }
  });

  router.get('/emails/important', (_req: Request, res: Response) => {
    res.json({ importantEmails: service.getImportantMessages() });
  });

  router.get('/status', (_req: Request, res: Response) => {
    res.json(service.getStatus());
  });

  router.post('/emails/refresh', async (_req: Request, res: Response) => {
    try {
      const result = await service.refresh();
      res.json({
        fetched: result.messages.length,
        errors: result.errorCount,
        listed: result.listedCount,
        durationMs: result.durationMs,
      });
    } catch (error) {
      sendServerError(res, 'refresh_emails', error);
    }
  });

  router.post('/emails/classify', (req: Request, res: Response) => {
    const input = parseClassifyBody(req.body);
    if (!input) {
      res.status(400).json({ error: 'sender, subject and content must be strings' });
      return;
    }
    res.json(service.classifyText(input));
  });

  router.get('/emails/:id/summary', async (req: Request<{ id: string }>, res: Response) => {
    try {
      const summary = await service.summarizeMessage(req.params.id);
      if (summary === null) {
        res.status(404).json({ error: 'Email not found' });
        return;
      }
      res.json({
        emailId: req.params.id,
        summary,
        generatedWithAi: service.isAiConfigured(),
      });
    } catch (error) {
      sendServerError(res, 'summarize_email', error);
    }
  });

  router.delete('/summaries', (_req: Request, res: Response) => {
    service.clearSummaryCache();
    res.status(204).send();
  });

  router.get('/summary/overall', async (_req: Request, res: Response) => {
    try {
      res.json(await service.summarizeInbox());
    } catch (error) {
      sendServerError(res, 'summarize_inbox', error);
    }
  });

  router.post('/calendar/add/:id', async (req: Request<{ id: string }>, res: Response) => {
    const outcome = await service.addToCalendar(req.params.id);
    switch (outcome) {
      case 'created':
        res.status(201).json({ success: true });
        return;
      case 'not_found':
        res.status(404).json({ success: false, error: 'Email not found' });
        return;
      case 'not_configured':
        res.status(503).json({ success: false, error: 'Calendar is not connected' });
        return;
      case 'failed':
        res.status(502).json({ success: false, error: 'Calendar rejected the event' });
        return;
    }
  });

  router.post('/meetings/suggest', (req: Request, res: Response) => {
    const request = parseMeetingRequest(req.body);
    if (!request) {
      res.status(400).json({ error: 'title and a positive integer durationMinutes are required' });
      return;
    }
    const suggestedTimes = suggestMeetingTimes(now(), options.timeZone);
    res.json({
      meetingTitle: request.title,
      durationMinutes: request.durationMinutes,
      suggestedTimes,
      message: `Here are ${suggestedTimes.length} available time slots for your ${request.durationMinutes}-minute meeting`,
    });
  });

  return router;
}
