import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { logger } from '@relaypost/shared';
import { healthReport } from './health.js';
import type { MessageStore } from './message-store.js';
import { OutboxError, type Outbox } from './outbox.js';
import type { JobRunner } from './runner.js';

const log = logger.child({ module: 'api' });

const sendMessageSchema = z
  .object({
    threadId: z.string().min(1),
    body: z.string().min(1).optional(),
    expiresInMs: z.number().int().positive().optional(),
    attachments: z
      .array(z.object({ contentType: z.string().min(1), data: z.string().base64() }))
      .default([]),
  })
  .refine((input) => input.body !== undefined || input.attachments.length > 0, {
    message: 'a message needs a body or an attachment',
  });

const markReadSchema = z.object({
  timestamps: z.array(z.number().int()).min(1),
});

export interface ApiOptions {
  runner: JobRunner;
  outbox: Outbox;
  storage: MessageStore;
  /** Server whose rooms are listed when the request names none */
  openGroupServer: string;
  /** Bearer token; without one every request is let through */
  authToken?: string;
  startedAt?: number;
}

function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function authMiddleware(token: string | undefined) {
  if (!token) {
    log.warn('AUTH_TOKEN not configured - running without authentication');
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    // Health checks bypass auth
    if (!token || req.path === '/healthz') {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ') || !safeCompare(authHeader.slice(7), token)) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  };
}

function validationError(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

export function createApi(opts: ApiOptions): Express {
  const startedAt = opts.startedAt ?? Date.now();
  const app = express();
  app.use(express.json({ limit: '25mb' }));
  app.use(authMiddleware(opts.authToken));

  app.get('/healthz', (_req: Request, res: Response) => {
    const report = healthReport(opts.runner, startedAt);
    res.status(report.status === 'healthy' ? 200 : 503).json(report);
  });

  // ---------------------------------------------------------------------------
  // Sending
  // ---------------------------------------------------------------------------

  app.post('/messages', (req: Request, res: Response) => {
    const parsed = sendMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: validationError(parsed.error) });
      return;
    }

    try {
      const { message, jobId } = opts.outbox.sendMessage({
        threadId: parsed.data.threadId,
        body: parsed.data.body,
        expiresInMs: parsed.data.expiresInMs,
        attachments: parsed.data.attachments.map((attachment) => ({
          contentType: attachment.contentType,
          data: new Uint8Array(Buffer.from(attachment.data, 'base64')),
        })),
      });
      res.status(202).json({ messageId: message.id, jobId, sentTimestamp: message.sentTimestamp });
    } catch (err) {
      if (err instanceof OutboxError) {
        res.status(409).json({ error: err.message });
        return;
      }
      log.error({ err }, 'failed to queue message');
      res.status(500).json({ error: 'internal server error' });
    }
  });

  app.post('/threads/:threadId/read', (req: Request, res: Response) => {
    const parsed = markReadSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: validationError(parsed.error) });
      return;
    }

    try {
      const result = opts.outbox.markThreadRead(req.params.threadId, parsed.data.timestamps);
      res.status(202).json({ status: result?.status });
    } catch (err) {
      log.error({ err, threadId: req.params.threadId }, 'failed to queue read receipts');
      res.status(500).json({ error: 'internal server error' });
    }
  });

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------

  app.get('/threads/:threadId/messages', (req: Request, res: Response) => {
    res.json({ messages: opts.storage.messagesInThread(req.params.threadId) });
  });

  app.get('/open-group-rooms', (req: Request, res: Response) => {
    const server = typeof req.query.server === 'string' && req.query.server ? req.query.server : opts.openGroupServer;
    res.json({ server, rooms: opts.storage.listOpenGroupRooms(server) });
  });

  return app;
}
