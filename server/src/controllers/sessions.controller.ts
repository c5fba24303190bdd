/**
 * Sessions Controller
 * Producer-facing HTTP surface: push output and status into a session topic,
 * and ask whether anyone is watching
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ConnectionHub } from '../infra/hub/connection-hub.js';
import {
  OutputStreamSchema,
  SessionIdSchema,
  SessionStatusSchema
} from '../infra/websocket/websocket-protocol.js';
import { createValidationError } from '../middleware/error.middleware.js';

const OutputBodySchema = z.object({
  stream: OutputStreamSchema,
  content: z.string()
});

const StatusBodySchema = z.object({
  status: SessionStatusSchema
});

/**
 * Validate with zod, throwing a 400 listing every issue
 */
function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw createValidationError(
      `Invalid ${what}`,
      result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    );
  }
  return result.data;
}

function sessionIdParam(req: Request): string {
  return parseOrThrow(SessionIdSchema, req.params['sessionId'], 'session id');
}

export function createSessionsRouter(hub: ConnectionHub): Router {
  const router = Router();

  /**
   * POST /api/sessions/:sessionId/output
   * Publish one line of output; delivered is the subscriber count it reached
   */
  router.post('/:sessionId/output', (req: Request, res: Response) => {
    const sessionId = sessionIdParam(req);
    const body = parseOrThrow(OutputBodySchema, req.body, 'output body');

    const delivered = hub.publisher(sessionId).output(body.stream, body.content);
    req.log.debug({ sessionId, stream: body.stream, delivered }, 'Output published');

    res.status(202).json({ sessionId, delivered });
  });

  /**
   * POST /api/sessions/:sessionId/status
   * Publish a lifecycle transition
   */
  router.post('/:sessionId/status', (req: Request, res: Response) => {
    const sessionId = sessionIdParam(req);
    const body = parseOrThrow(StatusBodySchema, req.body, 'status body');

    const delivered = hub.publisher(sessionId).status(body.status);
    req.log.info({ sessionId, status: body.status, delivered }, 'Status published');

    res.status(202).json({ sessionId, delivered });
  });

  /**
   * GET /api/sessions/:sessionId/subscribers
   * Advisory presence; may be stale by the time the caller acts on it
   */
  router.get('/:sessionId/subscribers', (req: Request, res: Response) => {
    const sessionId = sessionIdParam(req);
    const subscriberCount = hub.subscriberCount(sessionId);

    res.json({
      sessionId,
      hasSubscribers: subscriberCount > 0,
      subscriberCount
    });
  });

  return router;
}
