/**
 * Hub stats
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ConnectionHub } from '../infra/hub/connection-hub.js';

export function createHubRouter(hub: ConnectionHub): Router {
  const router = Router();

  /**
   * GET /api/hub/stats
   */
  router.get('/stats', (_req: Request, res: Response) => {
    res.json(hub.getStats());
  });

  return router;
}
