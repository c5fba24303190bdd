/**
 * Liveness check
 * Returns 200 while the process can serve requests; no dependencies to probe
 */

import type { Request, Response } from 'express';

export function healthHandler(_req: Request, res: Response): void {
  res.status(200).json({ status: 'ok' });
}
