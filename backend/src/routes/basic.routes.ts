/**
 * Basic Routes
 *
 * Welcome, health probes and an endpoint that fails on request (used to
 * check error reporting end to end).
 *
 * @module routes/basic.routes
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { formatZodIssues } from '@zeroshot/shared/schemas';
import { sendBadRequest, sendValidationError } from '@shared/utils/error-response';

const raiseErrorQuerySchema = z.object({
  should_fail: z
    .enum(['true', 'false', '1', '0'], {
      errorMap: () => ({ message: 'should_fail must be a boolean' }),
    })
    .transform((value) => value === 'true' || value === '1'),
});

export function createBasicRouter(appName: string): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(`welcome to ${appName}`);
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json(`App ${appName} doing fine ...`);
  });

  // Liveness probe - always 200 while the process serves requests
  router.get('/health/liveness', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/raise-error', (req: Request, res: Response) => {
    const validation = raiseErrorQuerySchema.safeParse(req.query);
    if (!validation.success) {
      sendValidationError(res, formatZodIssues(validation.error));
      return;
    }

    if (validation.data.should_fail) {
      sendBadRequest(res, 'This is a bad request');
      return;
    }
    res.json({ message: 'Success' });
  });

  return router;
}
