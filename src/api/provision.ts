/**
 * Provision API routes.
 *
 * POST /provision           - Provision one project from a JSON payload or push envelope
 * POST /provision/group     - Ensure the group and its access mapping only
 * POST /provision/folder    - Ensure the project folder only
 * POST /provision/dashboard - Clone one template into a given folder
 */

import express, { NextFunction, Request, Response, Router } from 'express';
import { HandlerResponse } from '../domain/result';
import { httpStatusFor } from '../engine/reporter';
import { ProvisionHandlers } from '../handler';

/** Largest accepted request body. */
const BODY_LIMIT = '1mb';

type EntryPoint = (event: unknown) => Promise<HandlerResponse<{ status: 'ok' }>>;

/**
 * The body is handed to the entry point as raw bytes whatever its content
 * type, so decoding and validation stay in one place.
 */
function respondWith(entryPoint: EntryPoint) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: unknown = req.body;
      const event = Buffer.isBuffer(body) ? body : Buffer.alloc(0);
      const response = await entryPoint(event);
      res.status(httpStatusFor(response)).json(response);
    } catch (err) {
      next(err);
    }
  };
}

export function createProvisionRoutes(handlers: ProvisionHandlers): Router {
  const router = Router();
  const rawBody = express.raw({ type: () => true, limit: BODY_LIMIT });

  router.post('/provision', rawBody, respondWith(handlers.provision));
  router.post('/provision/group', rawBody, respondWith(handlers.groupMapping));
  router.post('/provision/folder', rawBody, respondWith(handlers.folder));
  router.post('/provision/dashboard', rawBody, respondWith(handlers.dashboard));

  return router;
}
