import type { Express, NextFunction, Request, Response } from 'express';
import { HttpError } from '../utils/errors.js';

export const registerErrorHandlers = (app: Express) => {
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof HttpError) {
      if (error.statusCode >= 500) {
        console.error(`[api] ${res.locals.requestId ?? '-'} ${error.name}: ${error.message}`);
      }
      res.status(error.statusCode).json({ error: error.message });
      return;
    }
    console.error('[api] Unhandled error:', error);
    res.status(500).json({ error: 'Internal server error' });
  });
};
