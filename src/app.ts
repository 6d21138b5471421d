import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createSessionMiddleware } from './auth/session.js';
import { type AppContext } from './context.js';
import { isAppError } from './errors.js';
import { registerAuthRoutes } from './routes/auth.js';
import { registerExpenseRoutes } from './routes/expenses.js';

export const createApp = (context: AppContext): Express => {
  const { config, log } = context;
  const app = express();

  if (config.production) {
    app.set('trust proxy', 1);
  }

  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());
  app.use(createSessionMiddleware({ secret: config.sessionSecret, secure: config.production }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      log.debug('Request handled', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt
      });
    });
    next();
  });

  const router = express.Router();
  registerAuthRoutes(router, context);
  registerExpenseRoutes(router, context);
  app.use(router);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` } });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isAppError(error) && error.code !== 'STORAGE_ERROR') {
      log.warn('Request failed', { method: req.method, path: req.path, code: error.code, reason: error.message });
      res.status(error.status).json({ error: { code: error.code, message: error.message } });
      return;
    }
    log.error('Unhandled request error', { method: req.method, path: req.path, error: String(error) });
    if (!res.headersSent) {
      res.status(500).json({ error: { code: 'INTERNAL', message: 'Internal server error' } });
    }
  });

  return app;
};
