// app.ts
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { ActivityService } from './services/activity-service';
import { AppError, RequestValidationError, isDomainError } from './utils/errors';
import type { RequestIssue } from './utils/errors';
import { logger } from './utils/logger';

export interface AppDeps {
  activityService: ActivityService;
  staticDir: string;
  // '*' or a comma-separated list of origins
  allowedOrigins?: string;
}

type CorsOptions = {
  origin: string | ((origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => void);
};

// A repeated parameter keeps its last value
const EmailQuerySchema = z.object({
  email: z.union([z.string(), z.array(z.string()).nonempty()])
    .transform(value => (Array.isArray(value) ? value[value.length - 1] : value)),
});

function buildCorsOptions(allowedOrigins: string = '*'): CorsOptions {
  if (allowedOrigins === '*') {
    return { origin: '*' };
  }
  const originsArray = allowedOrigins.split(',').map(origin => origin.trim());
  return {
    origin: function (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
      if (!origin || originsArray.includes(origin) || originsArray.includes('*')) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    }
  };
}

function parseEmail(query: unknown): string {
  const result = EmailQuerySchema.safeParse(query);
  if (!result.success) {
    const issues: RequestIssue[] = result.error.issues.map(issue => ({
      loc: ['query', ...issue.path],
      msg: issue.message,
    }));
    throw new RequestValidationError(issues);
  }
  return result.data.email;
}

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof RequestValidationError) {
    res.status(error.status).json({ detail: error.issues });
    return;
  }
  if (isDomainError(error)) {
    res.status(error.status).json({ detail: error.message });
    return;
  }
  logger.error(`Error in ${context}:`, error);
  res.status(500).json({ detail: 'Internal server error' });
}

function statusOf(error: unknown): number | null {
  if (error instanceof AppError) return error.status;
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

export function createApp(deps: AppDeps): express.Express {
  const { activityService, staticDir } = deps;
  const app = express();

  app.use(cors(buildCorsOptions(deps.allowedOrigins)));
  app.use('/static', express.static(staticDir));

  // --- API Endpoints ---
  app.get('/', (_req: Request, res: Response) => {
    res.redirect(307, '/static/index.html');
  });

  app.get('/activities', (_req: Request, res: Response) => {
    try {
      res.json(activityService.getActivities());
    } catch (error) {
      sendError(res, error, 'GET /activities');
    }
  });

  app.post('/activities/:activityName/signup', (req: Request, res: Response) => {
    const { activityName } = req.params;
    try {
      const email = parseEmail(req.query);
      res.json(activityService.signup(activityName, email));
    } catch (error) {
      sendError(res, error, `POST /activities/${activityName}/signup`);
    }
  });

  app.delete('/activities/:activityName/unregister', (req: Request, res: Response) => {
    const { activityName } = req.params;
    try {
      const email = parseEmail(req.query);
      res.json(activityService.unregister(activityName, email));
    } catch (error) {
      sendError(res, error, `DELETE /activities/${activityName}/unregister`);
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  // Errors raised by middleware (cors, static) before any route runs
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(error);
    if (status !== null && status < 500) {
      logger.warn(`Request ${req.method} ${req.path} rejected with ${status}:`, error);
      res.status(status).json({ detail: error instanceof Error ? error.message : 'Bad request' });
      return;
    }
    logger.error(`Unhandled error in ${req.method} ${req.path}:`, error);
    res.status(500).json({ detail: 'Internal server error' });
  });

  return app;
}
