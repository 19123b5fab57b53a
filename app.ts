// app.ts
import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { createActivitiesRouter } from './routes/activities';
import { requestLogger } from './middleware/request-logger';
import { ApiError, errorHandler, notFoundHandler } from './middleware/error-handler';
import type { ActivityStore } from './services/activity-store';
import type { Config } from './config';

// CORS configuration
type CorsOptions = {
  origin: string | ((origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => void);
};

export function buildCorsOptions(allowedOrigins: string): CorsOptions {
  if (allowedOrigins === '*') {
    return { origin: '*' };
  }
  const originsArray = allowedOrigins.split(',').map(origin => origin.trim());
  return {
    origin: function (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
      if (!origin || originsArray.indexOf(origin) !== -1 || originsArray.includes('*')) {
        callback(null, true);
      } else {
        callback(new ApiError(403, 'Not allowed by CORS'));
      }
    }
  };
}

export interface AppDependencies {
  store: ActivityStore;
  config: Pick<Config, 'allowedOrigins'>;
}

export function createApp({ store, config }: AppDependencies): Express {
  const app = express();
  // Paths are matched exactly; both settings must precede the first app.use
  app.set('case sensitive routing', true);
  app.set('strict routing', true);
  app.use(cors(buildCorsOptions(config.allowedOrigins)));
  app.use(requestLogger);

  app.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send([
      'Mergington High School Activities API',
      'GET /activities',
      'POST /activities/{activityName}/signup?email={email}',
      'DELETE /activities/{activityName}/unregister?email={email}',
    ].join('\n'));
  });

  app.use('/activities', createActivitiesRouter(store));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
