import express from 'express';
import type { ErrorRequestHandler } from 'express';
import cors from 'cors';
import { HostLaunchError } from './core/errors';
import { logger, sanitize } from './core/log';
import { sessionsRouter, defaultsRouter } from './api/sessions';
import { launchRouter } from './api/launch';
import { colorsRouter } from './api/colors';
import { selftestRouter } from './selftest';
import type { ApiContext } from './api/context';

const onError: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof HostLaunchError) {
    logger.warn('api.error', { path: sanitize(req.path), kind: err.kind, err: sanitize(err.message) });
    return res.status(err.httpStatus).json({ error: err.message, kind: err.kind });
  }
  // body-parser rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) {
    return res.status(400).json({ error: 'invalid JSON body', kind: 'validation' });
  }
  logger.error('api.unhandled', { path: sanitize(req.path), err: String(err) });
  res.status(500).json({ error: 'internal error' });
};

export function createApp(ctx: ApiContext, corsOrigins: string[]) {
  const app = express();

  // Basic middleware
  app.use(express.json({ limit: '64kb' }));

  const corsOpts: cors.CorsOptions = {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true); // non-browser or same-origin
      cb(null, corsOrigins.includes(origin));
    },
  };
  app.use(cors(corsOpts));
  app.options('*', cors(corsOpts));

  // Routers
  app.use('/api/sessions', sessionsRouter(ctx));
  app.use('/api/defaults', defaultsRouter(ctx));
  app.use('/api/launch', launchRouter(ctx));
  app.use('/api/colors', colorsRouter());
  app.use('/', selftestRouter());

  app.use(onError);
  return app;
}
