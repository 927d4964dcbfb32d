import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { WebSocketServer } from 'ws';
import type { ServerEnv } from './env';
import { log } from './log';
import { attachMediaStreamServer, MediaStreamHandlers } from './media/streamServer';
import { metricsHandler, metricsMiddleware } from './metrics';
import { healthRouter } from './routes/health';
import { createVoiceWebhookRouter } from './routes/voiceWebhook';

export interface BuildServerOptions {
  mediaHandlers?: MediaStreamHandlers;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err, requestId: res.locals.requestId }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function buildServer(
  env: ServerEnv,
  options: BuildServerOptions = {},
): { app: express.Express; server: http.Server; wss: WebSocketServer } {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.urlencoded({ extended: false }));
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', healthRouter);
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/voice', createVoiceWebhookRouter(env));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaStreamServer(server, {
    token: env.MEDIA_STREAM_TOKEN,
    handlers: options.mediaHandlers,
  });

  return { app, server, wss };
}
