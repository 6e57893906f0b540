import 'dotenv/config';
import express, { type NextFunction, type Request, type Response } from 'express';
import { registerRoutes } from './routes';
import { storage } from './storage';
import { closeDatabase } from './db';
import { PairingParser } from './pairingParser';
import { loadServerConfig } from './config';
import { logger } from './logger';

const config = loadServerConfig();

const app = express();
app.use(express.json({ limit: '10mb' }));
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on('finish', () => {
    if (config.LOG_HTTP && path.startsWith('/api')) {
      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;

      if (capturedJsonResponse !== undefined) {
        // Only log response size and type, not the full content
        const responseSize = JSON.stringify(capturedJsonResponse).length;
        const responseType = Array.isArray(capturedJsonResponse)
          ? `array[${capturedJsonResponse.length}]`
          : typeof capturedJsonResponse;
        logLine += ` :: ${responseType} (${responseSize} bytes)`;
      }

      logger('info', logLine, 'express');
    }
  });

  next();
});

(async () => {
  const parser = new PairingParser({ prelimIdStrategy: config.PRELIM_ID_STRATEGY });
  const server = await registerRoutes(app, storage, parser);

  app.use((err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    const message = err.message || 'Internal Server Error';

    logger('error', `Unhandled error: ${message}`, 'express');
    res.status(status).json({ message });
  });

  server.listen(config.PORT, '0.0.0.0', () => {
    logger('info', `Server started on port ${config.PORT}`, 'express');
    logger('info', `Environment: ${config.NODE_ENV}`, 'express');
    logger('info', `Prelim id strategy: ${config.PRELIM_ID_STRATEGY}`, 'express');
  });

  const shutdown = (signal: string) => {
    logger('info', `${signal} received, shutting down`, 'express');
    server.close();
    closeDatabase().then(
      () => process.exit(0),
      error => {
        logger('error', `Error during database shutdown: ${error instanceof Error ? error.message : String(error)}`, 'express');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
})().catch(error => {
  logger('error', `Failed to start server: ${error instanceof Error ? error.message : String(error)}`, 'express');
  process.exit(1);
});
